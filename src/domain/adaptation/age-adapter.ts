// ---------------------------------------------------------------------------
// Age adapter: rewrites text that already passed the safety gate so it fits
// the reader's band. Pure and deterministic for a given phrase picker, and
// idempotent: adapting adapted text returns it unchanged.
// ---------------------------------------------------------------------------

import type {
  AgeBand,
  AgeProfile,
  PhrasePicker,
  SafetyPolicy,
  VocabularyCatalogue,
} from "../../core/types.js";
import { VocabularyTier } from "../../core/types.js";
import { countWords } from "../../utils/text.js";
import { firstPhrase } from "../safety/redirects.js";
import { compileVocabulary, substituteVocabulary } from "./vocabulary.js";
import type { CompiledVocabulary } from "./vocabulary.js";
import { restructure } from "./sentences.js";
import { truncateToLimit } from "./length.js";
import {
  addEngagement,
  endsWithQuestion,
  maxFollowUpWords,
  maxGreetingWords,
  planGreeting,
  splitGreeting,
} from "./engagement.js";
import { scrubText } from "./scrub.js";

export interface Audience {
  childName?: string;
}

export interface AgeAdapterOptions {
  pickPhrase?: PhrasePicker;
}

type Tier = Exclude<VocabularyTier, "none">;

export class AgeAdapter {
  private readonly pickPhrase: PhrasePicker;
  private readonly vocabulary: VocabularyCatalogue;
  private readonly compiled: Readonly<Record<Tier, CompiledVocabulary>>;

  constructor(
    private readonly policy: SafetyPolicy,
    options: AgeAdapterOptions = {},
  ) {
    this.pickPhrase = options.pickPhrase ?? firstPhrase;
    this.vocabulary = policy.vocabulary;
    this.compiled = {
      basic: compileVocabulary(this.vocabulary.tiers.basic),
      intermediate: compileVocabulary(this.vocabulary.tiers.intermediate),
      advanced: compileVocabulary(this.vocabulary.tiers.advanced),
    };
  }

  /**
   * Adapt `text` for `band`: vocabulary, sentence structure, length,
   * engagement, then a final scrub. Empty input gives empty output.
   */
  adapt(text: string, band: AgeBand, audience: Audience = {}): string {
    const collapsed = text.replace(/\s+/g, " ").trim();
    if (collapsed.length === 0) return "";

    const profile = this.profileFor(band);
    const { engagement } = this.vocabulary;
    const name = audience.childName ?? "";

    // A greeting from an earlier pass is set aside so the steps below never
    // rewrite the child's name.
    const existing = profile.engagement.greeting
      ? splitGreeting(collapsed, name, engagement)
      : null;

    let out = existing?.rest ?? collapsed;
    if (profile.vocabularyTier !== VocabularyTier.NONE) {
      out = substituteVocabulary(out, this.compiled[profile.vocabularyTier]);
    }

    out = restructure(out, profile.sentenceComplexity);

    let greeting: string | null = null;
    if (existing) {
      greeting = existing.greeting;
    } else if (profile.engagement.greeting) {
      greeting = planGreeting(out, name, engagement, this.pickPhrase);
    }
    const followUp = profile.engagement.followUp
      ? this.pickPhrase(engagement.followUps)
      : null;

    const pendingWords =
      (greeting !== null ? countWords(greeting) : 0) +
      (followUp !== null && !endsWithQuestion(out) ? countWords(followUp) : 0);

    if (countWords(out) + pendingWords > profile.maxWords) {
      const reserve =
        (greeting !== null ? maxGreetingWords(name, engagement) : 0) +
        (followUp !== null ? maxFollowUpWords(engagement) : 0);
      out = truncateToLimit(out, profile.maxWords - reserve, engagement.continuation);
    }

    out = addEngagement(out, greeting, followUp);

    return scrubText(out, profile.vagueNumbersAbove, this.vocabulary.vagueQuantity);
  }

  private profileFor(band: AgeBand): AgeProfile {
    const profile = this.policy.profiles.get(band);
    if (!profile) {
      throw new Error(`No age profile loaded for band "${band}"`);
    }
    return profile;
  }
}
