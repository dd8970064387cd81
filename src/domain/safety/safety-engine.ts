// ---------------------------------------------------------------------------
// Safety engine: scores text against an age band's profile and returns a
// frozen verdict. Fails closed: an invalid age or an internal error is never
// reported as safe.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { SafetyCategory, SeverityLevel } from "../../core/types.js";
import type {
  AgeBand,
  AgeProfile,
  PhrasePicker,
  SafetyIssue,
  SafetyPolicy,
  SafetyResult,
} from "../../core/types.js";
import { InvalidAgeError } from "../../core/errors.js";
import { classifyAge } from "../age/age-classifier.js";
import { normalizeText } from "../../utils/text.js";
import { matchAllowedTopics, scanText } from "./pattern-matcher.js";
import {
  aggregateSeverity,
  isAgeAppropriate,
  primaryCategory,
  safetyScore,
} from "./priority.js";
import {
  firstPhrase,
  genericRedirect,
  resolveEducationalRedirect,
  resolveRedirect,
} from "./redirects.js";

export interface SafetyEngineOptions {
  pickPhrase?: PhrasePicker;
}

export class SafetyEngine {
  private readonly pickPhrase: PhrasePicker;

  constructor(
    private readonly policy: SafetyPolicy,
    private readonly logger: pino.Logger,
    options: SafetyEngineOptions = {},
  ) {
    this.pickPhrase = options.pickPhrase ?? firstPhrase;
  }

  /**
   * Evaluate `text` for a child of `age`.
   *
   * Never throws: failures become an unsafe result with `parentAlert` set.
   */
  evaluate(text: string, age: number): SafetyResult {
    let band: AgeBand;
    try {
      band = classifyAge(age);
    } catch (err) {
      if (err instanceof InvalidAgeError) {
        this.logger.warn({ age }, "safety check rejected invalid age");
        return this.failClosed(null, "invalid_age", { error: err.message });
      }
      return this.failWithError(null, err);
    }

    try {
      return this.evaluateForBand(text, band);
    } catch (err) {
      return this.failWithError(band, err);
    }
  }

  /** The loaded profile for a band. */
  profileFor(band: AgeBand): AgeProfile {
    const profile = this.policy.profiles.get(band);
    if (!profile) {
      throw new Error(`No age profile loaded for band "${band}"`);
    }
    return profile;
  }

  /** Generic redirect for a band (or the band-independent fallback). */
  genericRedirect(band: AgeBand | null): string {
    return genericRedirect(this.policy.redirects, band, this.pickPhrase);
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private evaluateForBand(text: string, band: AgeBand): SafetyResult {
    const profile = this.profileFor(band);
    const normalized = normalizeText(text);

    if (normalized.trim().length === 0) {
      return this.safeResult(band, { onTopic: false, topics: [], issueCount: 0 });
    }

    const topics = matchAllowedTopics(normalized, profile, this.policy.patterns);
    const issues = scanText(normalized, profile, this.policy.patterns);

    if (issues.length === 0) {
      return this.safeResult(band, {
        onTopic: topics.length > 0,
        topics,
        issueCount: 0,
      });
    }

    const category = primaryCategory(issues);
    const severity = aggregateSeverity(issues, profile);
    const ageAppropriate = isAgeAppropriate(issues, profile);
    const flags = uniqueTypes(issues);

    const result = freezeResult({
      safe: false,
      score: safetyScore(issues.length),
      flags,
      category,
      severity,
      ageAppropriate,
      band,
      redirect: resolveRedirect(this.policy.redirects, category, band, this.pickPhrase),
      educationalRedirect: resolveEducationalRedirect(
        this.policy.redirects,
        category,
        this.pickPhrase,
      ),
      parentAlert: severity >= SeverityLevel.MODERATE || !ageAppropriate,
      issues,
      details: {
        onTopic: topics.length > 0,
        topics,
        issueCount: issues.length,
        filterStrictness: profile.filterStrictness,
      },
    });

    this.logger.warn(
      { category, severity, flags, band, issueCount: issues.length },
      "unsafe content detected",
    );
    return result;
  }

  private safeResult(band: AgeBand, details: Record<string, unknown>): SafetyResult {
    return freezeResult({
      safe: true,
      score: 1,
      flags: [],
      category: SafetyCategory.SAFE,
      severity: SeverityLevel.NONE,
      ageAppropriate: true,
      band,
      redirect: null,
      educationalRedirect: null,
      parentAlert: false,
      issues: [],
      details,
    });
  }

  private failWithError(band: AgeBand | null, err: unknown): SafetyResult {
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(
      { band, err: err instanceof Error ? { name: err.name, message } : err },
      "safety evaluation failed; treating content as unsafe",
    );
    return this.failClosed(band, "evaluation_error", { error: message });
  }

  private failClosed(
    band: AgeBand | null,
    flag: string,
    details: Record<string, unknown>,
  ): SafetyResult {
    return freezeResult({
      safe: false,
      score: 0,
      flags: [flag],
      category: SafetyCategory.OFF_TOPIC,
      severity: SeverityLevel.CRITICAL,
      ageAppropriate: false,
      band,
      // The injected picker is bypassed here: it may be what failed.
      redirect: genericRedirect(this.policy.redirects, band, firstPhrase),
      educationalRedirect: null,
      parentAlert: true,
      issues: [],
      details,
    });
  }
}

function uniqueTypes(issues: readonly SafetyIssue[]): string[] {
  return [...new Set(issues.map((i) => i.type))];
}

function freezeResult(result: SafetyResult): SafetyResult {
  Object.freeze(result.flags);
  Object.freeze(result.issues);
  for (const issue of result.issues) Object.freeze(issue);
  Object.freeze(result.details);
  return Object.freeze(result);
}
