// ---------------------------------------------------------------------------
// Step 4: engagement (greeting and follow-up question).
// ---------------------------------------------------------------------------

import type { EngagementPhrases, PhrasePicker } from "../../core/types.js";
import { countWords, escapeRegExp } from "../../utils/text.js";

export function fillName(template: string, name: string): string {
  return template.replaceAll("{name}", name);
}

/** The name as it reads inside whitespace-collapsed text. */
function cleanName(name: string): string {
  return name.replace(/\s+/g, " ").trim();
}

export interface GreetingSplit {
  readonly greeting: string;
  readonly rest: string;
}

/**
 * Separates a leading greeting for `name` from the text after it, or null when
 * the text does not open with one of the configured greetings.
 */
export function splitGreeting(
  text: string,
  name: string,
  phrases: EngagementPhrases,
): GreetingSplit | null {
  const cleaned = cleanName(name);
  if (cleaned.length === 0) return null;
  for (const template of phrases.greetings) {
    const greeting = fillName(template, cleaned);
    if (text.startsWith(`${greeting} `) && text.length > greeting.length + 1) {
      return { greeting, rest: text.slice(greeting.length + 1) };
    }
  }
  return null;
}

/** True when the name already appears in the text as a whole word. */
export function mentionsName(text: string, name: string): boolean {
  return new RegExp(`(?<![\\w-])${escapeRegExp(name)}(?![\\w-])`, "i").test(text);
}

export function endsWithQuestion(text: string): boolean {
  return text.trimEnd().endsWith("?");
}

/** Greeting to prepend, or null when there is no name or it is already used. */
export function planGreeting(
  text: string,
  name: string,
  phrases: EngagementPhrases,
  pick: PhrasePicker,
): string | null {
  const cleaned = cleanName(name);
  if (cleaned.length === 0 || mentionsName(text, cleaned)) return null;
  return fillName(pick(phrases.greetings), cleaned);
}

/** Longest greeting for this name, in words. */
export function maxGreetingWords(name: string, phrases: EngagementPhrases): number {
  return Math.max(0, ...phrases.greetings.map((g) => countWords(fillName(g, cleanName(name)))));
}

export function maxFollowUpWords(phrases: EngagementPhrases): number {
  return Math.max(0, ...phrases.followUps.map(countWords));
}

export function addEngagement(
  text: string,
  greeting: string | null,
  followUp: string | null,
): string {
  let out = text;
  if (followUp !== null && !endsWithQuestion(out)) {
    out = `${out} ${followUp}`;
  }
  if (greeting !== null) {
    out = `${greeting} ${out}`;
  }
  return out;
}
