// ---------------------------------------------------------------------------
// Small text helpers shared by the policy loader, the safety engine and the
// age adapter.
// ---------------------------------------------------------------------------

const REGEXP_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegExp(value: string): string {
  return value.replace(REGEXP_SPECIALS, "\\$&");
}

/**
 * Compile a word list into one case-insensitive, global expression matched on
 * word boundaries. Longer terms are tried first so "shut up" wins over "shut".
 * Inner whitespace in a term matches any run of whitespace.
 */
export function compileTermPattern(terms: readonly string[]): RegExp {
  const alternatives = [...new Set(terms.map((t) => t.trim().toLowerCase()))]
    .filter((t) => t.length > 0)
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map((t) => escapeRegExp(t).replace(/\s+/g, "\\s+"));

  if (alternatives.length === 0) {
    // Never matches.
    return /(?!)/g;
  }
  return new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "gi");
}

/**
 * Unicode-normalise text before matching: NFKC folds full-width and
 * compatibility forms, invisible format characters (zero-width spaces and
 * joiners, bidi marks) are removed, and typographic quotes become ASCII.
 */
export function normalizeText(text: string): string {
  return text
    .normalize("NFKC")
    .replace(/\p{Cf}/gu, "")
    .replace(/[‘’‚‛′]/g, "'")
    .replace(/[“”„‟″]/g, '"');
}

const LOOKALIKES: ReadonlyMap<string, string> = new Map([
  ["0", "o"],
  ["1", "i"],
  ["3", "e"],
  ["4", "a"],
  ["5", "s"],
  ["7", "t"],
  ["8", "b"],
  ["@", "a"],
  ["$", "s"],
]);

/**
 * Leetspeak view of `text`: look-alike digits and symbols become letters and
 * any other symbol becomes a space. The result has the same length, so match
 * offsets line up with the input.
 */
export function foldLookalikes(text: string): string {
  return text.replace(
    /[^\p{L}\p{M}\s269]/gu,
    (ch) => LOOKALIKES.get(ch) ?? " ".repeat(ch.length),
  );
}

/** Symbols that are not everyday punctuation or arithmetic. */
const UNUSUAL_SYMBOL = /[^\p{L}\p{M}\p{N}\s.,!?'"()+\-*/=%:;]/gu;

export interface SymbolDensity {
  readonly symbols: string[];
  /** Non-space characters, counted by code point. */
  readonly length: number;
  readonly ratio: number;
}

export function symbolDensity(text: string): SymbolDensity {
  const length = Array.from(text.replace(/\s+/g, "")).length;
  const symbols = text.match(UNUSUAL_SYMBOL) ?? [];
  return { symbols, length, ratio: length === 0 ? 0 : symbols.length / length };
}

/** The first `max` code points; surrogate pairs are never split. */
export function truncateCodePoints(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join("");
}

/** Whitespace-separated tokens. */
export function words(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

export function countWords(text: string): number {
  return words(text).length;
}

/** True when `pattern` matches anywhere in `text`. Resets `lastIndex`. */
export function matchesAnywhere(pattern: RegExp, text: string): boolean {
  pattern.lastIndex = 0;
  const found = pattern.test(text);
  pattern.lastIndex = 0;
  return found;
}
