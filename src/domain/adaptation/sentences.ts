// ---------------------------------------------------------------------------
// Step 2: sentence restructuring.
// ---------------------------------------------------------------------------

import { SentenceComplexity } from "../../core/types.js";

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const TERMINATOR = /[.!?]+$/;
/** Captures the delimiter so it can be kept when clauses are regrouped. */
const CLAUSE_BOUNDARY = /(,\s+|\s+(?:and|but)\s+)/i;

/** Sentences with their terminators, split after `.`, `!` or `?`. */
export function splitSentences(text: string): string[] {
  return text
    .trim()
    .split(SENTENCE_BOUNDARY)
    .filter((s) => s.length > 0);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

interface Clauses {
  clauses: string[];
  delimiters: string[];
  terminator: string;
}

function splitClauses(sentence: string): Clauses | null {
  const terminator = TERMINATOR.exec(sentence)?.[0] ?? "";
  const body = sentence.slice(0, sentence.length - terminator.length);
  const parts = body.split(CLAUSE_BOUNDARY);

  const clauses: string[] = [];
  const delimiters: string[] = [];
  parts.forEach((part, i) => (i % 2 === 0 ? clauses : delimiters).push(part));

  if (clauses.length < 2 || clauses.some((c) => c.trim().length === 0)) {
    return null;
  }
  return { clauses, delimiters, terminator };
}

/** One sentence per clause. */
function simplify(sentence: string): string {
  const split = splitClauses(sentence);
  if (!split) return sentence;
  const last = split.clauses.length - 1;
  return split.clauses
    .map((c, i) => capitalize(c.trim()) + (i === last ? split.terminator || "." : "."))
    .join(" ");
}

/** At most two clauses per sentence. */
function pairClauses(sentence: string): string {
  const split = splitClauses(sentence);
  if (!split || split.clauses.length <= 2) return sentence;

  const { clauses, delimiters, terminator } = split;
  const out: string[] = [];
  for (let i = 0; i < clauses.length; i += 2) {
    let group = clauses[i] ?? "";
    if (i + 1 < clauses.length) {
      group += (delimiters[i] ?? " ") + (clauses[i + 1] ?? "");
    }
    const isLast = i + 2 >= clauses.length;
    out.push(capitalize(group.trim()) + (isLast ? terminator || "." : "."));
  }
  return out.join(" ");
}

export function restructure(text: string, complexity: SentenceComplexity): string {
  switch (complexity) {
    case SentenceComplexity.SIMPLE:
      return splitSentences(text).map(simplify).join(" ");
    case SentenceComplexity.COMPOUND:
      return splitSentences(text).map(pairClauses).join(" ");
    case SentenceComplexity.COMPLEX:
    case SentenceComplexity.SOPHISTICATED:
      return text;
  }
}
