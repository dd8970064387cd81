// ---------------------------------------------------------------------------
// Step 3: length enforcement.
// ---------------------------------------------------------------------------

import { countWords, words } from "../../utils/text.js";
import { splitSentences } from "./sentences.js";

/** Share of the limit sentence-boundary truncation must keep to be used. */
export const SENTENCE_KEEP_RATIO = 0.7;

export const ELLIPSIS = "...";

/**
 * Cut `text` down to `limit` words. Whole sentences are kept when they add
 * up to at least 70% of the limit; otherwise the text is cut mid-sentence
 * and ends with an ellipsis and the continuation prompt, which together
 * still fit within `limit`.
 */
export function truncateToLimit(
  text: string,
  limit: number,
  continuation: string,
): string {
  if (countWords(text) <= limit) return text;

  const kept: string[] = [];
  let keptWords = 0;
  for (const sentence of splitSentences(text)) {
    const n = countWords(sentence);
    if (keptWords + n > limit) break;
    kept.push(sentence);
    keptWords += n;
  }

  if (kept.length > 0 && keptWords >= limit * SENTENCE_KEEP_RATIO) {
    return kept.join(" ");
  }

  const budget = Math.max(1, limit - countWords(continuation));
  const head = words(text)
    .slice(0, budget)
    .join(" ")
    .replace(/[\s.,;:!?-]+$/, "");
  return `${head}${ELLIPSIS} ${continuation}`;
}
