// ---------------------------------------------------------------------------
// Step 5: residual scrub of links, contact details and large numbers.
// ---------------------------------------------------------------------------

// Trailing sentence punctuation stays outside the replaced span.
const URL = /\b(?:https?:\/\/|www\.)\S+?(?=[.,!?;:)]*(?:\s|$))/gi;
const EMAIL = /\b[\w.%+-]+@[\w.-]+\.[a-z]{2,}\b/gi;
const PHONE = /(?<![\w-])(?:\+?1[-.\s]?)?(?:\(\d{3}\)\s?|\d{3}[-.\s])\d{3}[-.\s]\d{4}(?![\w-])/g;
const NUMBER = /(?<![\w.,])(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?(?!\w|[.,]\d)/g;

export function scrubText(
  text: string,
  vagueNumbersAbove: number | null,
  vagueQuantity: string,
): string {
  let out = text
    .replace(EMAIL, "[email]")
    .replace(URL, "[link]")
    .replace(PHONE, "[phone]");

  if (vagueNumbersAbove !== null) {
    out = out.replace(NUMBER, (found) =>
      Number(found.replaceAll(",", "")) > vagueNumbersAbove ? vagueQuantity : found,
    );
  }
  return out;
}
