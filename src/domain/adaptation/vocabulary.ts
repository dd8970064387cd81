// ---------------------------------------------------------------------------
// Step 1: vocabulary substitution.
// ---------------------------------------------------------------------------

import type { VocabularyTable } from "../../core/types.js";
import { compileTermPattern } from "../../utils/text.js";

export interface CompiledVocabulary {
  readonly table: VocabularyTable;
  readonly pattern: RegExp;
}

export function compileVocabulary(table: VocabularyTable): CompiledVocabulary {
  return { table, pattern: compileTermPattern([...table.keys()]) };
}

/** Carry the first letter's case of `original` over to `replacement`. */
export function matchLeadingCase(original: string, replacement: string): string {
  const first = original.charAt(0);
  if (first !== first.toUpperCase() || first === first.toLowerCase()) {
    return replacement;
  }
  return replacement.charAt(0).toUpperCase() + replacement.slice(1);
}

/** Replace every listed word, on word boundaries. */
export function substituteVocabulary(text: string, vocab: CompiledVocabulary): string {
  return text.replace(vocab.pattern, (found) => {
    const replacement = vocab.table.get(found.toLowerCase().replace(/\s+/g, " "));
    return replacement === undefined ? found : matchLeadingCase(found, replacement);
  });
}
