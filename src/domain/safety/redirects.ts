// ---------------------------------------------------------------------------
// Redirect phrase lookup.
// ---------------------------------------------------------------------------

import type {
  AgeBand,
  PhrasePicker,
  RedirectCatalogue,
  SafetyCategory,
} from "../../core/types.js";

/** Deterministic default: always the first phrase. */
export const firstPhrase: PhrasePicker = (phrases) => phrases[0] ?? "";

/**
 * Redirect for a category and band. Lookup order: category phrases for the
 * band, the category fallback, generic phrases for the band, the generic
 * fallback. `band` is null when the age could not be classified.
 */
export function resolveRedirect(
  catalogue: RedirectCatalogue,
  category: SafetyCategory,
  band: AgeBand | null,
  pick: PhrasePicker,
): string {
  const set = category === "safe" ? undefined : catalogue.byCategory[category];
  const phrases =
    (band !== null ? set?.byBand[band] : undefined) ??
    set?.fallback ??
    (band !== null ? catalogue.generic.byBand[band] : undefined) ??
    catalogue.generic.fallback;
  return pick(phrases);
}

/** Generic redirect, used when the category is unknown. */
export function genericRedirect(
  catalogue: RedirectCatalogue,
  band: AgeBand | null,
  pick: PhrasePicker,
): string {
  const phrases =
    (band !== null ? catalogue.generic.byBand[band] : undefined) ??
    catalogue.generic.fallback;
  return pick(phrases);
}

/** STEM suggestion for the category, when one is configured. */
export function resolveEducationalRedirect(
  catalogue: RedirectCatalogue,
  category: SafetyCategory,
  pick: PhrasePicker,
): string | null {
  if (category === "safe") return null;
  const phrases = catalogue.educational[category];
  return phrases && phrases.length > 0 ? pick(phrases) : null;
}
