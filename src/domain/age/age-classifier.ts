// ---------------------------------------------------------------------------
// Age classification: the one table of age-band boundaries in the service.
// ---------------------------------------------------------------------------

import { AgeBand, MAX_AGE, MIN_AGE } from "../../core/types.js";
import type { AgeRange } from "../../core/types.js";
import { InvalidAgeError } from "../../core/errors.js";

export { MAX_AGE, MIN_AGE };

/** Inclusive bounds per band. Contiguous, disjoint, covering MIN_AGE..MAX_AGE. */
const BAND_RANGES: Readonly<Record<AgeBand, AgeRange>> = Object.freeze({
  [AgeBand.TODDLER]: Object.freeze({ min: 2, max: 4 }),
  [AgeBand.PRESCHOOL]: Object.freeze({ min: 5, max: 6 }),
  [AgeBand.EARLY_ELEMENTARY]: Object.freeze({ min: 7, max: 8 }),
  [AgeBand.LATE_ELEMENTARY]: Object.freeze({ min: 9, max: 10 }),
  [AgeBand.MIDDLE]: Object.freeze({ min: 11, max: 13 }),
  [AgeBand.HIGH]: Object.freeze({ min: 14, max: 17 }),
  [AgeBand.ADULT]: Object.freeze({ min: 18, max: 18 }),
});

/** Every band, youngest first. */
export const AGE_BANDS: readonly AgeBand[] = Object.freeze([
  AgeBand.TODDLER,
  AgeBand.PRESCHOOL,
  AgeBand.EARLY_ELEMENTARY,
  AgeBand.LATE_ELEMENTARY,
  AgeBand.MIDDLE,
  AgeBand.HIGH,
  AgeBand.ADULT,
]);

/**
 * Map an age to its band.
 *
 * Throws {@link InvalidAgeError} for anything that is not an integer in
 * [MIN_AGE, MAX_AGE]. There is no nearest-band fallback.
 */
export function classifyAge(age: number): AgeBand {
  if (!Number.isInteger(age) || age < MIN_AGE || age > MAX_AGE) {
    throw new InvalidAgeError(age);
  }

  for (const band of AGE_BANDS) {
    const range = BAND_RANGES[band];
    if (age >= range.min && age <= range.max) {
      return band;
    }
  }

  // Unreachable while BAND_RANGES covers MIN_AGE..MAX_AGE.
  throw new InvalidAgeError(age);
}

/** Like {@link classifyAge}, but `null` instead of throwing. */
export function findAgeBand(age: number): AgeBand | null {
  if (!Number.isInteger(age) || age < MIN_AGE || age > MAX_AGE) return null;
  return classifyAge(age);
}

/** Inclusive bounds of a band. */
export function rangeOf(band: AgeBand): AgeRange {
  return BAND_RANGES[band];
}

/** Position of a band in the youngest-first ordering. */
export function bandIndex(band: AgeBand): number {
  return AGE_BANDS.indexOf(band);
}

/** True when `a` covers strictly younger ages than `b`. */
export function isYoungerThan(a: AgeBand, b: AgeBand): boolean {
  return bandIndex(a) < bandIndex(b);
}

/** Type guard for untrusted band names (config files, query strings). */
export function isAgeBand(value: string): value is AgeBand {
  return (AGE_BANDS as readonly string[]).includes(value);
}
