// ---------------------------------------------------------------------------
// Category priority and severity aggregation.
// ---------------------------------------------------------------------------

import { SafetyCategory, SeverityLevel } from "../../core/types.js";
import type { AgeProfile, SafetyIssue, ViolationCategory } from "../../core/types.js";

/** Lower number wins. Exhaustive over every violation category. */
export const CATEGORY_PRIORITY: Readonly<Record<ViolationCategory, number>> =
  Object.freeze({
    violence: 0,
    inappropriate: 1,
    personal_info: 2,
    dangerous: 3,
    scary: 4,
    bullying: 5,
    medical: 6,
    commercial: 7,
    profanity: 8,
    off_topic: 9,
  });

/** Highest-priority category among the issues; `safe` when there are none. */
export function primaryCategory(issues: readonly SafetyIssue[]): SafetyCategory {
  let best: ViolationCategory | null = null;
  for (const issue of issues) {
    if (best === null || CATEGORY_PRIORITY[issue.category] < CATEGORY_PRIORITY[best]) {
      best = issue.category;
    }
  }
  return best ?? SafetyCategory.SAFE;
}

function toSeverity(value: number): SeverityLevel {
  if (value <= SeverityLevel.NONE) return SeverityLevel.NONE;
  if (value === SeverityLevel.MINOR) return SeverityLevel.MINOR;
  if (value === SeverityLevel.MODERATE) return SeverityLevel.MODERATE;
  if (value === SeverityLevel.SEVERE) return SeverityLevel.SEVERE;
  return SeverityLevel.CRITICAL;
}

/**
 * Worst base severity plus the band's boost, capped at critical.
 */
export function aggregateSeverity(
  issues: readonly SafetyIssue[],
  profile: AgeProfile,
): SeverityLevel {
  if (issues.length === 0) return SeverityLevel.NONE;
  const worst = Math.max(...issues.map((i) => i.severity));
  return toSeverity(Math.min(SeverityLevel.CRITICAL, worst + profile.severityBoost));
}

/**
 * Whether the band may see content carrying these issues. Anything with a
 * critical issue never is.
 */
export function isAgeAppropriate(
  issues: readonly SafetyIssue[],
  profile: AgeProfile,
): boolean {
  const { maxIssues, maxSeverity } = profile.issueTolerance;
  if (issues.length > maxIssues) return false;
  return issues.every(
    (i) => i.severity < SeverityLevel.CRITICAL && i.severity <= maxSeverity,
  );
}

/** `max(0, 1 - 0.2 * count)`, two decimals. */
export function safetyScore(issueCount: number): number {
  return Math.round(Math.max(0, 1 - 0.2 * issueCount) * 100) / 100;
}

