// ---------------------------------------------------------------------------
// Pattern scanning: turns normalised text into a list of safety issues.
// ---------------------------------------------------------------------------

import type {
  AgeProfile,
  PatternCatalogue,
  SafetyIssue,
  SeverityLevel,
  ViolationCategory,
} from "../../core/types.js";
import { foldLookalikes, matchesAnywhere, symbolDensity } from "../../utils/text.js";

interface Matcher {
  readonly type: string;
  readonly category: ViolationCategory;
  readonly severity: SeverityLevel;
  readonly pattern: RegExp;
}

/** The text as written, and its look-alike folded copy of the same length. */
interface ScanViews {
  readonly raw: string;
  readonly folded: string;
}

/**
 * Occurrences in either view, ordered by offset. A match the folded view
 * finds at an offset the raw view already matched is the same occurrence.
 */
function collect(views: ScanViews, matcher: Matcher, into: SafetyIssue[]): void {
  const found = new Map<number, string>();
  for (const m of views.raw.matchAll(matcher.pattern)) {
    found.set(m.index ?? 0, m[0]);
  }
  if (views.folded !== views.raw) {
    for (const m of views.folded.matchAll(matcher.pattern)) {
      const at = m.index ?? 0;
      if (!found.has(at)) found.set(at, m[0]);
    }
  }

  const offsets = [...found.keys()].sort((a, b) => a - b);
  for (const at of offsets) {
    into.push({
      type: matcher.type,
      match: found.get(at) ?? "",
      severity: matcher.severity,
      category: matcher.category,
    });
  }
}

/**
 * Every occurrence of every applicable pattern, in scan order: blocked
 * topics, then term tables, then regex rules, then the symbol-density check.
 * Gated tables are skipped when the profile tolerates their content class.
 * Occurrences are not deduplicated.
 */
export function scanText(
  text: string,
  profile: AgeProfile,
  catalogue: PatternCatalogue,
): SafetyIssue[] {
  const views: ScanViews = { raw: text, folded: foldLookalikes(text) };
  const issues: SafetyIssue[] = [];

  for (const tag of profile.blockedTopics) {
    const topic = catalogue.topics.get(tag);
    if (topic) {
      collect(views, { ...topic, type: `topic:${tag}` }, issues);
    }
  }

  for (const table of catalogue.termTables) {
    if (table.gate !== null && profile.tolerance[table.gate]) continue;
    collect(views, { ...table, type: table.id }, issues);
  }

  for (const rule of catalogue.rules) {
    collect(views, { ...rule, type: rule.id }, issues);
  }

  const check = catalogue.symbolDensity;
  if (check) {
    const density = symbolDensity(text);
    if (density.length >= check.minLength && density.ratio > check.maxRatio) {
      issues.push({
        type: check.id,
        match: density.symbols.join(""),
        severity: check.severity,
        category: check.category,
      });
    }
  }

  return issues;
}

/** Allowed topic tags whose terms appear in the text. */
export function matchAllowedTopics(
  text: string,
  profile: AgeProfile,
  catalogue: PatternCatalogue,
): string[] {
  const found: string[] = [];
  for (const tag of profile.allowedTopics) {
    const pattern = catalogue.educationalTopics.get(tag);
    if (pattern && matchesAnywhere(pattern, text)) {
      found.push(tag);
    }
  }
  return found;
}
