// ---------------------------------------------------------------------------
// Incident store: persisted record of every blocked turn, for parent review.
// ---------------------------------------------------------------------------

import type { IncidentQuery, SafetyIncident } from "../core/types.js";
import { truncateCodePoints } from "../utils/text.js";

/** Longest input excerpt kept with an incident. */
export const MAX_INCIDENT_INPUT_CHARS = 500;

export const DEFAULT_INCIDENT_LIMIT = 100;

export interface IncidentStore {
  record(incident: SafetyIncident): Promise<void>;
  /** Newest first, optionally bounded by time. */
  findByChild(childId: string, query?: IncidentQuery): Promise<SafetyIncident[]>;
  close(): Promise<void>;
}

/**
 * Copy of the incident as it is persisted: input cut to 500 characters,
 * counted by code point as the `VARCHAR(500)` column counts them.
 */
export function toStoredIncident(incident: SafetyIncident): SafetyIncident {
  return {
    ...incident,
    inputText: truncateCodePoints(incident.inputText, MAX_INCIDENT_INPUT_CHARS),
    flags: [...incident.flags],
  };
}

// ── In-memory implementation ────────────────────────────────────────────────

/**
 * Process-local store for development and tests. Contents are lost on
 * restart.
 */
export class InMemoryIncidentStore implements IncidentStore {
  private readonly incidents: SafetyIncident[] = [];

  async record(incident: SafetyIncident): Promise<void> {
    this.incidents.push(toStoredIncident(incident));
  }

  async findByChild(
    childId: string,
    query: IncidentQuery = {},
  ): Promise<SafetyIncident[]> {
    const from = query.from?.getTime() ?? -Infinity;
    const to = query.to?.getTime() ?? Infinity;
    const limit = query.limit ?? DEFAULT_INCIDENT_LIMIT;

    return this.incidents
      .filter((i) => {
        if (i.childId !== childId) return false;
        const at = Date.parse(i.timestamp);
        return at >= from && at <= to;
      })
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
      .slice(0, limit)
      .map((i) => ({ ...i, flags: [...i.flags] }));
  }

  get size(): number {
    return this.incidents.length;
  }

  async close(): Promise<void> {
    this.incidents.length = 0;
  }
}
