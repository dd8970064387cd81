// ---------------------------------------------------------------------------
// Per-child turn budget: a fixed one-minute window of turns for each child
// profile, checked after the turn request is validated.
// ---------------------------------------------------------------------------

import type { TurnBudgetConfig } from "../core/types.js";
import { TurnBudgetExceededError } from "../core/errors.js";

const WINDOW_MS = 60_000;

interface TurnWindow {
  readonly startedAt: number;
  turns: number;
}

export class TurnBudget {
  private readonly windows = new Map<string, TurnWindow>();
  private lastSweep = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly config: TurnBudgetConfig,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Count one turn for `profileId`.
   *
   * @throws TurnBudgetExceededError once the profile's turns for the current
   *   window are spent. A refused turn is not counted.
   */
  consume(profileId: string): void {
    if (!this.config.enabled) return;

    const now = this.now();
    this.sweep(now);

    let window = this.windows.get(profileId);
    if (!window || now - window.startedAt >= WINDOW_MS) {
      window = { startedAt: now, turns: 0 };
      this.windows.set(profileId, window);
    }

    if (window.turns >= this.config.turnsPerMinute) {
      const retryAfterSeconds = Math.max(
        1,
        Math.ceil((window.startedAt + WINDOW_MS - now) / 1000),
      );
      throw new TurnBudgetExceededError(profileId, retryAfterSeconds);
    }
    window.turns++;
  }

  /** Profiles with an open window. */
  get trackedProfiles(): number {
    return this.windows.size;
  }

  // Expired windows are dropped at most once per window length.
  private sweep(now: number): void {
    if (now - this.lastSweep < WINDOW_MS) return;
    this.lastSweep = now;
    for (const [profileId, window] of this.windows) {
      if (now - window.startedAt >= WINDOW_MS) {
        this.windows.delete(profileId);
      }
    }
  }
}
