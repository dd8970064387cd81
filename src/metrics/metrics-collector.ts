// ---------------------------------------------------------------------------
// In-memory metrics collection for safety checks, pipeline stages and turns.
// ---------------------------------------------------------------------------

import type {
  MetricsConfig,
  SafetyCategory,
  SafetyResult,
  ViolationCategory,
} from "../core/types.js";
import type pino from "pino";

// ── Per-stage metrics ───────────────────────────────────────────────────────

interface StageMetrics {
  stage: string;
  invocations: number;
  failureCount: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

// ── Safety metrics ──────────────────────────────────────────────────────────

interface SafetyMetrics {
  totalChecks: number;
  blockedCount: number;
  redirectCount: number;
  parentAlerts: number;
  byCategory: Partial<Record<ViolationCategory, number>>;
}

// ── Turn metrics ────────────────────────────────────────────────────────────

interface TurnMetrics {
  totalTurns: number;
  completedTurns: number;
  blockedTurns: number;
  failedTurns: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

/** How a pipeline turn ended. */
export type TurnResultKind = "completed" | "safety_blocked" | "error";

/** Immutable snapshot of all metrics at a point in time. */
export interface MetricsSnapshot {
  stages: ReadonlyMap<string, Readonly<StageMetrics>>;
  safety: Readonly<SafetyMetrics> & { blockRate: number };
  turns: Readonly<TurnMetrics>;
  collectedAt: string;
}

/**
 * Collects in-memory metrics for safety checks, stages and turns.
 *
 * Optionally logs a periodic report at a configurable interval.
 */
export class MetricsCollector {
  private readonly stageMetrics = new Map<string, StageMetrics>();
  private readonly safetyMetrics: SafetyMetrics = {
    totalChecks: 0,
    blockedCount: 0,
    redirectCount: 0,
    parentAlerts: 0,
    byCategory: {},
  };
  private readonly turnMetrics: TurnMetrics = {
    totalTurns: 0,
    completedTurns: 0,
    blockedTurns: 0,
    failedTurns: 0,
    totalDurationMs: 0,
    minDurationMs: Infinity,
    maxDurationMs: 0,
  };

  private reportTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly config: MetricsConfig,
    private readonly logger?: pino.Logger,
  ) {
    if (config.enabled && config.reportIntervalMs > 0 && logger) {
      this.reportTimer = setInterval(() => {
        this.logReport();
      }, config.reportIntervalMs);

      // Allow the process to exit even if the timer is still running.
      this.reportTimer.unref();
    }
  }

  // ── Safety metrics ──────────────────────────────────────────────────────

  recordSafetyCheck(result: SafetyResult): void {
    if (!this.config.enabled) return;
    const s = this.safetyMetrics;

    s.totalChecks++;
    if (result.safe) return;

    s.blockedCount++;
    if (result.redirect !== null) s.redirectCount++;
    if (result.parentAlert) s.parentAlerts++;

    const category = asViolation(result.category);
    if (category !== null) {
      s.byCategory[category] = (s.byCategory[category] ?? 0) + 1;
    }
  }

  // ── Stage metrics ───────────────────────────────────────────────────────

  recordStage(stage: string, durationMs: number, failed: boolean): void {
    if (!this.config.enabled) return;
    let m = this.stageMetrics.get(stage);

    if (!m) {
      m = {
        stage,
        invocations: 0,
        failureCount: 0,
        totalDurationMs: 0,
        minDurationMs: Infinity,
        maxDurationMs: 0,
      };
      this.stageMetrics.set(stage, m);
    }

    m.invocations++;
    m.totalDurationMs += durationMs;
    if (failed) m.failureCount++;

    if (durationMs < m.minDurationMs) m.minDurationMs = durationMs;
    if (durationMs > m.maxDurationMs) m.maxDurationMs = durationMs;
  }

  // ── Turn metrics ────────────────────────────────────────────────────────

  recordTurn(outcome: TurnResultKind, durationMs: number): void {
    if (!this.config.enabled) return;
    const t = this.turnMetrics;

    t.totalTurns++;
    t.totalDurationMs += durationMs;

    if (durationMs < t.minDurationMs) t.minDurationMs = durationMs;
    if (durationMs > t.maxDurationMs) t.maxDurationMs = durationMs;

    switch (outcome) {
      case "completed":
        t.completedTurns++;
        break;
      case "safety_blocked":
        t.blockedTurns++;
        break;
      case "error":
        t.failedTurns++;
        break;
    }
  }

  // ── Snapshot ────────────────────────────────────────────────────────────

  snapshot(): MetricsSnapshot {
    const stagesCopy = new Map<string, StageMetrics>();
    for (const [key, value] of this.stageMetrics) {
      stagesCopy.set(key, { ...value });
    }

    const s = this.safetyMetrics;
    return {
      stages: stagesCopy,
      safety: {
        ...s,
        byCategory: { ...s.byCategory },
        blockRate: s.totalChecks === 0 ? 0 : s.blockedCount / s.totalChecks,
      },
      turns: { ...this.turnMetrics },
      collectedAt: new Date().toISOString(),
    };
  }

  /** Snapshot with the stage map flattened, for JSON responses and logs. */
  toJSON(): Record<string, unknown> {
    const snap = this.snapshot();
    const stages: Record<string, StageMetrics> = {};
    for (const [key, value] of snap.stages) {
      stages[key] = value;
    }
    return {
      stages,
      safety: snap.safety,
      turns: snap.turns,
      collectedAt: snap.collectedAt,
    };
  }

  // ── Periodic report ─────────────────────────────────────────────────────

  private logReport(): void {
    if (!this.logger) return;
    this.logger.info({ metrics: this.toJSON() }, "periodic metrics report");
  }

  // ── Cleanup ─────────────────────────────────────────────────────────────

  dispose(): void {
    if (this.reportTimer !== null) {
      clearInterval(this.reportTimer);
      this.reportTimer = null;
    }
  }
}

function asViolation(category: SafetyCategory): ViolationCategory | null {
  return category === "safe" ? null : category;
}
