// ---------------------------------------------------------------------------
// Pipeline orchestrator.
// Runs the configured stages in order for one conversation turn. The safety
// gate always runs first and is the only stage that can halt the turn.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { PipelineStatus } from "../core/types.js";
import type {
  PipelineConfig,
  PipelineContext,
  SafetyGateStage,
  StageReport,
  TransformStage,
  TurnOutcome,
} from "../core/types.js";
import { ConfigurationError, StageExecutionError } from "../core/errors.js";
import type { StageRegistry } from "../core/stage-registry.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

interface SessionState {
  status: PipelineStatus;
  updatedAt: number;
}

export interface PipelineOrchestratorOptions {
  registry: StageRegistry;
  config: PipelineConfig;
  /** Response used when the gate itself fails; the turn is then blocked. */
  blockedResponse: (context: PipelineContext) => string;
  logger: pino.Logger;
  metrics?: MetricsCollector;
  now?: () => number;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function cloneContext(context: PipelineContext): PipelineContext {
  return {
    ...context,
    safetyFlags: [...context.safetyFlags],
    metadata: { ...context.metadata },
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * What a stage is allowed to do to the context: leave `inputText` alone and
 * only append to `safetyFlags`. Returns the violation, or null.
 */
function contractViolation(
  before: PipelineContext,
  after: PipelineContext,
): string | null {
  if (after.inputText !== before.inputText) {
    return "stage modified inputText";
  }
  if (after.sessionId !== before.sessionId) {
    return "stage modified sessionId";
  }
  const flags = after.safetyFlags;
  if (
    flags.length < before.safetyFlags.length ||
    before.safetyFlags.some((flag, i) => flags[i] !== flag)
  ) {
    return "stage removed or reordered safety flags";
  }
  return null;
}

// ── Orchestrator ────────────────────────────────────────────────────────────

export class PipelineOrchestrator {
  private readonly sessions = new Map<string, SessionState>();
  private readonly gate: SafetyGateStage;
  private readonly transforms: TransformStage[];
  private readonly blockedResponse: (context: PipelineContext) => string;
  private readonly logger: pino.Logger;
  private readonly metrics: MetricsCollector | undefined;
  private readonly now: () => number;
  private readonly allStages: (SafetyGateStage | TransformStage)[];

  constructor(options: PipelineOrchestratorOptions) {
    const { registry, config } = options;
    this.blockedResponse = options.blockedResponse;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;

    const seen = new Set<string>();
    for (const name of config.order) {
      if (seen.has(name)) {
        throw new ConfigurationError(`Pipeline order lists stage "${name}" twice`);
      }
      seen.add(name);
      if (!registry.has(name)) {
        throw new ConfigurationError(`Pipeline order names unregistered stage "${name}"`);
      }
    }

    if (config.order[0] !== config.safetyStage) {
      throw new ConfigurationError(
        `Safety stage "${config.safetyStage}" must run first in the pipeline`,
      );
    }

    const gate = registry.get(config.safetyStage);
    if (gate === null || gate.kind !== "gate") {
      throw new ConfigurationError(
        `Stage "${config.safetyStage}" is not a safety gate`,
      );
    }
    this.gate = gate;

    this.transforms = [];
    for (const name of config.order.slice(1)) {
      const stage = registry.get(name);
      if (stage === null || stage.kind !== "transform") {
        throw new ConfigurationError(
          `Stage "${name}" cannot run after the safety gate`,
        );
      }
      this.transforms.push(stage);
    }

    this.allStages = [this.gate, ...this.transforms];
  }

  // ── Turn processing ───────────────────────────────────────────────────

  /**
   * Run one turn. A blocked turn resolves with the redirect as its
   * response; a failing non-gate stage rejects with
   * {@link StageExecutionError} and discards the partial response.
   */
  async process(input: PipelineContext): Promise<TurnOutcome> {
    const { sessionId } = input;
    const turnStart = this.now();
    const stages: Record<string, StageReport> = {};
    const log = this.logger.child({ sessionId });

    this.setStatus(sessionId, PipelineStatus.PROCESSING);

    let context = cloneContext(input);

    // ── Safety gate ──
    const gateStart = this.now();
    let safe: boolean;
    try {
      const before = cloneContext(context);
      const outcome = await this.gate.apply(cloneContext(context));
      const violation = contractViolation(before, outcome.context);
      if (violation !== null) {
        throw new StageExecutionError(this.gate.name, sessionId, violation);
      }
      context = outcome.context;
      safe = outcome.safe;
      stages[this.gate.name] = { durationMs: this.now() - gateStart, safe };
      this.metrics?.recordStage(this.gate.name, this.now() - gateStart, false);
    } catch (err) {
      const durationMs = this.now() - gateStart;
      log.error(
        { stage: this.gate.name, err: errorMessage(err) },
        "safety gate failed; blocking turn",
      );
      stages[this.gate.name] = { durationMs, safe: false, error: errorMessage(err) };
      this.metrics?.recordStage(this.gate.name, durationMs, true);
      return this.finish(
        sessionId,
        PipelineStatus.SAFETY_BLOCKED,
        this.blockedResponse(input),
        stages,
        turnStart,
      );
    }

    if (!safe) {
      const response =
        context.responseText.trim().length > 0
          ? context.responseText
          : this.blockedResponse(input);
      log.info({ flags: context.safetyFlags }, "turn blocked by safety gate");
      return this.finish(sessionId, PipelineStatus.SAFETY_BLOCKED, response, stages, turnStart);
    }

    // ── Remaining stages ──
    for (const stage of this.transforms) {
      const start = this.now();
      try {
        const before = cloneContext(context);
        const next = await stage.apply(cloneContext(context));
        const violation = contractViolation(before, next);
        if (violation !== null) {
          throw new StageExecutionError(stage.name, sessionId, violation);
        }
        context = next;
        stages[stage.name] = { durationMs: this.now() - start };
        this.metrics?.recordStage(stage.name, this.now() - start, false);
      } catch (err) {
        const durationMs = this.now() - start;
        stages[stage.name] = { durationMs, error: errorMessage(err) };
        this.metrics?.recordStage(stage.name, durationMs, true);
        this.setStatus(sessionId, PipelineStatus.ERROR);
        this.metrics?.recordTurn("error", this.now() - turnStart);
        log.error({ stage: stage.name, err: errorMessage(err) }, "pipeline stage failed");

        if (err instanceof StageExecutionError) throw err;
        throw new StageExecutionError(stage.name, sessionId, errorMessage(err), {
          cause: err,
        });
      }
    }

    return this.finish(
      sessionId,
      PipelineStatus.COMPLETED,
      context.responseText,
      stages,
      turnStart,
    );
  }

  // ── Session status ────────────────────────────────────────────────────

  /** Status of the session's latest turn; `idle` when unknown. */
  getSessionStatus(sessionId: string): PipelineStatus {
    return this.sessions.get(sessionId)?.status ?? PipelineStatus.IDLE;
  }

  /** Forget a session. Returns whether it was known. */
  cleanupSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Drop sessions idle for longer than `maxIdleMs`. Sessions with a turn in
   * flight are kept. Returns the number removed.
   */
  pruneSessions(maxIdleMs: number): number {
    const cutoff = this.now() - maxIdleMs;
    let removed = 0;
    for (const [id, state] of this.sessions) {
      if (state.status !== PipelineStatus.PROCESSING && state.updatedAt < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Close every stage that holds resources. */
  async shutdown(): Promise<void> {
    const results = await Promise.allSettled(
      this.allStages.map(async (stage) => {
        if (stage.close) await stage.close();
      }),
    );
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.logger.error(
          { stage: this.allStages[i]?.name, err: errorMessage(result.reason) },
          "stage failed to close",
        );
      }
    });
    this.sessions.clear();
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private setStatus(sessionId: string, status: PipelineStatus): void {
    this.sessions.set(sessionId, { status, updatedAt: this.now() });
  }

  private finish(
    sessionId: string,
    status: typeof PipelineStatus.COMPLETED | typeof PipelineStatus.SAFETY_BLOCKED,
    responseText: string,
    stages: Record<string, StageReport>,
    turnStart: number,
  ): TurnOutcome {
    const durationMs = this.now() - turnStart;
    this.setStatus(sessionId, status);
    this.metrics?.recordTurn(status, durationMs);
    this.logger.debug({ sessionId, status, durationMs }, "turn finished");
    return { responseText, status, stages };
  }
}
