// ---------------------------------------------------------------------------
// content_filter: the safety gate.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  GateOutcome,
  PipelineContext,
  SafetyGateStage,
  SafetyIncident,
  SafetyResult,
} from "../../core/types.js";
import type { SafetyEngine } from "../../domain/safety/safety-engine.js";
import type { IncidentStore } from "../../storage/incident-store.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";
import { SAFETY_METADATA_KEY } from "./safety-verdict.js";
import type { SafetyVerdict } from "./safety-verdict.js";

export interface ContentFilterStageOptions {
  engine: SafetyEngine;
  incidents: IncidentStore;
  logger: pino.Logger;
  metrics?: MetricsCollector;
  newId?: () => string;
  clock?: () => Date;
}

/**
 * Evaluates the child's input and, when present, the drafted response.
 * The first unsafe verdict blocks the turn: the redirect replaces the
 * response and an incident is recorded for the parent dashboard.
 */
export class ContentFilterStage implements SafetyGateStage {
  readonly kind = "gate";
  readonly name = "content_filter";

  private readonly engine: SafetyEngine;
  private readonly incidents: IncidentStore;
  private readonly logger: pino.Logger;
  private readonly metrics: MetricsCollector | undefined;
  private readonly newId: () => string;
  private readonly clock: () => Date;

  constructor(options: ContentFilterStageOptions) {
    this.engine = options.engine;
    this.incidents = options.incidents;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.newId = options.newId ?? (() => crypto.randomUUID());
    this.clock = options.clock ?? (() => new Date());
  }

  async apply(context: PipelineContext): Promise<GateOutcome> {
    let result = this.check(context.inputText, context.childAge);
    let source: SafetyVerdict["source"] = "input";

    if (result.safe && context.responseText.trim().length > 0) {
      const responseResult = this.check(context.responseText, context.childAge);
      if (!responseResult.safe) {
        result = responseResult;
        source = "response";
      }
    }

    const verdict: SafetyVerdict = {
      safe: result.safe,
      source,
      category: result.category,
      severity: result.severity,
      score: result.score,
      ageAppropriate: result.ageAppropriate,
      parentAlert: result.parentAlert,
      band: result.band,
      educationalRedirect: result.educationalRedirect,
      onTopic: result.details["onTopic"] === true,
    };

    const next: PipelineContext = {
      ...context,
      safetyFlags: [...context.safetyFlags, ...result.flags],
      metadata: { ...context.metadata, [SAFETY_METADATA_KEY]: verdict },
    };

    if (result.safe) {
      return { safe: true, context: next };
    }

    next.responseText = result.redirect ?? this.engine.genericRedirect(result.band);
    next.metadata["incidentPersisted"] = await this.recordIncident(context, result);

    return { safe: false, context: next };
  }

  async close(): Promise<void> {
    await this.incidents.close();
  }

  private check(text: string, age: number): SafetyResult {
    const result = this.engine.evaluate(text, age);
    this.metrics?.recordSafetyCheck(result);
    return result;
  }

  /** Store failures are logged and reported, never thrown. */
  private async recordIncident(
    context: PipelineContext,
    result: SafetyResult,
  ): Promise<boolean> {
    const incident: SafetyIncident = {
      id: this.newId(),
      timestamp: this.clock().toISOString(),
      childId: context.profileId,
      childAge: context.childAge,
      sessionId: context.sessionId,
      inputText: context.inputText,
      category: result.category,
      severity: result.severity,
      actionTaken: "blocked_and_redirected",
      parentNotified: result.parentAlert,
      flags: [...result.flags],
    };

    try {
      await this.incidents.record(incident);
    } catch (err) {
      this.logger.error(
        {
          sessionId: context.sessionId,
          incidentId: incident.id,
          err: err instanceof Error ? err.message : String(err),
        },
        "failed to persist safety incident",
      );
      return false;
    }

    this.logger.warn(
      {
        sessionId: context.sessionId,
        incidentId: incident.id,
        category: incident.category,
        severity: incident.severity,
        parentNotified: incident.parentNotified,
      },
      "safety incident recorded",
    );
    return true;
  }
}
