// ---------------------------------------------------------------------------
// parent_logger: per-turn summary for the parent dashboard.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { PipelineContext, TransformStage } from "../../core/types.js";
import { countWords } from "../../utils/text.js";
import { readSafetyVerdict } from "./safety-verdict.js";

export interface ParentSummary {
  sessionId: string;
  profileId: string;
  childAge: number;
  timestamp: string;
  flags: string[];
  category: string | null;
  onTopic: boolean;
  responseWords: number;
}

export class ParentLoggerStage implements TransformStage {
  readonly kind = "transform";
  readonly name = "parent_logger";

  /** `logger` is expected to be the `parent-log` child logger. */
  constructor(private readonly logger: pino.Logger) {}

  async apply(context: PipelineContext): Promise<PipelineContext> {
    const verdict = readSafetyVerdict(context.metadata);
    const summary: ParentSummary = {
      sessionId: context.sessionId,
      profileId: context.profileId,
      childAge: context.childAge,
      timestamp: context.timestamp,
      flags: [...context.safetyFlags],
      category: verdict?.category ?? null,
      onTopic: verdict?.onTopic ?? false,
      responseWords: countWords(context.responseText),
    };

    this.logger.info({ parentSummary: summary }, "turn summary");

    return {
      ...context,
      metadata: { ...context.metadata, parentSummary: summary },
    };
  }
}
