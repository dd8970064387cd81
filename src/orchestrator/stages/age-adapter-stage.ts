// ---------------------------------------------------------------------------
// age_adapter: fits the response to the child's band.
// ---------------------------------------------------------------------------

import type { PipelineContext, TransformStage } from "../../core/types.js";
import { StageExecutionError } from "../../core/errors.js";
import type { AgeAdapter } from "../../domain/adaptation/age-adapter.js";
import { classifyAge } from "../../domain/age/age-classifier.js";
import { countWords } from "../../utils/text.js";
import { readSafetyVerdict } from "./safety-verdict.js";

export class AgeAdapterStage implements TransformStage {
  readonly kind = "transform";
  readonly name = "age_adapter";

  constructor(private readonly adapter: AgeAdapter) {}

  async apply(context: PipelineContext): Promise<PipelineContext> {
    // Only text the gate passed may be adapted.
    const verdict = readSafetyVerdict(context.metadata);
    if (verdict === null || !verdict.safe) {
      throw new StageExecutionError(
        this.name,
        context.sessionId,
        "no safe verdict from the safety gate",
      );
    }

    const band = classifyAge(context.childAge);
    const responseText = this.adapter.adapt(context.responseText, band, {
      childName: context.childName,
    });

    return {
      ...context,
      responseText,
      metadata: {
        ...context.metadata,
        adaptation: {
          band,
          wordsBefore: countWords(context.responseText),
          wordsAfter: countWords(responseText),
        },
      },
    };
  }
}
