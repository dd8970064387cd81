// ---------------------------------------------------------------------------
// The gate's verdict as it travels in `PipelineContext.metadata`.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { AgeBand, SafetyCategory, SeverityLevel } from "../../core/types.js";

export const SAFETY_METADATA_KEY = "safety";

export const SafetyVerdictSchema = z.object({
  safe: z.boolean(),
  source: z.enum(["input", "response"]),
  category: z.nativeEnum(SafetyCategory),
  severity: z.nativeEnum(SeverityLevel),
  score: z.number(),
  ageAppropriate: z.boolean(),
  parentAlert: z.boolean(),
  band: z.nativeEnum(AgeBand).nullable(),
  educationalRedirect: z.string().nullable(),
  onTopic: z.boolean(),
});

export type SafetyVerdict = z.infer<typeof SafetyVerdictSchema>;

/** The verdict recorded by the gate, or null when missing or malformed. */
export function readSafetyVerdict(
  metadata: Readonly<Record<string, unknown>>,
): SafetyVerdict | null {
  const parsed = SafetyVerdictSchema.safeParse(metadata[SAFETY_METADATA_KEY]);
  return parsed.success ? parsed.data : null;
}
