// ---------------------------------------------------------------------------
// Turn routes: run one conversation turn through the pipeline.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../env.js";
import type { PipelineOrchestrator } from "../../orchestrator/pipeline-orchestrator.js";
import type { TurnBudget } from "../turn-budget.js";
import { parseJsonBody } from "../validation.js";

/** Dependencies required by turn routes. */
export interface TurnRouteDeps {
  orchestrator: PipelineOrchestrator;
  budget: TurnBudget;
  clock?: () => Date;
}

export const TurnRequestSchema = z.object({
  sessionId: z.string().trim().min(1).max(128),
  profileId: z.string().trim().min(1).max(128),
  childName: z.string().trim().max(64).default(""),
  // Out-of-range ages are not rejected here: the safety gate fails closed.
  childAge: z.number().finite(),
  inputText: z.string().max(4_000),
  responseText: z.string().max(8_000).default(""),
});

/**
 * Mounts:
 *
 * - `POST /turns` -- body `{ sessionId, profileId, childName, childAge,
 *   inputText, responseText? }`; answers `{ responseText, status, stages }`.
 *   A blocked turn is a 200 whose response is the redirect. Each child
 *   profile has a per-minute turn budget; past it the answer is a 429.
 */
export function turnRoutes(deps: TurnRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const clock = deps.clock ?? (() => new Date());

  app.post("/", async (c) => {
    const body = await parseJsonBody(c, TurnRequestSchema);
    deps.budget.consume(body.profileId);

    const outcome = await deps.orchestrator.process({
      sessionId: body.sessionId,
      profileId: body.profileId,
      childName: body.childName,
      childAge: body.childAge,
      inputText: body.inputText,
      responseText: body.responseText,
      safetyFlags: [],
      metadata: {},
      timestamp: clock().toISOString(),
    });

    return c.json(outcome);
  });

  return app;
}
