// ---------------------------------------------------------------------------
// Session routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { PipelineOrchestrator } from "../../orchestrator/pipeline-orchestrator.js";

/** Dependencies required by session routes. */
export interface SessionRouteDeps {
  orchestrator: PipelineOrchestrator;
}

/**
 * Mounts:
 *
 * - `GET    /sessions/:id` -- status of the session's latest turn.
 * - `DELETE /sessions/:id` -- forget the session.
 */
export function sessionRoutes(deps: SessionRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/:id", (c) => {
    const sessionId = c.req.param("id");
    return c.json({ sessionId, status: deps.orchestrator.getSessionStatus(sessionId) });
  });

  app.delete("/:id", (c) => {
    const sessionId = c.req.param("id");
    const removed = deps.orchestrator.cleanupSession(sessionId);
    c.get("logger").info({ sessionId, removed }, "session cleaned up");
    return c.json({ sessionId, removed });
  });

  return app;
}
