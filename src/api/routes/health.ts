// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";
import type { PipelineOrchestrator } from "../../orchestrator/pipeline-orchestrator.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  metricsCollector: MetricsCollector;
  orchestrator: PipelineOrchestrator;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`         -- Basic liveness probe.
 * - `GET /health/metrics` -- Safety, stage and turn counters.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      activeSessions: deps.orchestrator.sessionCount,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/metrics
  app.get("/metrics", (c) => c.json(deps.metricsCollector.toJSON()));

  return app;
}
