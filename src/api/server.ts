// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { AppEnv } from "./env.js";
import type { TurnBudgetConfig } from "../core/types.js";
import type { SafetyEngine } from "../domain/safety/safety-engine.js";
import type { PipelineOrchestrator } from "../orchestrator/pipeline-orchestrator.js";
import type { IncidentStore } from "../storage/incident-store.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { TurnBudget } from "./turn-budget.js";

import { turnRoutes } from "./routes/turns.js";
import { ageBandRoutes, safetyRoutes } from "./routes/safety.js";
import { sessionRoutes } from "./routes/sessions.js";
import { incidentRoutes } from "./routes/incidents.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  orchestrator: PipelineOrchestrator;
  engine: SafetyEngine;
  incidents: IncidentStore;
  metricsCollector: MetricsCollector;
  logger: pino.Logger;
  turnBudget: TurnBudgetConfig;
  production: boolean;
  clock?: () => Date;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers (`/turns` checks the child's turn budget).
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      service: "safe-tutor",
      routes: ["/turns", "/safety/evaluate", "/age-bands/:age", "/sessions/:id", "/incidents", "/health"],
    }),
  );

  const clock = deps.clock ?? (() => new Date());
  const budget = new TurnBudget(deps.turnBudget, () => clock().getTime());
  app.route("/turns", turnRoutes({ orchestrator: deps.orchestrator, budget, clock }));
  app.route("/safety", safetyRoutes({ engine: deps.engine }));
  app.route("/age-bands", ageBandRoutes({ engine: deps.engine }));
  app.route("/sessions", sessionRoutes({ orchestrator: deps.orchestrator }));
  app.route("/incidents", incidentRoutes({ incidents: deps.incidents }));
  app.route(
    "/health",
    healthRoutes({
      metricsCollector: deps.metricsCollector,
      orchestrator: deps.orchestrator,
    }),
  );

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(createErrorHandler({ production: deps.production, logger: deps.logger }));

  return app;
}
