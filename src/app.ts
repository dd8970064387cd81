// ---------------------------------------------------------------------------
// safe-tutor -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig, PhrasePicker, SafetyPolicy } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { loadSafetyPolicy } from "./config/policy-loader.js";
import { createLogger } from "./logging/logger.js";
import { MetricsCollector } from "./metrics/metrics-collector.js";
import { StageRegistry } from "./core/stage-registry.js";
import { SafetyEngine } from "./domain/safety/safety-engine.js";
import { AgeAdapter } from "./domain/adaptation/age-adapter.js";
import { findAgeBand } from "./domain/age/age-classifier.js";
import { PipelineOrchestrator } from "./orchestrator/pipeline-orchestrator.js";
import { ContentFilterStage } from "./orchestrator/stages/content-filter-stage.js";
import { AgeAdapterStage } from "./orchestrator/stages/age-adapter-stage.js";
import { ParentLoggerStage } from "./orchestrator/stages/parent-logger-stage.js";
import { InMemoryIncidentStore } from "./storage/incident-store.js";
import type { IncidentStore } from "./storage/incident-store.js";
import { PgIncidentStore, createPool } from "./storage/pg-incident-store.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

// ── Pipeline assembly ──────────────────────────────────────────────────────

export interface PipelineDependencies {
  policy: SafetyPolicy;
  incidents: IncidentStore;
  logger: pino.Logger;
  metrics: MetricsCollector;
  pickPhrase?: PhrasePicker;
}

export interface Pipeline {
  engine: SafetyEngine;
  adapter: AgeAdapter;
  orchestrator: PipelineOrchestrator;
}

/** Wire the engine, adapter and the three stages into an orchestrator. */
export function createPipeline(deps: PipelineDependencies): Pipeline {
  const { policy, incidents, logger, metrics, pickPhrase } = deps;

  const engine = new SafetyEngine(policy, logger.child({ module: "safety" }), {
    pickPhrase,
  });
  const adapter = new AgeAdapter(policy, { pickPhrase });

  const registry = new StageRegistry()
    .register(
      new ContentFilterStage({
        engine,
        incidents,
        metrics,
        logger: logger.child({ module: "content-filter" }),
      }),
    )
    .register(new AgeAdapterStage(adapter))
    .register(new ParentLoggerStage(logger.child({ module: "parent-log" })));

  const orchestrator = new PipelineOrchestrator({
    registry,
    config: policy.pipeline,
    blockedResponse: (context) => engine.genericRedirect(findAgeBand(context.childAge)),
    logger: logger.child({ module: "orchestrator" }),
    metrics,
  });

  return { engine, adapter, orchestrator };
}

// ── Service bootstrap ──────────────────────────────────────────────────────

export interface SafeTutorService {
  app: Hono<AppEnv>;
  orchestrator: PipelineOrchestrator;
  config: AppConfig;
  logger: pino.Logger;
  shutdown(): Promise<void>;
}

/**
 * Build the service from configuration: logger, policy, incident store,
 * pipeline and HTTP app. Any policy defect throws before the app exists.
 */
export async function buildApp(config: AppConfig = loadConfig()): Promise<SafeTutorService> {
  // 1. Logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  });

  // 2. Policy
  const policy = loadSafetyPolicy(config.policyDir);
  logger.info(
    { policyDir: config.policyDir, bands: policy.profiles.size, stages: policy.pipeline.order },
    "safety policy loaded",
  );

  // 3. Incident store
  let incidents: IncidentStore;
  if (config.database.connectionString !== null) {
    const store = new PgIncidentStore(
      createPool(config.database, logger.child({ module: "db" })),
    );
    await store.initSchema();
    incidents = store;
  } else {
    if (config.env === "production") {
      logger.warn("no database configured; incidents are kept in memory only");
    }
    incidents = new InMemoryIncidentStore();
  }

  // 4. Metrics and pipeline
  const metricsCollector = new MetricsCollector(
    config.metrics,
    logger.child({ module: "metrics" }),
  );
  const { engine, orchestrator } = createPipeline({
    policy,
    incidents,
    logger,
    metrics: metricsCollector,
  });

  // 5. Hono app
  const app = createApp({
    orchestrator,
    engine,
    incidents,
    metricsCollector,
    logger,
    turnBudget: config.turnBudget,
    production: config.env === "production",
  });

  logger.info({ port: config.port, env: config.env }, "safe-tutor ready");

  return {
    app,
    orchestrator,
    config,
    logger,
    async shutdown(): Promise<void> {
      metricsCollector.dispose();
      await orchestrator.shutdown();
    },
  };
}
