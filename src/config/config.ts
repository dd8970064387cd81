// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads SAFE_TUTOR_* environment variables through a Zod schema with
// defaults, so the service starts with zero configuration in development.
// ---------------------------------------------------------------------------

import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Policy YAML shipped with the service (`<repo>/config`). */
export const DEFAULT_POLICY_DIR = fileURLToPath(
  new URL("../../config", import.meta.url),
);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  SAFE_TUTOR_ENV: z
    .enum(["development", "test", "staging", "production"])
    .default("development"),
  SAFE_TUTOR_PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  SAFE_TUTOR_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SAFE_TUTOR_POLICY_DIR: z.string().min(1).default(DEFAULT_POLICY_DIR),
  SAFE_TUTOR_DATABASE_URL: z.string().min(1).optional(),
  SAFE_TUTOR_DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  SAFE_TUTOR_METRICS_ENABLED: booleanFlag.default("true"),
  SAFE_TUTOR_METRICS_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  SAFE_TUTOR_TURN_BUDGET_ENABLED: booleanFlag.default("true"),
  SAFE_TUTOR_TURNS_PER_MINUTE: z.coerce.number().int().positive().default(20),
  SAFE_TUTOR_SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60_000),
  SAFE_TUTOR_SESSION_SWEEP_MS: z.coerce.number().int().positive().default(5 * 60_000),
});

/**
 * Load the application configuration from environment variables.
 *
 * Throws {@link ConfigurationError} listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`, {
      cause: result.error,
    });
  }
  const e = result.data;

  return {
    env: e.SAFE_TUTOR_ENV,
    port: e.SAFE_TUTOR_PORT,
    logLevel: e.SAFE_TUTOR_LOG_LEVEL,
    policyDir: e.SAFE_TUTOR_POLICY_DIR,

    database: {
      connectionString: e.SAFE_TUTOR_DATABASE_URL ?? null,
      maxConnections: e.SAFE_TUTOR_DB_MAX_CONNECTIONS,
    },

    metrics: {
      enabled: e.SAFE_TUTOR_METRICS_ENABLED,
      reportIntervalMs: e.SAFE_TUTOR_METRICS_INTERVAL_MS,
    },

    turnBudget: {
      enabled: e.SAFE_TUTOR_TURN_BUDGET_ENABLED,
      turnsPerMinute: e.SAFE_TUTOR_TURNS_PER_MINUTE,
    },

    sessions: {
      idleTtlMs: e.SAFE_TUTOR_SESSION_TTL_MS,          // 30 minutes
      sweepIntervalMs: e.SAFE_TUTOR_SESSION_SWEEP_MS,  // 5 minutes
    },
  };
}
