// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/**
 * Paths redacted from log output: secrets, and child-authored or
 * child-facing text, which never belongs in operational logs.
 */
const REDACTED_PATHS: string[] = [
  "*.password",
  "*.connectionString",
  "req.headers.authorization",
  "inputText",
  "responseText",
  "childName",
  "*.inputText",
  "*.responseText",
  "*.childName",
];

/**
 * Create a configured pino logger instance.
 *
 * - JSON output (pino default)
 * - Redaction of secrets and child text
 * - Base fields: `service` and `version`
 * - Optional pretty-print via `pino-pretty` transport for development
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "safe-tutor",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: REDACTED_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}
