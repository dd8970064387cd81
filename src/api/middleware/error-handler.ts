// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type pino from "pino";
import {
  InvalidAgeError,
  RequestValidationError,
  StageExecutionError,
  TurnBudgetExceededError,
} from "../../core/errors.js";

const GENERIC_FAILURE = "Something went wrong, please try again";

export interface ErrorHandlerOptions {
  production: boolean;
  logger: pino.Logger;
}

/**
 * Build the `onError` handler.
 *
 * In production only client-input errors expose their message; everything
 * else gets a generic body so stage names and internals stay private.
 * A blocked turn is a normal 200 response and never reaches this handler.
 *
 * Mapping:
 * - `InvalidAgeError`        -> 400 Bad Request
 * - `RequestValidationError` -> 400 Bad Request
 * - `TurnBudgetExceededError` -> 429 with `Retry-After`
 * - `StageExecutionError`    -> 500
 * - Everything else          -> 500
 */
export function createErrorHandler(
  options: ErrorHandlerOptions,
): (err: Error, c: Context) => Response {
  const { production, logger } = options;

  return (err: Error, c: Context): Response => {
    if (err instanceof InvalidAgeError) {
      return c.json({ error: err.message, type: "invalid_age" }, 400);
    }

    if (err instanceof RequestValidationError) {
      return c.json(
        { error: err.message, type: "validation_error", issues: err.issues },
        400,
      );
    }

    if (err instanceof TurnBudgetExceededError) {
      logger.warn({ profileId: err.profileId }, "turn budget exhausted");
      c.header("Retry-After", String(err.retryAfterSeconds));
      return c.json(
        {
          error: "Too many turns, please wait a moment",
          type: "rate_limit_exceeded",
          retryAfterSeconds: err.retryAfterSeconds,
        },
        429,
      );
    }

    if (err instanceof StageExecutionError) {
      logger.error(
        { stage: err.stage, sessionId: err.sessionId, err: err.message },
        "turn failed",
      );
      return c.json(
        {
          error: production ? GENERIC_FAILURE : err.message,
          type: "stage_error",
        },
        500,
      );
    }

    logger.error({ err: { name: err.name, message: err.message } }, "unhandled error");
    const message = production ? GENERIC_FAILURE : err.message;
    return c.json({ error: message, type: "internal_error" }, 500);
  };
}
