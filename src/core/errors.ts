// ---------------------------------------------------------------------------
// Error hierarchy for the safe-tutor service.
// ---------------------------------------------------------------------------

import { MAX_AGE, MIN_AGE } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all safe-tutor domain errors.
 */
export class SafeTutorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SafeTutorError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Domain errors ───────────────────────────────────────────────────────────

/** The supplied age is not an integer in the supported range. */
export class InvalidAgeError extends SafeTutorError {
  public readonly age: unknown;

  constructor(age: unknown, options?: ErrorOptions) {
    super(
      `Invalid age ${JSON.stringify(age)}: expected an integer from ${MIN_AGE} to ${MAX_AGE}`,
      options,
    );
    this.name = "InvalidAgeError";
    this.age = age;
  }
}

/** A request body or query string failed validation. */
export class RequestValidationError extends SafeTutorError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

/** A child profile has used up its turns for the current minute. */
export class TurnBudgetExceededError extends SafeTutorError {
  public readonly profileId: string;
  public readonly retryAfterSeconds: number;

  constructor(profileId: string, retryAfterSeconds: number) {
    super(`Too many turns for profile ${profileId}; retry in ${retryAfterSeconds}s`);
    this.name = "TurnBudgetExceededError";
    this.profileId = profileId;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

// ── Pipeline errors ─────────────────────────────────────────────────────────

/**
 * A pipeline stage other than the safety gate threw, or broke the context
 * contract. The original failure, when there is one, is kept as `cause`.
 */
export class StageExecutionError extends SafeTutorError {
  public readonly stage: string;
  public readonly sessionId: string;

  constructor(
    stage: string,
    sessionId: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Stage "${stage}" failed for session ${sessionId}: ${message}`, options);
    this.name = "StageExecutionError";
    this.stage = stage;
    this.sessionId = sessionId;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value or policy table is missing or invalid. */
export class ConfigurationError extends SafeTutorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
