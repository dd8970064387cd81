// ---------------------------------------------------------------------------
// Shared fixtures: the shipped policy and silent loggers.
// ---------------------------------------------------------------------------

import { fileURLToPath } from "node:url";
import pino from "pino";
import { loadSafetyPolicy, readPolicyDocuments } from "../../src/config/policy-loader.js";
import type { PolicyDocuments } from "../../src/config/policy-loader.js";
import type { PipelineContext, SafetyPolicy } from "../../src/core/types.js";

export const POLICY_DIR = fileURLToPath(new URL("../../config", import.meta.url));

let cached: SafetyPolicy | null = null;

/** The policy under config/, loaded once per test file. */
export function shippedPolicy(): SafetyPolicy {
  cached ??= loadSafetyPolicy(POLICY_DIR);
  return cached;
}

/** Fresh parsed copies of the policy documents, safe to mutate. */
export function policyDocuments(): PolicyDocuments {
  return readPolicyDocuments(POLICY_DIR);
}

export function silentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

export function makeContext(overrides: Partial<PipelineContext> = {}): PipelineContext {
  return {
    sessionId: "session-1",
    profileId: "child-1",
    childName: "Sam",
    childAge: 9,
    inputText: "How do plants make food?",
    responseText: "",
    safetyFlags: [],
    metadata: {},
    timestamp: "2026-01-15T10:00:00.000Z",
    ...overrides,
  };
}
