// ---------------------------------------------------------------------------
// Stage Registry – maps stage name -> PipelineStage.
// ---------------------------------------------------------------------------

import type { PipelineStage } from "./types.js";
import { ConfigurationError } from "./errors.js";

/**
 * Registry of the pipeline stages available to the orchestrator. Each name
 * may be registered once; the configured order decides which run and when.
 */
export class StageRegistry {
  private readonly registry = new Map<string, PipelineStage>();

  // ── Mutation ────────────────────────────────────────────────────────────

  /** Register a stage under its own name. Duplicate names are rejected. */
  register(stage: PipelineStage): this {
    if (this.registry.has(stage.name)) {
      throw new ConfigurationError(`Stage "${stage.name}" is already registered`);
    }
    this.registry.set(stage.name, stage);
    return this;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  /** The stage registered under `name`, or `null`. */
  get(name: string): PipelineStage | null {
    return this.registry.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  /** Every registered stage, in registration order. */
  getAll(): PipelineStage[] {
    return [...this.registry.values()];
  }

  get size(): number {
    return this.registry.size;
  }
}
