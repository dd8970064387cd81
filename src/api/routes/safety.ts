// ---------------------------------------------------------------------------
// Safety routes: stand-alone evaluation and age-band lookup.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../env.js";
import type { SafetyEngine } from "../../domain/safety/safety-engine.js";
import { classifyAge, rangeOf } from "../../domain/age/age-classifier.js";
import { InvalidAgeError } from "../../core/errors.js";
import { parseJsonBody } from "../validation.js";

/** Dependencies required by safety routes. */
export interface SafetyRouteDeps {
  engine: SafetyEngine;
}

const EvaluateRequestSchema = z.object({
  text: z.string().max(8_000),
  age: z.number().finite(),
});

/**
 * Mounts:
 *
 * - `POST /safety/evaluate` -- `{ text, age }` -> SafetyResult. An invalid
 *   age is reported inside the result (fail closed), not as an error.
 */
export function safetyRoutes(deps: SafetyRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/evaluate", async (c) => {
    const body = await parseJsonBody(c, EvaluateRequestSchema);
    return c.json(deps.engine.evaluate(body.text, body.age));
  });

  return app;
}

/**
 * Mounts:
 *
 * - `GET /age-bands/:age` -- band, inclusive range and reading profile.
 */
export function ageBandRoutes(deps: SafetyRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/:age", (c) => {
    const raw = c.req.param("age");
    if (!/^-?\d+$/.test(raw)) {
      throw new InvalidAgeError(raw);
    }
    const age = Number(raw);
    const band = classifyAge(age);
    const profile = deps.engine.profileFor(band);

    return c.json({
      age,
      band,
      range: rangeOf(band),
      profile: {
        maxWords: profile.maxWords,
        sentenceComplexity: profile.sentenceComplexity,
        vocabularyTier: profile.vocabularyTier,
        filterStrictness: profile.filterStrictness,
        allowedTopics: [...profile.allowedTopics],
        blockedTopics: [...profile.blockedTopics],
      },
    });
  });

  return app;
}
