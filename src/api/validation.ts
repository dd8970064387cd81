// ---------------------------------------------------------------------------
// Request body and query validation.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { z } from "zod";
import { RequestValidationError } from "../core/errors.js";

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`);
}

/** Parse a JSON body; throws {@link RequestValidationError} on any defect. */
export async function parseJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.output<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Request body must be valid JSON", [], {
      cause: err,
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new RequestValidationError("Invalid request body", toIssues(result.error));
  }
  return result.data;
}

/** Parse query-string parameters. */
export function parseQuery<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): z.output<T> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError("Invalid query parameters", toIssues(result.error));
  }
  return result.data;
}
