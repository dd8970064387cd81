// ---------------------------------------------------------------------------
// Incident review routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../env.js";
import type { IncidentStore } from "../../storage/incident-store.js";
import { parseQuery } from "../validation.js";

/** Dependencies required by incident routes. */
export interface IncidentRouteDeps {
  incidents: IncidentStore;
}

const IncidentQuerySchema = z
  .object({
    childId: z.string().trim().min(1),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    limit: z.coerce.number().int().min(1).max(500).optional(),
  })
  .refine((q) => !q.from || !q.to || q.from <= q.to, {
    message: "`from` must not be after `to`",
    path: ["from"],
  });

/**
 * Mounts:
 *
 * - `GET /incidents?childId=&from=&to=&limit=` -- newest first.
 */
export function incidentRoutes(deps: IncidentRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    const q = parseQuery(c, IncidentQuerySchema);
    const incidents = await deps.incidents.findByChild(q.childId, {
      from: q.from,
      to: q.to,
      limit: q.limit,
    });
    return c.json({ childId: q.childId, incidents, total: incidents.length });
  });

  return app;
}
