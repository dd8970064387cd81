// ---------------------------------------------------------------------------
// PostgreSQL incident store.
// ---------------------------------------------------------------------------

import pg from "pg";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type pino from "pino";
import { SafetyCategory, SeverityLevel } from "../core/types.js";
import type { DatabaseConfig, IncidentQuery, SafetyIncident } from "../core/types.js";
import { DEFAULT_INCIDENT_LIMIT, toStoredIncident } from "./incident-store.js";
import type { IncidentStore } from "./incident-store.js";

const SCHEMA_PATH = fileURLToPath(new URL("../../sql/incidents.sql", import.meta.url));

/** The slice of `pg.Pool` the store uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export function createPool(config: DatabaseConfig, logger: pino.Logger): pg.Pool {
  if (config.connectionString === null) {
    throw new Error("createPool requires a database connection string");
  }
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
  });
  // Idle clients that drop are replaced by the pool; keep the event handled.
  pool.on("error", (err) => {
    logger.error({ err: err.message }, "postgres pool background error");
  });
  return pool;
}

const IncidentRowSchema = z.object({
  id: z.string(),
  occurred_at: z.coerce.date(),
  child_id: z.string(),
  child_age: z.coerce.number().int(),
  session_id: z.string(),
  input_text: z.string(),
  category: z.nativeEnum(SafetyCategory),
  severity: z.coerce.number().pipe(z.nativeEnum(SeverityLevel)),
  action_taken: z.literal("blocked_and_redirected"),
  parent_notified: z.boolean(),
  flags: z.array(z.string()),
});

function fromRow(row: unknown): SafetyIncident {
  const r = IncidentRowSchema.parse(row);
  return {
    id: r.id,
    timestamp: r.occurred_at.toISOString(),
    childId: r.child_id,
    childAge: r.child_age,
    sessionId: r.session_id,
    inputText: r.input_text,
    category: r.category,
    severity: r.severity,
    actionTaken: r.action_taken,
    parentNotified: r.parent_notified,
    flags: r.flags,
  };
}

export class PgIncidentStore implements IncidentStore {
  constructor(private readonly client: SqlClient) {}

  /** Create the table and indexes when they do not exist. */
  async initSchema(): Promise<void> {
    await this.client.query(readFileSync(SCHEMA_PATH, "utf-8"));
  }

  async record(incident: SafetyIncident): Promise<void> {
    const i = toStoredIncident(incident);
    await this.client.query(
      `INSERT INTO safety_incidents
         (id, occurred_at, child_id, child_age, session_id, input_text,
          category, severity, action_taken, parent_notified, flags)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        i.id,
        i.timestamp,
        i.childId,
        i.childAge,
        i.sessionId,
        i.inputText,
        i.category,
        i.severity,
        i.actionTaken,
        i.parentNotified,
        i.flags,
      ],
    );
  }

  async findByChild(
    childId: string,
    query: IncidentQuery = {},
  ): Promise<SafetyIncident[]> {
    const result = await this.client.query(
      `SELECT id, occurred_at, child_id, child_age, session_id, input_text,
              category, severity, action_taken, parent_notified, flags
         FROM safety_incidents
        WHERE child_id = $1
          AND ($2::timestamptz IS NULL OR occurred_at >= $2)
          AND ($3::timestamptz IS NULL OR occurred_at <= $3)
        ORDER BY occurred_at DESC
        LIMIT $4`,
      [
        childId,
        query.from?.toISOString() ?? null,
        query.to?.toISOString() ?? null,
        query.limit ?? DEFAULT_INCIDENT_LIMIT,
      ],
    );
    return result.rows.map(fromRow);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
