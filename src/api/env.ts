// ---------------------------------------------------------------------------
// Hono environment shared by middleware and routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

export interface AppEnv {
  Variables: {
    requestId: string;
    logger: pino.Logger;
  };
}
