// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const service = await buildApp();
const { config, logger, orchestrator } = service;

const server = serve({
  fetch: service.app.fetch,
  port: config.port,
});

// Forget sessions that have been idle past the TTL.
const sweep = setInterval(() => {
  const removed = orchestrator.pruneSessions(config.sessions.idleTtlMs);
  if (removed > 0) logger.debug({ removed }, "idle sessions pruned");
}, config.sessions.sweepIntervalMs);
sweep.unref();

async function stop(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down");
  clearInterval(sweep);
  server.close();
  await service.shutdown();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    stop(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}
