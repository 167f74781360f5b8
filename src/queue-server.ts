import "dotenv/config";
import {
  DEFAULT_BIND_HOST,
  DEFAULT_BODY_LIMIT,
  DEFAULT_MAX_CLAIMS_PER_TICK,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
  DEFAULT_QUEUE_ADDRESS,
  DEFAULT_RATE_LIMIT_PER_MINUTE,
  getEnvBool,
  getEnvInt,
  getEnvList,
  getEnvString,
} from "./config/env.js";
import { createDefaultRegistry } from "./modules/registry.js";
import { openBackend } from "./queue/connect.js";
import { createApp } from "./server/app.js";
import { runWorker } from "./worker/runner.js";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
const PORT = getEnvInt("PORT", DEFAULT_PORT);
const BIND_HOST = getEnvString("BIND_HOST", DEFAULT_BIND_HOST);
const QUEUE_ADDRESS = getEnvString("QUEUE_ADDRESS", DEFAULT_QUEUE_ADDRESS);
const RUN_WORKERS = getEnvBool("QUEUE_SERVER_WORKERS", false);

async function main() {
  const registry = createDefaultRegistry();
  const backend = openBackend(QUEUE_ADDRESS, { registry });

  const app = createApp({
    queue: backend.queue,
    registry,
    rateLimitPerMinute: getEnvInt("QUEUE_RATE_LIMIT", DEFAULT_RATE_LIMIT_PER_MINUTE),
    bodyLimit: getEnvString("QUEUE_BODY_LIMIT", DEFAULT_BODY_LIMIT),
  });

  const stop = new AbortController();
  const server = app.listen(PORT, BIND_HOST, () => {
    console.log(`[queue-server] listening on http://${BIND_HOST}:${PORT}`);
    console.log(`[queue-server] backend=${backend.kind} address=${QUEUE_ADDRESS}`);
    console.log(`[queue-server] modules=${registry.names().join(",")}`);
  });

  // Optional in-process workers, handy for single-box setups
  if (RUN_WORKERS) {
    const modules = getEnvList("QUEUE_WORKER_MODULES");
    runWorker(backend.queue, registry, modules.length > 0 ? modules : registry.names(), {
      workerId: `server-${process.pid}`,
      pollMs: getEnvInt("QUEUE_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS),
      maxClaims: getEnvInt("QUEUE_MAX_CLAIMS_PER_TICK", DEFAULT_MAX_CLAIMS_PER_TICK),
      signal: stop.signal,
    }).catch((e) => {
      console.error("[queue-server] worker fatal:", e);
      process.exit(1);
    });
  }

  const shutdown = () => {
    console.log("[queue-server] shutting down");
    stop.abort();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((e) => {
  console.error("[queue-server] fatal:", e);
  process.exit(1);
});
