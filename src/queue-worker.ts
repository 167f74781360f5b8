import "dotenv/config";
import {
  DEFAULT_MAX_CLAIMS_PER_TICK,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_QUEUE_ADDRESS,
  getEnvInt,
  getEnvList,
  getEnvString,
} from "./config/env.js";
import { createDefaultRegistry } from "./modules/registry.js";
import { connectQueue } from "./queue/connect.js";
import { runWorker } from "./worker/runner.js";

async function main() {
  const registry = createDefaultRegistry();
  const address = getEnvString("QUEUE_ADDRESS", DEFAULT_QUEUE_ADDRESS);
  const requested = getEnvList("QUEUE_WORKER_MODULES");
  const modules = requested.length > 0 ? requested : registry.names();

  const stop = new AbortController();
  process.once("SIGINT", () => stop.abort());
  process.once("SIGTERM", () => stop.abort());

  console.log(`[queue-worker] queue=${address}`);
  await runWorker(connectQueue(address, { registry }), registry, modules, {
    workerId: process.env.QUEUE_WORKER_ID || `worker-${process.pid}`,
    pollMs: getEnvInt("QUEUE_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS),
    maxClaims: getEnvInt("QUEUE_MAX_CLAIMS_PER_TICK", DEFAULT_MAX_CLAIMS_PER_TICK),
    signal: stop.signal,
  });
}

main().catch((e) => {
  console.error("[queue-worker] fatal:", e);
  process.exit(1);
});
