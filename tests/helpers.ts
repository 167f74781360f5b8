import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { once } from "node:events";
import type { Server } from "node:http";
import type { ModuleRegistry } from "../src/modules/registry.js";
import { createApp } from "../src/server/app.js";
import type { TaskQueue } from "../src/queue/types.js";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "textqueue-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function delay(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** Monotonic fake clock for submission stamps. */
export function tickingClock(start = 1_700_000_000_000): () => number {
  let t = start;
  return () => t++;
}

export type RunningServer = { server: Server; baseUrl: string };

/** Serves the queue app on an ephemeral loopback port. */
export async function startServer(queue: TaskQueue, registry: ModuleRegistry): Promise<RunningServer> {
  const app = createApp({ queue, registry, rateLimitPerMinute: 0, logRequests: false });
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  return { server, baseUrl: `http://127.0.0.1:${addr.port}` };
}

export async function stopServer(running: RunningServer): Promise<void> {
  running.server.closeAllConnections();
  await new Promise<void>((resolve, reject) => running.server.close((e) => (e ? reject(e) : resolve())));
}
