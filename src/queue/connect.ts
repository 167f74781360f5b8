import { DEFAULT_REQUEST_TIMEOUT_MS, getEnvInt, isDebug } from "../config/env.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { FsQueue } from "./fsQueue.js";
import { HttpQueue, type FetchImplementation } from "./httpQueue.js";
import type { TaskQueue } from "./types.js";

export type QueueBackend = { kind: "fs"; queue: FsQueue } | { kind: "http"; queue: HttpQueue };

export interface ConnectOptions {
  registry?: ModuleRegistry;
  requestTimeoutMs?: number;
  fetchImplementation?: FetchImplementation;
}

export function isRemoteAddress(address: string): boolean {
  return /^https?:\/\//i.test(address.trim());
}

/**
 * Picks the backend from the address once: http(s) URLs reach a queue
 * service, anything else is a directory on a local or shared filesystem.
 */
export function openBackend(address: string, opts: ConnectOptions = {}): QueueBackend {
  const addr = address.trim();
  if (isRemoteAddress(addr)) {
    if (isDebug()) console.log(`[queue] connecting to queue service at ${addr}`);
    return {
      kind: "http",
      queue: new HttpQueue(addr, {
        requestTimeoutMs: opts.requestTimeoutMs ?? getEnvInt("QUEUE_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
        fetchImplementation: opts.fetchImplementation,
      }),
    };
  }
  if (isDebug()) console.log(`[queue] using queue directory ${addr}`);
  return { kind: "fs", queue: new FsQueue(addr, { registry: opts.registry }) };
}

export function connectQueue(address: string, opts: ConnectOptions = {}): TaskQueue {
  return openBackend(address, opts).queue;
}
