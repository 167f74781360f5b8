import { DEFAULT_INLINE_POLL_MS } from "../config/env.js";
import { fail, type Outcome } from "./errors.js";
import { identity } from "./identity.js";
import {
  isTerminal,
  type BulkResultEntry,
  type BulkSubmitOptions,
  type ClaimedTask,
  type ProcessInlineOptions,
  type QueueStatistics,
  type TaskQueue,
  type TaskStatus,
} from "./types.js";

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(t);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const t = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Shared base of the two backends: subclasses provide the single-id
 * operations and the bulk calls; the composed helpers live here.
 */
export abstract class QueueClient implements TaskQueue {
  abstract submit(module: string, doc: string, id?: string): Promise<string>;
  abstract status(module: string, id: string): Promise<TaskStatus>;
  abstract result(module: string, id: string, format?: string): Promise<Outcome<string>>;
  abstract claim(module: string): Promise<ClaimedTask | null>;
  abstract storeResult(module: string, id: string, result: string): Promise<void>;
  abstract storeError(module: string, id: string, error: string): Promise<void>;
  abstract bulkStatus(module: string, ids: readonly string[]): Promise<Record<string, TaskStatus>>;
  abstract bulkResult(module: string, ids: readonly string[], format?: string): Promise<Record<string, BulkResultEntry>>;
  abstract bulkSubmit(module: string, docs: readonly string[], opts?: BulkSubmitOptions): Promise<string[]>;
  abstract statistics(module: string): Promise<QueueStatistics>;

  /**
   * Claims up to `n` tasks, one per pull. Stops early once the queue is empty.
   */
  async *claimMany(module: string, n: number): AsyncGenerator<ClaimedTask, void, undefined> {
    for (let i = 0; i < n; i++) {
      const task = await this.claim(module);
      if (!task) return;
      yield task;
    }
  }

  /**
   * Submits `doc` unless it is already known, then polls until a worker has
   * stored an outcome. Gives up with a Timeout outcome once `timeoutMs` has
   * passed or `signal` aborts.
   */
  async processInline(module: string, doc: string, opts: ProcessInlineOptions = {}): Promise<Outcome<string>> {
    const intervalMs = opts.intervalMs ?? DEFAULT_INLINE_POLL_MS;
    const deadline = opts.timeoutMs === undefined ? Number.POSITIVE_INFINITY : Date.now() + opts.timeoutMs;
    const id = identity(doc);

    if ((await this.status(module, id)) === "UNKNOWN") {
      await this.submit(module, doc);
    }
    for (;;) {
      if (opts.signal?.aborted) {
        return fail("Timeout", `Waiting for ${module}/${id} was cancelled`);
      }
      const status = await this.status(module, id);
      if (isTerminal(status)) return this.result(module, id);

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return fail("Timeout", `Task ${module}/${id} still ${status} after ${opts.timeoutMs}ms`);
      }
      await sleep(Math.min(intervalMs, remaining), opts.signal);
    }
  }
}
