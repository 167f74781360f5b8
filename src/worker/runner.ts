import { DEFAULT_MAX_CLAIMS_PER_TICK, DEFAULT_POLL_INTERVAL_MS } from "../config/env.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { appendQueueEvent } from "../queue/audit.js";
import { sleep } from "../queue/client.js";
import { safeErr } from "../queue/errors.js";
import type { TaskQueue } from "../queue/types.js";

export interface WorkerTickOptions {
  workerId: string;
  maxClaims: number;
}

export interface WorkerOptions extends Partial<WorkerTickOptions> {
  pollMs?: number;
  signal?: AbortSignal;
}

/**
 * Claims up to `maxClaims` tasks per module and processes them. A module
 * that throws gets its message stored as the task's error.
 *
 * @returns number of tasks processed
 */
export async function runWorkerTick(
  queue: TaskQueue,
  registry: ModuleRegistry,
  modules: readonly string[],
  opts: WorkerTickOptions
): Promise<number> {
  const { workerId, maxClaims } = opts;
  let processed = 0;

  for (const name of modules) {
    const mod = registry.require(name);

    for await (const task of queue.claimMany(name, maxClaims)) {
      processed++;
      appendQueueEvent({ type: "TASK_CLAIMED", module: name, taskId: task.id, workerId });
      const start = Date.now();

      let output: string;
      try {
        output = await mod.process(task.doc);
      } catch (e) {
        const msg = safeErr(e);
        await queue.storeError(name, task.id, msg);
        const ms = Date.now() - start;
        console.error(`[queue-worker] ${name}/${task.id} failed after ${ms}ms: ${msg}`);
        appendQueueEvent({ type: "TASK_ERROR", module: name, taskId: task.id, workerId, ms, error: msg });
        continue;
      }

      await queue.storeResult(name, task.id, output);
      const ms = Date.now() - start;
      console.log(`[queue-worker] ${name}/${task.id} done in ${ms}ms`);
      appendQueueEvent({ type: "TASK_DONE", module: name, taskId: task.id, workerId, ms });
    }
  }
  return processed;
}

/**
 * Polls the given modules until `signal` aborts. Sleeps `pollMs` only after
 * a tick that found nothing to do.
 */
export async function runWorker(
  queue: TaskQueue,
  registry: ModuleRegistry,
  modules: readonly string[],
  opts: WorkerOptions = {}
): Promise<void> {
  // fail fast on a misconfigured module list
  for (const name of modules) registry.require(name);

  const workerId = opts.workerId ?? `worker-${process.pid}`;
  const maxClaims = opts.maxClaims ?? DEFAULT_MAX_CLAIMS_PER_TICK;
  const pollMs = opts.pollMs ?? DEFAULT_POLL_INTERVAL_MS;

  console.log(
    `[queue-worker] starting workerId=${workerId} modules=${modules.join(",")} poll=${pollMs}ms maxClaims=${maxClaims}`
  );

  while (!opts.signal?.aborted) {
    const processed = await runWorkerTick(queue, registry, modules, { workerId, maxClaims });
    if (processed === 0) await sleep(pollMs, opts.signal);
  }

  console.log(`[queue-worker] stopped workerId=${workerId}`);
}
