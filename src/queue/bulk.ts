import { QueueError, toDescriptor } from "./errors.js";
import { identity } from "./identity.js";
import type { BulkResultEntry, BulkSubmitOptions, TaskStatus, TaskStore } from "./types.js";

/** A store that can force a known task back to PENDING. */
export interface RequeueingStore extends TaskStore {
  requeue(module: string, id: string, doc: string): Promise<void>;
}

export async function collectStatuses(
  store: TaskStore,
  module: string,
  ids: readonly string[]
): Promise<Record<string, TaskStatus>> {
  const out: Record<string, TaskStatus> = {};
  for (const id of ids) {
    out[id] = await store.status(module, id);
  }
  return out;
}

/**
 * Results per id; failed lookups (unknown, not ready, processing failed)
 * are reported as error descriptors instead of aborting the batch.
 */
export async function collectResults(
  store: TaskStore,
  module: string,
  ids: readonly string[],
  format?: string
): Promise<Record<string, BulkResultEntry>> {
  const out: Record<string, BulkResultEntry> = {};
  for (const id of ids) {
    const outcome = await store.result(module, id, format);
    out[id] = outcome.ok ? outcome.value : toDescriptor(outcome.error);
  }
  return out;
}

export function assertBulkIds(docs: readonly string[], ids: readonly string[] | undefined): void {
  if (ids && ids.length !== docs.length) {
    throw new QueueError("InvalidArgument", `Got ${ids.length} ids for ${docs.length} documents`);
  }
}

/**
 * Submits every document in order. ERROR tasks are requeued when
 * `resetError` is set, PENDING tasks when `resetPending` is set; everything
 * else follows the idempotent submit.
 */
export async function submitAll(
  store: RequeueingStore,
  module: string,
  docs: readonly string[],
  opts: BulkSubmitOptions = {}
): Promise<string[]> {
  assertBulkIds(docs, opts.ids);

  const out: string[] = [];
  for (let i = 0; i < docs.length; i++) {
    const doc = docs[i];
    const id = opts.ids?.[i] ?? identity(doc);
    const status = await store.status(module, id);

    if ((opts.resetError && status === "ERROR") || (opts.resetPending && status === "PENDING")) {
      await store.requeue(module, id, doc);
    } else {
      await store.submit(module, doc, id);
    }
    out.push(id);
  }
  return out;
}
