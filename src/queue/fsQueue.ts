import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { isDebug } from "../config/env.js";
import type { ModuleRegistry } from "../modules/registry.js";
import { collectResults, collectStatuses, submitAll, type RequeueingStore } from "./bulk.js";
import { QueueClient } from "./client.js";
import { errnoCode, fail, isQueueError, ok, QueueError, safeErr, type Outcome } from "./errors.js";
import { identity } from "./identity.js";
import {
  STORED_STATUSES,
  type BulkResultEntry,
  type BulkSubmitOptions,
  type ClaimedTask,
  type QueueStatistics,
  type StoredStatus,
  type TaskStatus,
} from "./types.js";

// Directory per state, under <root>/<module>/
export const STATUS_DIRS: Record<StoredStatus, string> = {
  PENDING: "queue",
  STARTED: "inprogress",
  DONE: "results",
  ERROR: "errors",
};

const STATUS_PRECEDENCE: readonly StoredStatus[] = ["ERROR", "DONE", "STARTED", "PENDING"];

// One path segment, never hidden (dot-files are in-flight temp writes)
const SAFE_NAME_REGEX = /^[A-Za-z0-9_-][A-Za-z0-9_.-]{0,254}$/;

export function isSafeName(name: string): boolean {
  return SAFE_NAME_REGEX.test(name);
}

function assertSafeName(name: string, what: string): void {
  if (!isSafeName(name)) {
    throw new QueueError("InvalidArgument", `Invalid ${what}: ${JSON.stringify(name)}`);
  }
}

function storageError(op: string, e: unknown): QueueError {
  if (isQueueError(e)) return e;
  return new QueueError("StorageError", `${op} failed: ${safeErr(e)}`, { cause: e });
}

export interface FsQueueOptions {
  // Needed only to convert results on retrieval
  registry?: ModuleRegistry;
  // Submission clock, epoch ms
  nowMs?: () => number;
}

/**
 * Queue kept directly on a (possibly shared) filesystem. A task's state is
 * the directory its file currently sits in; claiming is a single rename, so
 * concurrent workers on the same directory tree never get the same task.
 */
export class FsQueue extends QueueClient implements RequeueingStore {
  readonly root: string;
  private readonly registry?: ModuleRegistry;
  private readonly nowMs: () => number;

  constructor(root: string, opts: FsQueueOptions = {}) {
    super();
    this.root = path.resolve(root);
    this.registry = opts.registry;
    this.nowMs = opts.nowMs ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // Paths + primitive file operations
  // ---------------------------------------------------------------------------
  dir(module: string, status: StoredStatus): string {
    return path.join(this.root, module, STATUS_DIRS[status]);
  }

  file(module: string, status: StoredStatus, id: string): string {
    return path.join(this.dir(module, status), id);
  }

  private async ensureDirs(module: string): Promise<void> {
    try {
      for (const status of STORED_STATUSES) {
        await fs.mkdir(this.dir(module, status), { recursive: true });
      }
    } catch (e) {
      throw storageError(`mkdir ${module}`, e);
    }
  }

  private tempFile(module: string, status: StoredStatus): string {
    return path.join(this.dir(module, status), `.${randomUUID()}.tmp`);
  }

  /**
   * Writes through a hidden temp file moved into place, so readers and
   * claimers only ever see complete records. `stampMs` sets the record's
   * mtime, which is what claim orders by. With `exclusive` an existing
   * record is left alone and false is returned.
   */
  private async write(
    module: string,
    status: StoredStatus,
    id: string,
    text: string,
    opts: { stampMs?: number; exclusive?: boolean } = {}
  ): Promise<boolean> {
    await this.ensureDirs(module);
    const target = this.file(module, status, id);
    const tmp = this.tempFile(module, status);
    try {
      await fs.writeFile(tmp, text, "utf8");
      if (opts.stampMs !== undefined) {
        const stamp = new Date(opts.stampMs);
        await fs.utimes(tmp, stamp, stamp);
      }
      if (!opts.exclusive) {
        await fs.rename(tmp, target);
        return true;
      }
      try {
        await fs.link(tmp, target);
        return true;
      } catch (e) {
        if (errnoCode(e) === "EEXIST") return false;
        throw e;
      }
    } catch (e) {
      throw storageError(`write ${module}/${STATUS_DIRS[status]}/${id}`, e);
    } finally {
      await this.discard(tmp);
    }
  }

  private async discard(tmp: string): Promise<void> {
    try {
      await fs.rm(tmp, { force: true });
    } catch (e) {
      console.error(`[fs-queue] could not remove ${tmp}: ${safeErr(e)}`);
    }
  }

  private async read(module: string, status: StoredStatus, id: string): Promise<string> {
    return fs.readFile(this.file(module, status, id), "utf8");
  }

  // ENOENT is fine: the record is already gone
  private async remove(module: string, status: StoredStatus, id: string): Promise<void> {
    try {
      await fs.unlink(this.file(module, status, id));
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return;
      throw storageError(`remove ${module}/${STATUS_DIRS[status]}/${id}`, e);
    }
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.stat(file);
      return true;
    } catch (e) {
      const code = errnoCode(e);
      if (code === "ENOENT" || code === "ENOTDIR") return false;
      throw storageError(`stat ${file}`, e);
    }
  }

  private async list(module: string, status: StoredStatus): Promise<string[]> {
    try {
      const names = await fs.readdir(this.dir(module, status));
      return names.filter(isSafeName);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw storageError(`list ${module}/${STATUS_DIRS[status]}`, e);
    }
  }

  /** PENDING ids, oldest submission first (ties broken by id). */
  async pendingByAge(module: string): Promise<string[]> {
    const entries: Array<{ id: string; stampMs: number }> = [];
    for (const id of await this.list(module, "PENDING")) {
      try {
        const st = await fs.stat(this.file(module, "PENDING", id));
        entries.push({ id, stampMs: st.mtimeMs });
      } catch (e) {
        // claimed by someone else between readdir and stat
        if (errnoCode(e) === "ENOENT") continue;
        throw storageError(`stat ${module}/queue/${id}`, e);
      }
    }
    entries.sort((a, b) => a.stampMs - b.stampMs || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return entries.map((e) => e.id);
  }

  private async holdsOtherThanPending(module: string, id: string): Promise<boolean> {
    for (const status of ["STARTED", "DONE", "ERROR"] as const) {
      if (await this.exists(this.file(module, status, id))) return true;
    }
    return false;
  }

  /**
   * Takes a PENDING record into STARTED. The STARTED record is created with
   * an exclusive link, so of two claimers only one gets the task, and a
   * pending duplicate of a task that is already started or finished is
   * dropped instead of handed out a second time.
   */
  private async tryClaim(module: string, id: string): Promise<boolean> {
    const pending = this.file(module, "PENDING", id);
    const started = this.file(module, "STARTED", id);
    try {
      await fs.link(pending, started);
    } catch (e) {
      const code = errnoCode(e);
      if (code === "ENOENT") return false;
      if (code !== "EEXIST") throw storageError(`claim ${module}/${id}`, e);
      if (isDebug()) console.log(`[fs-queue] ${module}/${id} already started, dropping pending duplicate`);
      await this.remove(module, "PENDING", id);
      return false;
    }
    await this.remove(module, "PENDING", id);

    if ((await this.exists(this.file(module, "DONE", id))) || (await this.exists(this.file(module, "ERROR", id)))) {
      if (isDebug()) console.log(`[fs-queue] ${module}/${id} already finished, dropping pending duplicate`);
      await this.remove(module, "STARTED", id);
      return false;
    }
    return true;
  }

  /**
   * Pulls a freshly created PENDING record back when a concurrent submit
   * already moved the task on. A claimer that got there first drops the
   * duplicate itself.
   */
  private async retractIfSuperseded(module: string, id: string): Promise<void> {
    if (!(await this.holdsOtherThanPending(module, id))) return;
    const tmp = this.tempFile(module, "PENDING");
    try {
      await fs.rename(this.file(module, "PENDING", id), tmp);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return;
      throw storageError(`retract ${module}/queue/${id}`, e);
    }
    await this.discard(tmp);
  }

  // ---------------------------------------------------------------------------
  // Contract
  // ---------------------------------------------------------------------------
  async status(module: string, id: string): Promise<TaskStatus> {
    if (!isSafeName(module) || !isSafeName(id)) return "UNKNOWN";
    // most advanced state first: records are written before the old ones are cleared
    for (const status of STATUS_PRECEDENCE) {
      if (await this.exists(this.file(module, status, id))) return status;
    }
    return "UNKNOWN";
  }

  async submit(module: string, doc: string, id?: string): Promise<string> {
    assertSafeName(module, "module name");
    const taskId = id ?? identity(doc);
    assertSafeName(taskId, "task id");

    if ((await this.status(module, taskId)) !== "UNKNOWN") return taskId;
    // an already pending record is the benign "already exists" case
    if (await this.write(module, "PENDING", taskId, doc, { stampMs: this.nowMs(), exclusive: true })) {
      await this.retractIfSuperseded(module, taskId);
    }
    return taskId;
  }

  async result(module: string, id: string, format?: string): Promise<Outcome<string>> {
    const status = await this.status(module, id);
    try {
      switch (status) {
        case "DONE": {
          const result = await this.read(module, "DONE", id);
          if (format === undefined) return ok(result);
          if (!this.registry) {
            return fail("UnknownModule", `No module registry to convert ${module} results to ${format}`);
          }
          return ok(this.registry.convert(module, result, format, id));
        }
        case "ERROR":
          return fail("ProcessingFailed", await this.read(module, "ERROR", id));
        case "UNKNOWN":
          return fail("NotFound", `Unknown document: ${module}/${id}`);
        default:
          return fail("NotReady", `Status of ${module}/${id} is ${status}`);
      }
    } catch (e) {
      if (isQueueError(e)) return { ok: false, error: e };
      // Outcome overwritten between the status check and the read
      if (errnoCode(e) === "ENOENT") return this.result(module, id, format);
      throw storageError(`read ${module}/${id}`, e);
    }
  }

  async claim(module: string): Promise<ClaimedTask | null> {
    if (!isSafeName(module)) return null;
    for (;;) {
      const candidates = await this.pendingByAge(module);
      if (candidates.length === 0) return null;
      await this.ensureDirs(module);

      for (const id of candidates) {
        if (!(await this.tryClaim(module, id))) {
          if (isDebug()) console.log(`[fs-queue] ${module}/${id} not claimable, trying next`);
          continue;
        }
        try {
          return { id, doc: await this.read(module, "STARTED", id) };
        } catch (e) {
          throw storageError(`read ${module}/inprogress/${id}`, e);
        }
      }
    }
  }

  async storeResult(module: string, id: string, result: string): Promise<void> {
    await this.storeOutcome(module, id, result, "DONE");
  }

  async storeError(module: string, id: string, error: string): Promise<void> {
    await this.storeOutcome(module, id, error, "ERROR");
  }

  private async storeOutcome(module: string, id: string, text: string, target: "DONE" | "ERROR"): Promise<void> {
    const status = await this.status(module, id);
    if (status !== "STARTED" && status !== "DONE" && status !== "ERROR") {
      throw new QueueError("InvalidTransition", `Cannot store ${target} for task ${module}/${id} with status ${status}`);
    }
    // write first, then clear the old location
    await this.write(module, target, id, text);
    await this.remove(module, "STARTED", id);
    await this.remove(module, target === "DONE" ? "ERROR" : "DONE", id);
  }

  /** Forces a known task back to PENDING with a fresh submission time. */
  async requeue(module: string, id: string, doc: string): Promise<void> {
    assertSafeName(module, "module name");
    assertSafeName(id, "task id");
    // cleared first: a claimer drops a pending record whose task looks finished
    await this.remove(module, "STARTED", id);
    await this.remove(module, "DONE", id);
    await this.remove(module, "ERROR", id);
    await this.write(module, "PENDING", id, doc, { stampMs: this.nowMs() });
  }

  // ---------------------------------------------------------------------------
  // Bulk
  // ---------------------------------------------------------------------------
  bulkStatus(module: string, ids: readonly string[]): Promise<Record<string, TaskStatus>> {
    return collectStatuses(this, module, ids);
  }

  bulkResult(module: string, ids: readonly string[], format?: string): Promise<Record<string, BulkResultEntry>> {
    return collectResults(this, module, ids, format);
  }

  bulkSubmit(module: string, docs: readonly string[], opts?: BulkSubmitOptions): Promise<string[]> {
    return submitAll(this, module, docs, opts);
  }

  async statistics(module: string): Promise<QueueStatistics> {
    const stats: QueueStatistics = { PENDING: 0, STARTED: 0, DONE: 0, ERROR: 0 };
    if (!isSafeName(module)) return stats;
    for (const status of STORED_STATUSES) {
      stats[status] = (await this.list(module, status)).length;
    }
    return stats;
  }
}
