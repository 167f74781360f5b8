import { z } from "zod";
import { DEFAULT_REQUEST_TIMEOUT_MS, isDebug } from "../config/env.js";
import { assertBulkIds } from "./bulk.js";
import { QueueClient } from "./client.js";
import { fromDescriptor, isErrorDescriptor, QueueError, safeErr, type Outcome, type QueueErrorKind } from "./errors.js";
import {
  isTaskStatus,
  type BulkResultEntry,
  type BulkSubmitOptions,
  type ClaimedTask,
  type QueueStatistics,
  type TaskStatus,
} from "./types.js";
import { ERROR_CONTENT_TYPE, ID_HEADER, STATUS_HEADER, taskPath } from "./wire.js";

/* ======================================================
   Response schemas
====================================================== */
const TaskStatusSchema = z.enum(["UNKNOWN", "PENDING", "STARTED", "DONE", "ERROR"]);

const BulkStatusSchema = z.record(z.string(), TaskStatusSchema);

const BulkResultSchema = z.record(
  z.string(),
  z.union([z.string(), z.object({ kind: z.string(), message: z.string() })])
);

const IdListSchema = z.array(z.string());

const StatisticsSchema = z.object({
  PENDING: z.number().int().nonnegative(),
  STARTED: z.number().int().nonnegative(),
  DONE: z.number().int().nonnegative(),
  ERROR: z.number().int().nonnegative(),
});

// Failures a result lookup reports as an outcome rather than throwing
const RESULT_FAILURE_KINDS: ReadonlySet<QueueErrorKind> = new Set([
  "NotFound",
  "NotReady",
  "ProcessingFailed",
  "UnknownModule",
  "InvalidArgument",
]);

/**
 * Rebuilds a queue error from the service's JSON error descriptor. Null for
 * bodies that are not one, which callers turn into a RemoteError carrying
 * status and body.
 */
function parseDescriptor(body: string): QueueError | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (!isErrorDescriptor(parsed)) return null;
  const known = fromDescriptor(parsed);
  return known && known.kind !== "RemoteError" ? known : null;
}

export type FetchImplementation = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpQueueOptions {
  requestTimeoutMs?: number;
  fetchImplementation?: FetchImplementation;
}

/**
 * Client of a queue service speaking the /modules/... protocol. One round
 * trip per operation, no retries: callers that want them wrap the calls.
 */
export class HttpQueue extends QueueClient {
  readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchImplementation;

  constructor(baseUrl: string, opts: HttpQueueOptions = {}) {
    super();
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImplementation ?? ((input, init) => fetch(input, init));
  }

  private url(path: string, query?: Record<string, string | undefined>): string {
    const params = new URLSearchParams();
    for (const [k, v] of Object.entries(query ?? {})) {
      if (v !== undefined) params.set(k, v);
    }
    const qs = params.toString();
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ""}`;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      if (isDebug()) console.log(`[http-queue] ${init.method ?? "GET"} ${url}`);
      return await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (e) {
      const reason = e instanceof Error && e.name === "AbortError" ? `timed out after ${this.requestTimeoutMs}ms` : safeErr(e);
      throw new QueueError("RemoteError", `${init.method ?? "GET"} ${url}: ${reason}`, { cause: e });
    } finally {
      clearTimeout(t);
    }
  }

  /**
   * Rebuilds a queue error from the service's JSON error descriptor, or
   * falls back to a RemoteError carrying status and body.
   */
  private async errorFrom(res: Response, what: string): Promise<QueueError> {
    const body = await res.text();
    return (
      parseDescriptor(body) ?? new QueueError("RemoteError", `${what}: HTTP ${res.status}`, { status: res.status, body })
    );
  }

  private async readJson<T>(res: Response, schema: z.ZodType<T>, what: string): Promise<T> {
    const body = await res.text();
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      throw new QueueError("RemoteError", `${what}: invalid JSON response`, { status: res.status, body });
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new QueueError("RemoteError", `${what}: unexpected response shape`, { status: res.status, body });
    }
    return parsed.data;
  }

  private async postJson(path: string, payload: unknown, query?: Record<string, string | undefined>): Promise<Response> {
    return this.fetchWithTimeout(this.url(path, query), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
  }

  // ---------------------------------------------------------------------------
  // Contract
  // ---------------------------------------------------------------------------
  async submit(module: string, doc: string, id?: string): Promise<string> {
    const what = `Submitting to ${module}`;
    const res = await this.fetchWithTimeout(this.url(taskPath(module), { id }), {
      method: "POST",
      headers: { "Content-Type": "text/plain; charset=utf-8" },
      body: doc,
    });
    if (res.status !== 202) throw await this.errorFrom(res, what);
    await res.text();

    const taskId = res.headers.get(ID_HEADER);
    if (!taskId) {
      throw new QueueError("RemoteError", `${what}: response has no ${ID_HEADER} header`, { status: res.status, body: "" });
    }
    return taskId;
  }

  async status(module: string, id: string): Promise<TaskStatus> {
    const res = await this.fetchWithTimeout(this.url(taskPath(module, id)), { method: "HEAD" });
    const status = res.headers.get(STATUS_HEADER);
    if (isTaskStatus(status)) return status;
    throw new QueueError("RemoteError", `Cannot determine status for ${module}/${id}: HTTP ${res.status}`, {
      status: res.status,
      body: "",
    });
  }

  async result(module: string, id: string, format?: string): Promise<Outcome<string>> {
    const res = await this.fetchWithTimeout(this.url(taskPath(module, id), { format }), { method: "GET" });
    if (res.status === 200) return { ok: true, value: await res.text() };

    const error = await this.errorFrom(res, `Getting result for ${module}/${id}`);
    if (RESULT_FAILURE_KINDS.has(error.kind)) return { ok: false, error };
    if (res.status === 404) {
      return { ok: false, error: new QueueError("NotFound", `Unknown document: ${module}/${id}`) };
    }
    throw error;
  }

  async claim(module: string): Promise<ClaimedTask | null> {
    const res = await this.fetchWithTimeout(this.url(taskPath(module)), { method: "GET" });
    if (res.status === 404) {
      // an empty queue answers plain text, an unregistered module a descriptor
      const body = await res.text();
      const error = parseDescriptor(body);
      if (error) throw error;
      return null;
    }
    if (res.status !== 200) throw await this.errorFrom(res, `Getting a task for ${module}`);

    const doc = await res.text();
    const id = res.headers.get(ID_HEADER);
    if (!id) {
      throw new QueueError("RemoteError", `Getting a task for ${module}: response has no ${ID_HEADER} header`, {
        status: res.status,
        body: doc,
      });
    }
    return { id, doc };
  }

  async storeResult(module: string, id: string, result: string): Promise<void> {
    await this.put(module, id, result, "text/plain; charset=utf-8");
  }

  async storeError(module: string, id: string, error: string): Promise<void> {
    await this.put(module, id, error, ERROR_CONTENT_TYPE);
  }

  private async put(module: string, id: string, body: string, contentType: string): Promise<void> {
    const res = await this.fetchWithTimeout(this.url(taskPath(module, id)), {
      method: "PUT",
      headers: { "Content-Type": contentType },
      body,
    });
    if (res.status !== 204) throw await this.errorFrom(res, `Storing outcome for ${module}/${id}`);
    await res.text();
  }

  // ---------------------------------------------------------------------------
  // Bulk
  // ---------------------------------------------------------------------------
  async bulkStatus(module: string, ids: readonly string[]): Promise<Record<string, TaskStatus>> {
    if (ids.length === 0) return {};
    const what = `Bulk status for ${module}`;
    const res = await this.postJson(`${taskPath(module)}bulk/status`, ids);
    if (res.status !== 200) throw await this.errorFrom(res, what);
    return this.readJson(res, BulkStatusSchema, what);
  }

  async bulkResult(module: string, ids: readonly string[], format?: string): Promise<Record<string, BulkResultEntry>> {
    if (ids.length === 0) return {};
    const what = `Bulk result for ${module}`;
    const res = await this.postJson(`${taskPath(module)}bulk/result`, ids, { format });
    if (res.status !== 200) throw await this.errorFrom(res, what);
    return this.readJson(res, BulkResultSchema, what);
  }

  async bulkSubmit(module: string, docs: readonly string[], opts: BulkSubmitOptions = {}): Promise<string[]> {
    assertBulkIds(docs, opts.ids);
    if (docs.length === 0) return [];

    const what = `Bulk submit to ${module}`;
    const ids = opts.ids;
    const payload = ids ? Object.fromEntries(ids.map((id, i) => [id, docs[i]])) : docs;
    const res = await this.postJson(`${taskPath(module)}bulk/process`, payload, {
      reset_error: opts.resetError ? "1" : undefined,
      reset_pending: opts.resetPending ? "1" : undefined,
    });
    if (res.status !== 200) throw await this.errorFrom(res, what);

    const returned = await this.readJson(res, IdListSchema, what);
    if (returned.length !== docs.length) {
      throw new QueueError("RemoteError", `${what}: expected ${docs.length} ids, got ${returned.length}`, {
        status: res.status,
        body: JSON.stringify(returned),
      });
    }
    // explicit ids come back verbatim; keep the caller's order (JSON objects
    // reorder integer-like keys)
    return ids ? [...ids] : returned;
  }

  async statistics(module: string): Promise<QueueStatistics> {
    const what = `Statistics for ${module}`;
    const res = await this.fetchWithTimeout(this.url(`${taskPath(module)}bulk/statistics`), { method: "GET" });
    if (res.status !== 200) throw await this.errorFrom(res, what);
    return this.readJson(res, StatisticsSchema, what);
  }
}
