import type { ErrorDescriptor, Outcome } from "./errors.js";

export const STORED_STATUSES = ["PENDING", "STARTED", "DONE", "ERROR"] as const;

export type StoredStatus = (typeof STORED_STATUSES)[number];

// UNKNOWN is never stored: it is the answer when no record exists
export type TaskStatus = "UNKNOWN" | StoredStatus;

export interface ClaimedTask {
  id: string;
  doc: string;
}

export type QueueStatistics = Record<StoredStatus, number>;

export type BulkResultEntry = string | ErrorDescriptor;

export interface BulkSubmitOptions {
  // Explicit ids, position-matched with the submitted docs
  ids?: readonly string[];
  resetError?: boolean;
  resetPending?: boolean;
}

export interface ProcessInlineOptions {
  intervalMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Single-id operations every backend implements natively.
 */
export interface TaskStore {
  submit(module: string, doc: string, id?: string): Promise<string>;
  status(module: string, id: string): Promise<TaskStatus>;
  result(module: string, id: string, format?: string): Promise<Outcome<string>>;
  claim(module: string): Promise<ClaimedTask | null>;
  storeResult(module: string, id: string, result: string): Promise<void>;
  storeError(module: string, id: string, error: string): Promise<void>;
}

export interface TaskQueue extends TaskStore {
  claimMany(module: string, n: number): AsyncGenerator<ClaimedTask, void, undefined>;
  processInline(module: string, doc: string, opts?: ProcessInlineOptions): Promise<Outcome<string>>;
  bulkStatus(module: string, ids: readonly string[]): Promise<Record<string, TaskStatus>>;
  bulkResult(module: string, ids: readonly string[], format?: string): Promise<Record<string, BulkResultEntry>>;
  bulkSubmit(module: string, docs: readonly string[], opts?: BulkSubmitOptions): Promise<string[]>;
  statistics(module: string): Promise<QueueStatistics>;
}

export function isStoredStatus(value: unknown): value is StoredStatus {
  return typeof value === "string" && STORED_STATUSES.some((s) => s === value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return value === "UNKNOWN" || isStoredStatus(value);
}

export function isTerminal(status: TaskStatus): status is "DONE" | "ERROR" {
  return status === "DONE" || status === "ERROR";
}
