export const QUEUE_ERROR_KINDS = [
  "UnknownModule",
  "InvalidTransition",
  "InvalidArgument",
  "NotFound",
  "NotReady",
  "ProcessingFailed",
  "RemoteError",
  "StorageError",
  "Timeout",
] as const;

export type QueueErrorKind = (typeof QUEUE_ERROR_KINDS)[number];

/**
 * Wire form of a queue error, as answered by the queue service and as stored
 * per id in bulk result maps.
 */
export type ErrorDescriptor = {
  kind: string;
  message: string;
};

export type QueueErrorOptions = {
  // RemoteError only: HTTP status and raw response body
  status?: number;
  body?: string;
  cause?: unknown;
};

export class QueueError extends Error {
  readonly kind: QueueErrorKind;
  readonly status?: number;
  readonly body?: string;

  constructor(kind: QueueErrorKind, message: string, opts: QueueErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "QueueError";
    this.kind = kind;
    this.status = opts.status;
    this.body = opts.body;
  }
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: QueueError };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: QueueErrorKind, message: string, opts?: QueueErrorOptions): Outcome<T> {
  return { ok: false, error: new QueueError(kind, message, opts) };
}

/** Throws the carried error of a failed outcome. */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}

export function isQueueErrorKind(value: unknown): value is QueueErrorKind {
  return typeof value === "string" && QUEUE_ERROR_KINDS.some((k) => k === value);
}

export function isQueueError(e: unknown, kind?: QueueErrorKind): e is QueueError {
  return e instanceof QueueError && (kind === undefined || e.kind === kind);
}

export function isErrorDescriptor(value: unknown): value is ErrorDescriptor {
  if (typeof value !== "object" || value === null) return false;
  const kind: unknown = Reflect.get(value, "kind");
  const message: unknown = Reflect.get(value, "message");
  return typeof kind === "string" && typeof message === "string";
}

export function toDescriptor(e: unknown): ErrorDescriptor {
  if (e instanceof QueueError) return { kind: e.kind, message: e.message };
  return { kind: "StorageError", message: safeErr(e) };
}

export function fromDescriptor(d: ErrorDescriptor): QueueError | null {
  return isQueueErrorKind(d.kind) ? new QueueError(d.kind, d.message) : null;
}

export function safeErr(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Node system errors (ENOENT, EEXIST, ...) carry a string `code`. */
export function errnoCode(e: unknown): string | undefined {
  if (!(e instanceof Error)) return undefined;
  const code: unknown = Reflect.get(e, "code");
  return typeof code === "string" ? code : undefined;
}
