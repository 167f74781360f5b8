import type { TaskStatus } from "./types.js";

// Content-Type marking a PUT body as an error description instead of a result
export const ERROR_CONTENT_TYPE = "application/prs.error+text";

export const STATUS_HEADER = "Status";
export const ID_HEADER = "ID";

export const STATUS_CODES: Record<TaskStatus, number> = {
  UNKNOWN: 404,
  PENDING: 202,
  STARTED: 202,
  DONE: 200,
  ERROR: 500,
};

const TRUE_FLAGS = new Set(["1", "Y", "True", "true"]);

export function parseFlag(value: unknown): boolean {
  return typeof value === "string" && TRUE_FLAGS.has(value);
}

export function taskPath(module: string, id?: string): string {
  const base = `/modules/${encodeURIComponent(module)}/`;
  return id === undefined ? base : base + encodeURIComponent(id);
}
