import { createHash } from "node:crypto";

const TASK_ID_REGEX = /^0x[0-9a-f]{32}$/;

/** True when `value` already has the shape of a generated task id. */
export function isTaskId(value: string): boolean {
  return TASK_ID_REGEX.test(value);
}

/**
 * Task id of a document: "0x" + md5 of its UTF-8 bytes.
 * A value that already looks like a task id is passed through, so callers can
 * hand either a document or its id to the same operation.
 */
export function identity(doc: string): string {
  if (isTaskId(doc)) return doc;
  return "0x" + createHash("md5").update(doc, "utf8").digest("hex");
}
