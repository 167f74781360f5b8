import fs from "node:fs";
import path from "node:path";

export type QueueEvent =
  | { type: "TASK_CLAIMED"; module: string; taskId: string; workerId: string }
  | { type: "TASK_DONE"; module: string; taskId: string; workerId: string; ms: number }
  | { type: "TASK_ERROR"; module: string; taskId: string; workerId: string; ms: number; error: string };

// log files whose directory has been created by this process
const preparedLogs = new Set<string>();

function eventLogPath(): string | null {
  const file = (process.env.QUEUE_EVENT_LOG || "").trim();
  return file ? path.resolve(file) : null;
}

/**
 * Appends one JSON line per event, tagged with time and pid, to
 * $QUEUE_EVENT_LOG. No-op when unset.
 */
export function appendQueueEvent(event: QueueEvent): void {
  const file = eventLogPath();
  if (!file) return;

  if (!preparedLogs.has(file)) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    preparedLogs.add(file);
  }
  fs.appendFileSync(file, JSON.stringify({ ts: Date.now(), pid: process.pid, ...event }) + "\n", "utf8");
}
