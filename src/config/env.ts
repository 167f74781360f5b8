export const DEFAULT_QUEUE_ADDRESS = "./.queue";
export const DEFAULT_PORT = 5001;
export const DEFAULT_BIND_HOST = "127.0.0.1";
export const DEFAULT_RATE_LIMIT_PER_MINUTE = 600;
export const DEFAULT_BODY_LIMIT = "10mb";
export const DEFAULT_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_MAX_CLAIMS_PER_TICK = 1;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_INLINE_POLL_MS = 100;

export function getEnvInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export function getEnvBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (v === undefined) return fallback;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

export function getEnvString(name: string, fallback: string): string {
  const v = (process.env[name] || "").trim();
  return v.length > 0 ? v : fallback;
}

export function getEnvList(name: string): string[] {
  return (process.env[name] || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function isDebug(): boolean {
  return getEnvBool("DEBUG", false);
}
