/**
 * Converts a `Retry-After` header into milliseconds. Accepts delta-seconds
 * and HTTP dates; returns undefined for anything else.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed)) {
    return undefined;
  }
  return Math.max(0, parsed - now);
}

/** `min(2^attempt, capSeconds)` seconds, in milliseconds. */
export function exponentialBackoffMs(attempt: number, capSeconds: number): number {
  return Math.min(2 ** attempt, capSeconds) * 1000;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(ms % 1000 === 0 ? 0 : 1)}s`;
}
