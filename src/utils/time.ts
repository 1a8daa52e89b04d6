/**
 * Clock function, injectable for tests
 */
export type ClockFn = () => number;

/**
 * Sleep for the given milliseconds. Resolves early (never rejects) when the
 * signal aborts, so callers re-check the signal after waking.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format a date as HH:MM:SS (UTC)
 */
export function formatClockTime(date: Date): string {
  return date.toISOString().slice(11, 19);
}

/**
 * Whole days between two timestamps, rounded down
 */
export function daysBetween(fromMs: number, toMs: number): number {
  return Math.floor((toMs - fromMs) / (24 * 60 * 60 * 1000));
}
