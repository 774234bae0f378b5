/**
 * Backoff helpers
 */

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * attempt: 1 -> base, 2 -> 2x base, 3 -> 4x base ... capped at maxDelayMs, plus up to 25% jitter
 */
export function getRetryDelayMs(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
  const base = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** (attempt - 1));
  const jitter = Math.floor(random() * Math.max(1, Math.floor(base * 0.25)));
  return base + jitter;
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return;

  return new Promise(resolve => {
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
