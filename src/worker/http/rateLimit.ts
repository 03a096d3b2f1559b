/**
 * Keyed rate limiter. Enforces a minimum delay between requests sharing a
 * key (the site name, or the URL's domain). Defaults to 1000ms (1 req/sec).
 */

const lastRequestTime = new Map<string, number>();

export const DEFAULT_DELAY_MS = 1000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function getDomain(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "unknown";
  }
}

/**
 * Wait until `delayMs` has passed since the last request under `key`.
 * Call this BEFORE every request attempt, retries included.
 */
export async function waitForRateLimit(
  key: string,
  delayMs: number = DEFAULT_DELAY_MS,
  wait: Sleep = sleep
): Promise<void> {
  const last = lastRequestTime.get(key);
  if (last !== undefined) {
    const elapsed = Date.now() - last;
    if (elapsed < delayMs) {
      await wait(delayMs - elapsed);
    }
  }
  lastRequestTime.set(key, Date.now());
}

/** Forget all recorded request times. */
export function resetRateLimits(): void {
  lastRequestTime.clear();
}
