import { FetchError, errorMessage } from "@/lib/errors";
import { getDomain, sleep, waitForRateLimit, type Sleep } from "./rateLimit";

const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const DEFAULT_TIMEOUT_MS = 60000;
const MAX_RETRIES = 3;
const BASE_BACKOFF_MS = 1000;

export type PageEncoding = "utf-8" | "windows-1251";

export interface FetchPolicyOptions {
  /** Request timeout in ms per attempt (default 60000) */
  timeoutMs?: number;
  /** Max retries after the first attempt (default 3) */
  maxRetries?: number;
  /** Base for exponential backoff in ms (default 1000) */
  baseBackoffMs?: number;
  /** Minimum delay between attempts under the same rate-limit key (default 1000) */
  rateLimitMs?: number;
  /** Rate-limit key; defaults to the URL's domain */
  rateLimitKey?: string;
  /** Character set the response body is decoded with (default utf-8) */
  encoding?: PageEncoding;
  /** Extra headers to merge in */
  headers?: Record<string, string>;
  /** Replaces setTimeout-based waiting for backoff and rate limiting */
  sleep?: Sleep;
}

export interface PolicyFetchResult {
  httpStatus: number;
  content: string;
  finalUrl: string;
}

/** 429 and 5xx are worth another attempt; other statuses fail at once. */
function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Fetch a URL with:
 * - Per-attempt timeout
 * - Retries with exponential backoff + jitter
 * - Consistent User-Agent header
 * - Keyed rate limiting before every attempt
 * - Body decoding in the site's encoding
 *
 * Throws FetchError once the attempts are exhausted or on a non-retryable status.
 */
export async function fetchWithPolicy(
  url: string,
  opts: FetchPolicyOptions = {}
): Promise<PolicyFetchResult> {
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxRetries = MAX_RETRIES,
    baseBackoffMs = BASE_BACKOFF_MS,
    rateLimitMs,
    rateLimitKey = getDomain(url),
    encoding = "utf-8",
    headers = {},
    sleep: wait = sleep,
  } = opts;

  let lastError = "no attempt made";
  let lastStatus: number | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const backoff =
        baseBackoffMs * Math.pow(2, attempt - 1) + Math.random() * baseBackoffMs;
      console.log(
        `[fetchWithPolicy] Retry ${attempt}/${maxRetries} for ${url} (waiting ${Math.round(backoff)}ms)`
      );
      await wait(backoff);
    }

    await waitForRateLimit(rateLimitKey, rateLimitMs, wait);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          "User-Agent": USER_AGENT,
          Accept:
            "text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7",
          "Accept-Language": "bg-BG,bg;q=0.9,en;q=0.5",
          ...headers,
        },
        redirect: "follow",
      });

      if (!response.ok) {
        lastStatus = response.status;
        lastError = `HTTP ${response.status}`;
        if (!isRetryableStatus(response.status)) {
          throw new FetchError(`HTTP ${response.status} for ${url}`, {
            url,
            httpStatus: response.status,
          });
        }
        console.warn(
          `[fetchWithPolicy] Attempt ${attempt + 1} got HTTP ${response.status} for ${url}`
        );
        continue;
      }

      const bytes = await response.arrayBuffer();
      const content = new TextDecoder(encoding).decode(bytes);

      return {
        httpStatus: response.status,
        content,
        finalUrl: response.url || url,
      };
    } catch (err) {
      if (err instanceof FetchError) throw err;
      lastError = errorMessage(err);

      if (err instanceof Error && err.name === "AbortError") {
        console.warn(`[fetchWithPolicy] Timeout after ${timeoutMs}ms for ${url}`);
      } else {
        console.warn(
          `[fetchWithPolicy] Attempt ${attempt + 1} failed for ${url}: ${lastError}`
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  throw new FetchError(
    `All ${maxRetries + 1} attempts failed for ${url}: ${lastError}`,
    { url, httpStatus: lastStatus }
  );
}
