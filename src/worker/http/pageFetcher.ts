import { fetchWithPolicy, type FetchPolicyOptions, type PageEncoding } from "./fetchWithPolicy";

export interface PageFetchOptions {
  encoding: PageEncoding;
  rateLimitMs: number;
  /** Requests sharing a key share one rate limit (the site name) */
  rateLimitKey: string;
}

/**
 * Network collaborator of the downloader. Resolves with the decoded body or
 * rejects with FetchError.
 */
export interface PageFetcher {
  fetch(url: string, opts: PageFetchOptions): Promise<string>;
}

/** PageFetcher backed by fetchWithPolicy over the global fetch. */
export function createPolicyFetcher(
  defaults: Pick<FetchPolicyOptions, "timeoutMs" | "maxRetries" | "baseBackoffMs" | "sleep"> = {}
): PageFetcher {
  return {
    async fetch(url, opts) {
      const result = await fetchWithPolicy(url, { ...defaults, ...opts });
      return result.content;
    },
  };
}
