import { MalformedResponseError, RateLimitedError, TransientNetworkError, UpstreamError } from "./errors.js";
import { logger } from "./logger.js";

export type FetchJsonOptions = {
  service: string;
  timeoutMs: number;
  headers?: Record<string, string>;
};

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - Date.now());
}

/**
 * GET a JSON document. Failures are mapped onto the engine's error taxonomy so the retry policy
 * can tell transient ones (network, timeout, 5xx, 408) and rate limiting (429) from the rest.
 */
export async function fetchJson(url: string, opts: FetchJsonOptions): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetch(url, {
      headers: { Accept: "application/json", ...(opts.headers ?? {}) },
      signal: AbortSignal.timeout(opts.timeoutMs)
    });
  } catch (e) {
    throw new TransientNetworkError(opts.service, `request failed: ${e instanceof Error ? e.name : "Error"}`, { cause: e });
  }

  if (resp.status === 429) {
    throw new RateLimitedError(opts.service, parseRetryAfter(resp.headers.get("retry-after")));
  }

  const text = await resp.text().catch(() => "");
  if (!resp.ok) {
    logger.warn(`${opts.service} HTTP ${resp.status} ${resp.statusText}: ${text.slice(0, 500)}`);
    if (resp.status >= 500 || resp.status === 408) {
      throw new TransientNetworkError(opts.service, `HTTP ${resp.status}`);
    }
    throw new UpstreamError(opts.service, resp.status, text.slice(0, 200));
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new MalformedResponseError(`${opts.service} returned non-JSON: ${text.slice(0, 200)}`);
  }
}
