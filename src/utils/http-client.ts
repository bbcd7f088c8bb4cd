import { createChildLogger } from "./logger.js";
import { FetchError } from "../errors.js";
import type { TokenBucketRateLimiter } from "./rate-limiter.js";

const log = createChildLogger("http-client");

export interface FetchOptions extends RequestInit {
  retries?: number;
  retryDelay?: number;
  rateLimiter?: TokenBucketRateLimiter;
  timeout?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function fetchOnce(url: string, init: RequestInit, timeout: number): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new FetchError(`Request to ${url} timed out after ${timeout}ms`, null, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Request to ${url} failed: ${reason}`, null, { cause: error });
  } finally {
    clearTimeout(timer);
  }
}

/** Releases the connection held by a response whose body is not read. */
export async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

/**
 * Issues a request and returns the response whatever its status. Transport
 * failures become {@link FetchError}. Server errors are retried up to
 * `retries` times with linear backoff; the last response is returned as is.
 * Rate-limited responses are never retried.
 */
export async function fetchWithRetry(
  url: string,
  options: FetchOptions = {},
): Promise<Response> {
  const {
    retries = 0,
    retryDelay = 1000,
    rateLimiter,
    timeout = 30000,
    ...fetchOpts
  } = options;

  for (let attempt = 0; ; attempt++) {
    if (rateLimiter) {
      await rateLimiter.acquire();
    }

    let response: Response;
    try {
      response = await fetchOnce(url, fetchOpts, timeout);
    } catch (error) {
      if (attempt >= retries) {
        log.error({ url, err: error, attempt }, "Request failed after all retries");
        throw error;
      }
      log.warn({ url, err: error, attempt }, "Request failed, retrying");
      await sleep(retryDelay * (attempt + 1));
      continue;
    }

    if (attempt < retries && response.status >= 500) {
      log.warn({ url, status: response.status, attempt }, "Server error, retrying");
      await discardBody(response);
      await sleep(retryDelay * (attempt + 1));
      continue;
    }

    return response;
  }
}

export async function fetchText(url: string, options: FetchOptions = {}): Promise<string> {
  const response = await fetchWithRetry(url, options);

  if (!response.ok) {
    await discardBody(response);
    throw new FetchError(`HTTP ${response.status} for ${url}: ${response.statusText}`, response.status);
  }

  return response.text();
}
