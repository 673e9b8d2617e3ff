import {
  DESKTOP_UA,
  FETCH_MAX_REDIRECTS,
  FETCH_MAX_RETRIES,
  FETCH_MAX_RETRY_DELAY_MS,
  FETCH_RETRY_DELAY_MS,
  FETCH_TIMEOUT_MS,
  MAX_RESPONSE_BYTES,
} from "./config";
import type { CrawlFetchContext, CrawlPage, PageFetcher } from "./deepcrawl/bfs";
import { CourseIndexError, errorMessage, isCourseIndexError } from "./errors";

export interface HttpFetcherOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  maxRedirects?: number;
  maxBytes?: number;
  userAgent?: string;
}

const REDIRECT_STATUS_CODES = new Set([301, 302, 303, 307, 308]);

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

function waitMs(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getRetryDelayMs(
  attempt: number,
  retryDelayMs: number,
  maxRetryDelayMs: number,
): number {
  return Math.min(retryDelayMs * 2 ** attempt, maxRetryDelayMs);
}

function errorCode(error: unknown): string {
  if (!(error instanceof Error)) return "";
  if ("code" in error && typeof error.code === "string") {
    return error.code.toUpperCase();
  }
  const cause = error.cause;
  if (
    typeof cause === "object" &&
    cause !== null &&
    "code" in cause &&
    typeof cause.code === "string"
  ) {
    return cause.code.toUpperCase();
  }
  return "";
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "target host";
  }
}

function fetchFailed(url: string, message: string, details: Record<string, unknown> = {}): CourseIndexError {
  return new CourseIndexError("FETCH_FAILED", message, { url, ...details });
}

function normalizeFetchFailure(error: unknown, requestUrl: string): CourseIndexError {
  if (isCourseIndexError(error)) return error;

  const code = errorCode(error);
  const message = errorMessage(error);
  const lower = message.toLowerCase();
  const host = hostnameOf(requestUrl);

  if (
    code === "ENOTFOUND" ||
    code === "EAI_AGAIN" ||
    lower.includes("enotfound") ||
    lower.includes("eai_again") ||
    lower.includes("could not resolve host")
  ) {
    return fetchFailed(requestUrl, `DNS resolution failed for ${host}.`);
  }

  if (
    code === "ECONNRESET" ||
    lower.includes("econnreset") ||
    lower.includes("socket hang up") ||
    lower.includes("connection reset")
  ) {
    return fetchFailed(requestUrl, "Connection reset while fetching the page.");
  }

  if (
    code === "ETIMEDOUT" ||
    (error instanceof Error && error.name === "TimeoutError") ||
    lower.includes("timed out") ||
    lower.includes("timeout")
  ) {
    return fetchFailed(requestUrl, "Request timed out while fetching the page.");
  }

  return fetchFailed(requestUrl, message);
}

/** Releases the connection behind a response whose body is not read. */
async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  try {
    await response.body.cancel();
  } catch (error) {
    console.warn("Failed to discard response body:", errorMessage(error));
  }
}

async function readTextWithLimit(
  response: Response,
  maxBytes: number,
  url: string,
): Promise<string> {
  const body = response.body;
  if (!body) return "";

  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > maxBytes) {
        await reader.cancel();
        throw fetchFailed(url, `Response exceeds ${maxBytes} bytes.`, { maxBytes });
      }
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  const merged = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return new TextDecoder().decode(merged);
}

/**
 * Page fetcher over the global fetch: GET with a per-attempt timeout,
 * exponential backoff on 429/5xx and network errors, manual redirect
 * following and a response size cap. Anything but a final 200 throws
 * FETCH_FAILED.
 */
export function createHttpPageFetcher(options: HttpFetcherOptions = {}): PageFetcher {
  const timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
  const maxRetries = Math.max(0, options.maxRetries ?? FETCH_MAX_RETRIES);
  const retryDelayMs = Math.max(0, options.retryDelayMs ?? FETCH_RETRY_DELAY_MS);
  const maxRetryDelayMs = Math.max(0, options.maxRetryDelayMs ?? FETCH_MAX_RETRY_DELAY_MS);
  const maxRedirects = Math.max(0, options.maxRedirects ?? FETCH_MAX_REDIRECTS);
  const maxBytes = options.maxBytes ?? MAX_RESPONSE_BYTES;
  const headers = {
    "User-Agent": options.userAgent ?? DESKTOP_UA,
    Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
  };

  async function fetchWithRetry(url: string, signal?: AbortSignal): Promise<Response> {
    for (let attempt = 0; ; attempt++) {
      const timeout = AbortSignal.timeout(timeoutMs);
      try {
        const response = await fetch(url, {
          method: "GET",
          headers,
          redirect: "manual",
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        });
        if (!isRetryableStatus(response.status) || attempt >= maxRetries) {
          return response;
        }
        await discardBody(response);
      } catch (error) {
        const failure = normalizeFetchFailure(error, url);
        if (signal?.aborted || attempt >= maxRetries) {
          throw failure;
        }
      }
      await waitMs(getRetryDelayMs(attempt, retryDelayMs, maxRetryDelayMs));
    }
  }

  return async (url: string, context: CrawlFetchContext): Promise<CrawlPage> => {
    let currentUrl = url;
    for (let hops = 0; ; hops++) {
      const response = await fetchWithRetry(currentUrl, context.signal);

      if (REDIRECT_STATUS_CODES.has(response.status)) {
        await discardBody(response);
        const location = response.headers.get("Location");
        if (!location) {
          throw fetchFailed(currentUrl, `Redirect ${response.status} without a Location header.`);
        }
        if (hops >= maxRedirects) {
          throw fetchFailed(url, `Too many redirects (more than ${maxRedirects}).`);
        }
        currentUrl = new URL(location, currentUrl).href;
        continue;
      }

      if (response.status !== 200) {
        await discardBody(response);
        throw fetchFailed(currentUrl, `HTTP ${response.status} while fetching the page.`, {
          status: response.status,
        });
      }

      const html = await readTextWithLimit(response, maxBytes, currentUrl);
      return {
        url: currentUrl,
        html,
        contentType: response.headers.get("Content-Type") ?? undefined,
      };
    }
  };
}
