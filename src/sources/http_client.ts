import { ParseError, SourceUnavailableError, errorMessage } from "../domain/errors";
import { getLogger } from "../util/logger";

const logger = getLogger("sources/http_client");

/** The subset of the fetch Response the fetchers rely on. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type HttpFetch = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<HttpResponse>;

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  timeoutMs: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  timeoutMs: 30_000,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

const DEFAULT_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko)",
  Accept: "application/json, application/rss+xml, text/xml;q=0.9, */*;q=0.8",
};

const nodeFetch: HttpFetch = (url, init) => fetch(url, init);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Settles with `work`, or rejects as soon as `signal` aborts. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

type Attempt =
  | { kind: "body"; body: string }
  | { kind: "status"; status: number; statusText: string }
  | { kind: "timeout" }
  | { kind: "error"; error: unknown };

/**
 * One request, headers and body both under the same deadline. Bodies of
 * non-OK responses are drained so the connection is released.
 */
async function attemptOnce(
  fetchImpl: HttpFetch,
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<Attempt> {
  const controller = new AbortController();
  const { signal } = controller;
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await untilAborted(fetchImpl(url, { headers, signal }), signal);
    if (!response.ok) {
      await untilAborted(response.text(), signal).catch(() => undefined);
      return {
        kind: "status",
        status: response.status,
        statusText: response.statusText,
      };
    }
    return { kind: "body", body: await untilAborted(response.text(), signal) };
  } catch (error) {
    return timedOut ? { kind: "timeout" } : { kind: "error", error };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetches a body with a per-attempt timeout covering headers and body, retrying
 * network errors, timeouts and 5xx responses with exponential backoff. 4xx
 * responses fail immediately.
 *
 * Throws SourceUnavailableError once attempts are exhausted.
 */
export async function fetchWithRetry(
  url: string,
  options: Partial<RetryOptions> & {
    fetchImpl?: HttpFetch;
    headers?: Record<string, string>;
  } = {}
): Promise<string> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const fetchImpl = options.fetchImpl ?? nodeFetch;
  const headers = { ...DEFAULT_HEADERS, ...options.headers };
  const maxAttempts = opts.maxRetries + 1;
  let lastFailure = "unknown error";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const outcome = await attemptOnce(fetchImpl, url, headers, opts.timeoutMs);

    switch (outcome.kind) {
      case "body":
        return outcome.body;
      case "status":
        if (outcome.status >= 400 && outcome.status < 500) {
          logger.warn({ url, status: outcome.status }, "Client error, not retrying");
          throw new SourceUnavailableError(
            url,
            attempt,
            `HTTP ${outcome.status} ${outcome.statusText} from ${url}`
          );
        }
        lastFailure = `HTTP ${outcome.status} ${outcome.statusText}`;
        break;
      case "timeout":
        lastFailure = `timed out after ${opts.timeoutMs}ms`;
        break;
      case "error":
        lastFailure = errorMessage(outcome.error);
        break;
    }

    logger.warn(
      { url, attempt, maxAttempts, reason: lastFailure },
      "Request attempt failed"
    );

    if (attempt < maxAttempts) {
      const delay = Math.min(
        opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1),
        opts.maxDelayMs
      );
      await sleep(delay);
    }
  }

  throw new SourceUnavailableError(
    url,
    maxAttempts,
    `Failed to fetch ${url} after ${maxAttempts} attempts: ${lastFailure}`
  );
}

export interface HttpClientOptions extends Partial<RetryOptions> {
  fetchImpl?: HttpFetch;
  headers?: Record<string, string>;
}

/**
 * Shared retrying client handed to every network-backed fetcher.
 */
export class HttpClient {
  constructor(private readonly options: HttpClientOptions = {}) {}

  getText(url: string): Promise<string> {
    return fetchWithRetry(url, this.options);
  }

  async getJson(url: string): Promise<unknown> {
    const body = await this.getText(url);
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new ParseError(url, `Response from ${url} is not valid JSON`, {
        cause: error,
      });
    }
  }
}
