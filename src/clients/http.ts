/**
 * Bounded HTTP requests for the registry and upstream collaborators.
 *
 * Every request carries a timeout; a timeout or network failure surfaces as
 * a QueryError so the caller's track is downgraded instead of hanging.
 * Retries apply to network errors, 429 and 5xx only. Other statuses are
 * returned to the caller, which decides what "no data" looks like.
 */

import {
  createTypedError,
  httpQueryError,
  httpTimeoutError,
  InvariantError,
  malformedResponseError,
  QueryError,
} from '../domain/errors';

/** The subset of a fetch Response the clients read. */
export interface HttpResponseLike {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

/** Fetch function type (injectable for testing). */
export type FetchFn = (
  url: string,
  init: { method: string; headers: Record<string, string>; body?: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export const NO_RETRY: RetryPolicy = { maxAttempts: 1, backoffBaseMs: 0, backoffMaxMs: 0 };

export interface HttpClientOptions {
  domain: 'REGISTRY' | 'UPSTREAM';
  timeoutMs: number;
  retry?: RetryPolicy;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

export interface HttpRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  json?: unknown;
}

export interface HttpResult {
  url: string;
  status: number;
  headers: { get(name: string): string | null };
  text: string;
}

const defaultFetch: FetchFn = (url, init) => fetch(url, init);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.retry = options.retry ?? NO_RETRY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Send a request, retrying transient failures per policy. Returns the last
   * response once a non-retryable status arrives or attempts run out.
   */
  async request(url: string, request: HttpRequest = {}): Promise<HttpResult> {
    const headers: Record<string, string> = { ...request.headers };
    let body: string | undefined;
    if (request.json !== undefined) {
      body = JSON.stringify(request.json);
      headers['Content-Type'] = 'application/json';
    }
    const method = request.method ?? (body === undefined ? 'GET' : 'POST');

    let lastError: QueryError | undefined;
    let lastResult: HttpResult | undefined;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = Math.min(this.retry.backoffBaseMs * Math.pow(2, attempt - 2), this.retry.backoffMaxMs);
        await this.sleep(delay);
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

      try {
        const response = await this.fetchFn(url, { method, headers, body, signal: controller.signal });
        const text = await response.text();
        lastResult = { url, status: response.status, headers: response.headers, text };
        lastError = undefined;
        if (!isRetryableStatus(response.status)) return lastResult;
      } catch (err) {
        lastError = controller.signal.aborted
          ? new QueryError(httpTimeoutError(this.options.domain, url, this.options.timeoutMs))
          : new QueryError(
              httpQueryError(this.options.domain, `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`),
            );
      } finally {
        clearTimeout(timeout);
      }
    }

    if (lastError) throw lastError;
    if (lastResult) return lastResult;
    throw new QueryError(
      createTypedError({
        code: `${this.options.domain}.HTTP.NO_ATTEMPT`,
        message: `No request was attempted for ${url}`,
      }),
    );
  }

  /** Throw a QueryError unless the result is 2xx. */
  ensureOk(result: HttpResult): HttpResult {
    if (result.status < 200 || result.status >= 300) {
      throw new QueryError(
        httpQueryError(this.options.domain, `Request to ${result.url} returned HTTP ${result.status}`, result.status, {
          url: result.url,
        }),
      );
    }
    return result;
  }
}

/** Parse a response body as JSON; a body that is not JSON breaks the service contract. */
export function parseJsonBody(result: HttpResult): unknown {
  try {
    return JSON.parse(result.text);
  } catch (err) {
    throw new InvariantError(
      malformedResponseError(result.url, [err instanceof Error ? err.message : 'body is not JSON']),
    );
  }
}
