import { createLogger, errorMessage, FetchError, type HarvestEnv } from "@sdg-harvest/shared";
import pLimit, { type LimitFunction } from "p-limit";

import { abortReason, calculateBackoffMs, parseRetryAfterMs, sleep } from "./backoff";

const log = createLogger({ component: "fetcher" });

const RETRYABLE_STATUSES = new Set([408, 425, 429]);

export interface FetcherOptions {
  timeoutMs: number;
  /** Total tries per request, including the first. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Simultaneous requests across everything this fetcher serves (one run). */
  maxConcurrency: number;
  userAgent: string;
  maxBytes: number;
  politenessDelayMs: number;
  /** Aborts every pending wait and in-flight request. */
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
  sleepImpl?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface HttpRequestOptions {
  accept?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string | null;
  bytes: Uint8Array;
}

/**
 * What source adapters need from the network. The Fetcher is the production
 * implementation; tests substitute in-process doubles.
 */
export interface HttpClient {
  getText(url: string, options?: HttpRequestOptions): Promise<string>;
  getBytes(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export function fetcherOptionsFromEnv(
  env: HarvestEnv,
  overrides: Partial<FetcherOptions> = {},
): FetcherOptions {
  return {
    timeoutMs: env.http.timeoutMs,
    maxAttempts: env.http.maxAttempts,
    backoffBaseMs: env.http.backoffBaseMs,
    backoffMaxMs: env.http.backoffMaxMs,
    maxConcurrency: env.maxConnections,
    userAgent: env.http.userAgent,
    maxBytes: env.http.maxBytes,
    politenessDelayMs: env.http.politenessDelayMs,
    ...overrides,
  };
}

function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status) || status >= 500;
}

/**
 * HTTP GET with per-attempt timeout, bounded exponential-backoff retries and a
 * concurrency cap shared by every request it serves.
 *
 * Backoff sleeps happen outside the concurrency slot so a throttled host does not
 * starve other requests of the run.
 */
export class Fetcher implements HttpClient {
  private readonly limit: LimitFunction;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: FetcherOptions) {
    this.limit = pLimit(Math.max(1, Math.floor(options.maxConcurrency)));
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleepImpl = options.sleepImpl ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /** Requests currently holding a concurrency slot. */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Requests waiting for a slot. */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  async getText(url: string, options: HttpRequestOptions = {}): Promise<string> {
    const response = await this.getBytes(url, {
      accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      ...options,
    });
    return new TextDecoder("utf-8").decode(response.bytes);
  }

  async getBytes(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const signal = options.signal ?? this.options.signal;
    const maxAttempts = Math.max(1, this.options.maxAttempts);

    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) throw this.cancelled(url, abortReason(signal));

      try {
        const response = await this.limit(() => this.attempt(url, options.accept, signal));
        await this.politenessPause(url, signal);
        return response;
      } catch (error) {
        const fetchError =
          error instanceof FetchError
            ? error
            : new FetchError(`Request failed for ${url}: ${errorMessage(error)}`, {
                kind: "transient",
                url,
                cause: error,
              });

        if (!fetchError.retryable || attempt >= maxAttempts) {
          log.debug(
            { url, attempt, kind: fetchError.kind, status: fetchError.statusCode },
            "Request failed",
          );
          throw fetchError;
        }

        const delayMs =
          fetchError.retryAfterMs ??
          calculateBackoffMs(
            attempt,
            this.options.backoffBaseMs,
            this.options.backoffMaxMs,
            this.random,
          );
        log.debug(
          { url, attempt, nextAttempt: attempt + 1, delayMs, err: fetchError.message },
          "Retrying request",
        );
        try {
          await this.sleepImpl(delayMs, signal);
        } catch (sleepError) {
          throw this.cancelled(url, sleepError);
        }
      }
    }
  }

  private async attempt(
    url: string,
    accept: string | undefined,
    signal: AbortSignal | undefined,
  ): Promise<HttpResponse> {
    if (signal?.aborted) throw this.cancelled(url, abortReason(signal));

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: accept ?? "*/*",
        },
        redirect: "follow",
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => "");
        throw new FetchError(
          `HTTP ${res.status} ${res.statusText} for ${url}: ${body.slice(0, 200)}`,
          {
            kind: isRetryableStatus(res.status) ? "transient" : "permanent",
            url,
            statusCode: res.status,
            retryAfterMs: parseRetryAfterMs(
              res.headers.get("retry-after"),
              this.options.backoffMaxMs,
            ),
          },
        );
      }

      const contentLength = Number(res.headers.get("content-length") ?? Number.NaN);
      if (Number.isFinite(contentLength) && contentLength > this.options.maxBytes) {
        await res.body?.cancel();
        throw this.tooLarge(url, contentLength);
      }

      const bytes = new Uint8Array(await res.arrayBuffer());
      if (bytes.byteLength > this.options.maxBytes) {
        throw this.tooLarge(url, bytes.byteLength);
      }

      return {
        url,
        finalUrl: res.url || url,
        status: res.status,
        contentType: res.headers.get("content-type"),
        bytes,
      };
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (signal?.aborted) throw this.cancelled(url, error);
      if (timedOut) {
        throw new FetchError(`Timed out after ${this.options.timeoutMs}ms: ${url}`, {
          kind: "transient",
          url,
          cause: error,
        });
      }
      throw new FetchError(`Network error for ${url}: ${errorMessage(error)}`, {
        kind: "transient",
        url,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async politenessPause(url: string, signal: AbortSignal | undefined): Promise<void> {
    const base = this.options.politenessDelayMs;
    if (base <= 0) return;
    try {
      await this.sleepImpl(base + Math.floor(this.random() * base), signal);
    } catch (error) {
      throw this.cancelled(url, error);
    }
  }

  private tooLarge(url: string, bytes: number): FetchError {
    return new FetchError(
      `Response too large for ${url}: ${bytes} bytes > ${this.options.maxBytes} bytes`,
      { kind: "permanent", url },
    );
  }

  private cancelled(url: string, cause: unknown): FetchError {
    return new FetchError(`Request cancelled: ${url}`, { kind: "cancelled", url, cause });
  }
}
