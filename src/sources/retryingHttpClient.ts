import type { HttpClientConfig, RetryPolicyConfig } from "../config/configManager.js";
import { computeDelay, sleep as defaultSleep, type Sleep } from "../runtime/backoff.js";
import { describeError, NoopLogger, type Logger } from "../telemetry/logger.js";

export type RequestMethod = "GET" | "POST";

export interface RequestOptions {
  readonly timeoutMs?: number;
  readonly searchParams?: Record<string, string | number | boolean | undefined>;
  readonly expectedStatuses?: readonly number[];
  readonly headers?: Record<string, string>;
  readonly body?: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const DEFAULT_EXPECTED_STATUSES: readonly number[] = [200];

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly attempts: number,
  ) {
    super(`Unexpected status ${status} after ${attempts} attempt(s)`);
    this.name = "HttpStatusError";
  }
}

function buildUrl(baseUrl: string, path: string, params?: RequestOptions["searchParams"]): string {
  const url = new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value === undefined) {
        return;
      }
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

export interface RetryingHttpClientOptions {
  readonly http: HttpClientConfig;
  readonly logger?: Logger;
  readonly fetchImpl?: FetchLike;
  readonly sleep?: Sleep;
}

/**
 * JSON over HTTP with a request rate ceiling, per-attempt timeouts and
 * exponential backoff on 429, 5xx, timeouts and network failures.
 */
export class RetryingHttpClient {
  private readonly logger: Logger;
  private readonly minIntervalMs: number;
  private readonly retry: RetryPolicyConfig;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private rateLimiter = Promise.resolve();
  private nextAvailableTimestamp = 0;

  constructor(private readonly options: RetryingHttpClientOptions) {
    this.logger = options.logger ?? new NoopLogger();
    this.retry = options.http.retry;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.minIntervalMs = options.http.rateLimitPerSecond > 0
      ? Math.floor(1000 / options.http.rateLimitPerSecond)
      : 0;
  }

  async get(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request(path, "GET", options);
  }

  async post(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request(path, "POST", options);
  }

  async request(path: string, method: RequestMethod, options: RequestOptions): Promise<unknown> {
    const requestUrl = buildUrl(this.options.http.baseUrl, path, options.searchParams);
    const expectedStatuses = options.expectedStatuses ?? DEFAULT_EXPECTED_STATUSES;

    await this.applyRateLimit();

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt += 1) {
      const controller = new AbortController();
      const timeoutMs = options.timeoutMs ?? this.options.http.timeoutMs;
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      let response: Response;
      try {
        response = await this.fetchImpl(requestUrl, {
          method,
          headers: options.headers,
          body: options.body,
          signal: controller.signal,
        });
      } catch (error) {
        const metadata = { path, attempt, error: describeError(error) };
        if (attempt >= this.retry.maxAttempts) {
          this.logger.error("Request failed", metadata);
          throw error;
        }
        this.logger.warn("Request error", metadata);
        await this.sleep(computeDelay(attempt, this.retry));
        continue;
      } finally {
        clearTimeout(timeout);
      }

      if (expectedStatuses.includes(response.status)) {
        const text = await response.text();
        return text.trim() === "" ? undefined : JSON.parse(text);
      }

      const body = await response.text();
      const metadata = { path, attempt, status: response.status, body };
      if (!shouldRetry(response.status)) {
        this.logger.error("Request rejected", metadata);
        throw new HttpStatusError(response.status, body, attempt);
      }
      if (attempt >= this.retry.maxAttempts) {
        this.logger.error("Request exhausted retries", metadata);
        throw new HttpStatusError(response.status, body, attempt);
      }
      this.logger.warn("Request retry", metadata);
      await this.sleep(computeDelay(attempt, this.retry));
    }

    throw new Error("Retry loop exited unexpectedly");
  }

  private applyRateLimit(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return Promise.resolve();
    }
    const limiter = this.rateLimiter.then(async () => {
      const waitTime = Math.max(0, this.nextAvailableTimestamp - Date.now());
      if (waitTime > 0) {
        await this.sleep(waitTime);
      }
      this.nextAvailableTimestamp = Date.now() + this.minIntervalMs;
    });
    this.rateLimiter = limiter.catch((error) => {
      this.logger.error("Rate limiter failure", { error: describeError(error) });
    });
    return limiter;
  }
}
