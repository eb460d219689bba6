import {
  MalformedEvidence,
  NotFound,
  ProviderUnavailable,
  RateLimited,
  type ResolutionError,
} from "../errors";
import type { Cache } from "../cache/types";
import type { Logger } from "./logger";
import { sha256Hex } from "./hash";
import { errorMessage } from "./error";
import { abortReason, retry, type RetryOptions } from "./retry";

export class HttpError extends Error {
  readonly status?: number;
  readonly url: string;
  readonly retryAfter?: string;
  readonly responseText?: string;

  constructor(
    message: string,
    opts: { url: string; status?: number; retryAfter?: string; responseText?: string },
  ) {
    super(message);
    this.name = "HttpError";
    this.url = opts.url;
    this.status = opts.status;
    this.retryAfter = opts.retryAfter;
    this.responseText = opts.responseText;
  }
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  if (!Number.isNaN(n)) return n >= 0 ? n : undefined;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

/** Map a non-2xx response onto the provider error taxonomy. */
export function classifyHttpError(err: HttpError, provider: string, rateLimitRemaining?: string | null): ResolutionError {
  const status = err.status ?? 0;
  const opts = { provider, cause: err };
  if (status === 404 || status === 410 || status === 422) {
    return new NotFound(`${provider}: ${err.message} (${err.url})`, opts);
  }
  if (status === 429 || (status === 403 && rateLimitRemaining === "0")) {
    return new RateLimited(`${provider}: rate limited (${err.url})`, {
      ...opts,
      retryAfterSeconds: parseRetryAfter(err.retryAfter),
    });
  }
  if (status === 401 || status === 403) {
    return new ProviderUnavailable(`${provider}: authentication failed with HTTP ${status}`, {
      ...opts,
      status,
      transient: false,
    });
  }
  return new ProviderUnavailable(`${provider}: ${err.message} (${err.url})`, {
    ...opts,
    status,
    transient: status >= 500 || status === 408,
  });
}

export interface HttpClientOptions {
  /** Provider id used in error messages and logs. */
  provider: string;
  timeoutMs: number;
  userAgent: string;
  headers?: Record<string, string>;
  retry: Omit<RetryOptions, "signal" | "retryOn" | "onRetry">;
  logger?: Logger;
  /** Successful JSON responses are stored here and served on later identical calls. */
  cache?: Cache<unknown>;
  cacheTtlSeconds?: number;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Request-scoped cancellation; firing it surfaces as a TimeoutError. */
  signal?: AbortSignal;
}

export class HttpClient {
  readonly provider: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly headers: Record<string, string>;
  private readonly retryOptions: HttpClientOptions["retry"];
  private readonly logger?: Logger;
  private readonly cache?: Cache<unknown>;
  private readonly cacheTtlSeconds: number;

  constructor(opts: HttpClientOptions) {
    this.provider = opts.provider;
    this.timeoutMs = opts.timeoutMs;
    this.userAgent = opts.userAgent;
    this.headers = opts.headers ?? {};
    this.retryOptions = opts.retry;
    this.logger = opts.logger;
    this.cache = opts.cache;
    this.cacheTtlSeconds = opts.cacheTtlSeconds ?? 3600;
  }

  getJson = (url: string, opts?: RequestOptions): Promise<unknown> =>
    this.requestJson("GET", url, undefined, opts);

  postJson = (url: string, body: unknown, opts?: RequestOptions): Promise<unknown> =>
    this.requestJson("POST", url, body, opts);

  /** One request, retried; the timeout and the caller's signal cover the body read too. */
  private async fetchJson(
    method: "GET" | "POST",
    url: string,
    body: unknown,
    opts: RequestOptions = {},
  ): Promise<unknown> {
    // Validate URL scheme before making request
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch {
      throw new ProviderUnavailable(`${this.provider}: invalid URL ${url}`, { provider: this.provider, transient: false });
    }

    if (!["http:", "https:"].includes(parsedUrl.protocol)) {
      throw new ProviderUnavailable(
        `${this.provider}: invalid URL protocol "${parsedUrl.protocol}", only http: and https: are allowed`,
        { provider: this.provider, transient: false },
      );
    }

    const headers: Record<string, string> = {
      "user-agent": this.userAgent,
      accept: "application/json",
      ...this.headers,
      ...opts.headers,
    };
    if (method === "POST") headers["content-type"] = "application/json";

    const parent = opts.signal;

    const attempt = async (): Promise<unknown> => {
      if (parent?.aborted) throw abortReason(parent);
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      const onParentAbort = () => controller.abort();
      parent?.addEventListener("abort", onParentAbort, { once: true });

      try {
        let res: Response;
        try {
          res = await fetch(url, {
            method,
            headers,
            body: body !== undefined ? JSON.stringify(body) : undefined,
            signal: controller.signal,
          });
        } catch (e) {
          if (parent?.aborted) throw abortReason(parent);
          if (controller.signal.aborted) {
            throw new ProviderUnavailable(`${this.provider}: request timed out after ${this.timeoutMs}ms`, {
              provider: this.provider,
              cause: e,
            });
          }
          throw new ProviderUnavailable(`${this.provider}: network error: ${errorMessage(e)}`, {
            provider: this.provider,
            cause: e,
          });
        }

        if (!res.ok) {
          const retryAfter = res.headers.get("retry-after") ?? undefined;
          const text = await res.text().catch(() => "");
          const httpErr = new HttpError(`HTTP ${res.status} ${res.statusText}`, {
            url,
            status: res.status,
            retryAfter,
            responseText: text,
          });
          throw classifyHttpError(httpErr, this.provider, res.headers.get("x-ratelimit-remaining"));
        }

        let text: string;
        try {
          text = await res.text();
        } catch (e) {
          if (parent?.aborted) throw abortReason(parent);
          if (controller.signal.aborted) {
            throw new ProviderUnavailable(`${this.provider}: response body timed out after ${this.timeoutMs}ms`, {
              provider: this.provider,
              cause: e,
            });
          }
          throw new ProviderUnavailable(`${this.provider}: failed reading response body: ${errorMessage(e)}`, {
            provider: this.provider,
            cause: e,
          });
        }
        try {
          // Trust boundary: callers validate the shape with their own schema.
          return JSON.parse(text);
        } catch (parseError) {
          throw new MalformedEvidence(`${this.provider}: invalid JSON response from ${url}`, {
            provider: this.provider,
            cause: parseError,
            issues: [errorMessage(parseError)],
          });
        }
      } finally {
        clearTimeout(timeout);
        parent?.removeEventListener("abort", onParentAbort);
      }
    };

    return retry(attempt, {
      ...this.retryOptions,
      signal: parent,
      onRetry: (err, n, delayMs) =>
        this.logger?.debug(`${this.provider}: retry ${n} in ${Math.round(delayMs)}ms`, { url, error: errorMessage(err) }),
    });
  }

  private async requestJson(
    method: "GET" | "POST",
    url: string,
    body: unknown,
    opts?: RequestOptions,
  ): Promise<unknown> {
    const cacheKey = `${this.provider} ${method} ${url}${body !== undefined ? ` ${sha256Hex(JSON.stringify(body))}` : ""}`;
    if (this.cache) {
      const hit = await this.cache.get(cacheKey);
      if (hit) {
        this.logger?.debug(`${this.provider}: cache hit`, { url });
        return hit.value;
      }
    }

    const value = await this.fetchJson(method, url, body, opts);
    if (this.cache) {
      try {
        await this.cache.set(cacheKey, value, this.cacheTtlSeconds);
      } catch (e) {
        this.logger?.warn(`${this.provider}: cache write failed: ${errorMessage(e)}`);
      }
    }
    return value;
  }
}
