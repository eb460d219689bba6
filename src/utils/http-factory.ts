import type { Cache } from "../cache/types";
import type { ProviderSettings } from "../types";
import type { Logger } from "./logger";
import { HttpClient } from "./http";

export const USER_AGENT = "fixtrace/0.1";

export interface ProviderClientOptions {
  logger: Logger;
  headers?: Record<string, string>;
  cache?: Cache<unknown>;
  cacheTtlSeconds?: number;
}

/** Create the HttpClient a collector uses to talk to one evidence provider. */
export function createProviderHttpClient(
  provider: string,
  settings: ProviderSettings,
  opts: ProviderClientOptions,
): HttpClient {
  return new HttpClient({
    provider,
    timeoutMs: settings.timeoutMs,
    userAgent: USER_AGENT,
    headers: opts.headers,
    logger: opts.logger,
    cache: opts.cache,
    cacheTtlSeconds: opts.cacheTtlSeconds,
    retry: {
      retries: settings.retry.attempts,
      minDelayMs: settings.retry.minDelayMs,
      maxDelayMs: settings.retry.maxDelayMs,
      factor: settings.retry.factor,
      jitter: settings.retry.jitter,
    },
  });
}
