import { isTransient } from "../errors";
import type { RetrySettings } from "../types";
import type { Logger } from "../utils/logger";
import { errorMessage } from "../utils/error";
import { retry } from "../utils/retry";

/**
 * Retry state of one reasoning provider within one request. Every provider
 * gets its own gate, so one provider's backoff never delays the next in line.
 * Retry-After from a rate-limited reply is honoured by {@link retry}.
 */
export class ProviderGate {
  private attempts = 0;

  constructor(
    readonly provider: string,
    private readonly settings: RetrySettings,
    private readonly logger: Logger,
  ) {}

  get attemptCount(): number {
    return this.attempts;
  }

  run<T>(fn: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return retry(
      async () => {
        this.attempts++;
        return fn(signal);
      },
      {
        retries: this.settings.attempts,
        minDelayMs: this.settings.minDelayMs,
        maxDelayMs: this.settings.maxDelayMs,
        factor: this.settings.factor,
        jitter: this.settings.jitter,
        retryOn: isTransient,
        signal,
        onRetry: (err, n, delayMs) => {
          this.logger.debug(`${this.provider}: retry ${n} in ${Math.round(delayMs)}ms: ${errorMessage(err)}`);
        },
      },
    );
  }
}
