import { RateLimited, TimeoutError, isTransient } from "../errors";

export interface RetryOptions {
  /** Additional attempts after the first one. */
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: number; // 0..1
  retryOn?: (err: unknown) => boolean;
  /** Aborts both the pending sleep and further attempts. */
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export function abortReason(signal: AbortSignal): TimeoutError {
  return signal.reason instanceof TimeoutError
    ? signal.reason
    : new TimeoutError("Request deadline exceeded", { cause: signal.reason });
}

/** setTimeout as a promise; rejects with a TimeoutError when the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return new Promise((resolve) => setTimeout(resolve, ms));
  const s: AbortSignal = signal;
  if (s.aborted) return Promise.reject(abortReason(s));
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(s));
    };
    const timer = setTimeout(() => {
      s.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    s.addEventListener("abort", onAbort, { once: true });
  });
}

/** Exponential backoff for a 1-based retry attempt, without jitter. */
export function backoffDelay(attempt: number, opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "factor">): number {
  return Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(opts.factor, attempt - 1));
}

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const retryOn = opts.retryOn ?? isTransient;

  let attempt = 0;
  for (;;) {
    if (opts.signal?.aborted) throw abortReason(opts.signal);
    try {
      return await fn(attempt);
    } catch (err) {
      attempt += 1;
      if (attempt > opts.retries || !retryOn(err)) throw err;

      // Honor Retry-After when the provider sent one (common for 429)
      const exp = backoffDelay(attempt, opts);
      const waitMs =
        err instanceof RateLimited && err.retryAfterSeconds !== undefined && err.retryAfterSeconds > 0
          ? Math.min(opts.maxDelayMs, err.retryAfterSeconds * 1000)
          : Math.min(opts.maxDelayMs, exp + exp * opts.jitter * Math.random());

      opts.onRetry?.(err, attempt, waitMs);
      await sleep(waitMs, opts.signal);
    }
  }
}
