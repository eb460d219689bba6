/**
 * Error taxonomy shared by the collectors, the arbitration layer and the pipeline.
 *
 * Provider-local errors (everything except the terminal ones at the bottom) are
 * absorbed at the collector/arbitration boundary and turned into "evidence absent"
 * or "decision absent". Only {@link InvalidRequestError} and
 * {@link RepositoryUnavailableError} escape the pipeline.
 */

export type ErrorKind =
  | "provider_unavailable"
  | "rate_limited"
  | "not_found"
  | "malformed_evidence"
  | "arbitration_parse"
  | "timeout"
  | "invalid_request"
  | "repository_unavailable";

export abstract class ResolutionError extends Error {
  abstract readonly kind: ErrorKind;
  /** Whether the same call may succeed when repeated after a backoff. */
  abstract readonly retryable: boolean;
  /** Provider that raised the error, when there is one. */
  readonly provider?: string;

  constructor(message: string, opts: { provider?: string; cause?: unknown } = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.provider = opts.provider;
  }
}

/** Network, auth or 5xx failure. Only network-level failures are worth retrying. */
export class ProviderUnavailable extends ResolutionError {
  readonly kind = "provider_unavailable" as const;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, opts: { provider?: string; cause?: unknown; status?: number; transient?: boolean } = {}) {
    super(message, opts);
    this.status = opts.status;
    this.retryable = opts.transient ?? true;
  }
}

export class RateLimited extends ResolutionError {
  readonly kind = "rate_limited" as const;
  readonly retryable = true;
  /** Seconds the provider asked us to wait, if it said so. */
  readonly retryAfterSeconds?: number;

  constructor(message: string, opts: { provider?: string; cause?: unknown; retryAfterSeconds?: number } = {}) {
    super(message, opts);
    this.retryAfterSeconds = opts.retryAfterSeconds;
  }
}

export class NotFound extends ResolutionError {
  readonly kind = "not_found" as const;
  readonly retryable = false;
}

/** Provider answered, but the payload failed schema validation. */
export class MalformedEvidence extends ResolutionError {
  readonly kind = "malformed_evidence" as const;
  readonly retryable = false;
  readonly issues: string[];

  constructor(message: string, opts: { provider?: string; cause?: unknown; issues?: string[] } = {}) {
    super(message, opts);
    this.issues = opts.issues ?? [];
  }
}

/** Reasoning provider replied with something that does not match the response contract. */
export class ArbitrationParseError extends ResolutionError {
  readonly kind = "arbitration_parse" as const;
  readonly retryable = false;
  readonly rawResponse: string;

  constructor(message: string, opts: { provider?: string; cause?: unknown; rawResponse?: string } = {}) {
    super(message, opts);
    this.rawResponse = opts.rawResponse ?? "";
  }
}

/** The request-scoped deadline elapsed. */
export class TimeoutError extends ResolutionError {
  readonly kind = "timeout" as const;
  readonly retryable = false;
}

export class InvalidRequestError extends ResolutionError {
  readonly kind = "invalid_request" as const;
  readonly retryable = false;
  readonly field?: string;

  constructor(message: string, opts: { field?: string; cause?: unknown } = {}) {
    super(message, opts);
    this.field = opts.field;
  }
}

/** The mandatory repository evidence could not be collected. */
export class RepositoryUnavailableError extends ResolutionError {
  readonly kind = "repository_unavailable" as const;
  readonly retryable = false;
}

export function isResolutionError(e: unknown): e is ResolutionError {
  return e instanceof ResolutionError;
}

/** Errors that describe a provider problem and may be absorbed into "evidence absent". */
export function isProviderError(e: unknown): e is ProviderUnavailable | RateLimited | NotFound | MalformedEvidence {
  return (
    e instanceof ProviderUnavailable ||
    e instanceof RateLimited ||
    e instanceof NotFound ||
    e instanceof MalformedEvidence
  );
}

/** True when the error is transient and the same call is worth repeating. */
export function isTransient(e: unknown): boolean {
  return isResolutionError(e) && e.retryable;
}
