import type { z } from "zod";
import { MalformedEvidence } from "../errors";
import type { HttpClient } from "../utils/http";
import type { Logger } from "../utils/logger";

export interface CollectorContext {
  /** Request-scoped deadline; every outstanding call aborts when it fires */
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * One class of raw evidence, normalised. Implementations hold no per-request
 * state, so the same query always yields the same evidence for the same
 * upstream data.
 */
export interface EvidenceCollector<Q, E> {
  readonly id: string;
  fetch(query: Q, ctx: CollectorContext): Promise<E>;
}

/** The slice of HttpClient collectors use; tests hand in a plain object. */
export type JsonClient = Pick<HttpClient, "provider" | "getJson" | "postJson">;

/**
 * Validate an untyped provider payload. Nothing downstream of a collector sees
 * a value that did not pass its schema.
 */
export function parseEvidence<S extends z.ZodTypeAny>(schema: S, data: unknown, provider: string, what: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new MalformedEvidence(`${provider}: ${what} failed validation (${issues.slice(0, 3).join("; ")})`, {
      provider,
      issues,
    });
  }
  return result.data;
}
