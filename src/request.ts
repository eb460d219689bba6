import { z } from "zod";
import { type HostApiBases, parseRepositoryUrl } from "./collectors/repository/repository-url";
import { InvalidRequestError } from "./errors";
import { parsePurl } from "./ecosystems/purl";
import type { PackageIdentity, RepositoryLocator, ResolveRequest } from "./types";

const VULNERABILITY_ID = /^(?:CVE-\d{4}-\d{4,}|GHSA(?:-[23456789cfghjmpqrvwx]{4}){3}|[A-Z][A-Z0-9]*-[\w.:-]+)$/i;

export const ResolveRequestSchema = z.object({
  package_url: z.string().min(1),
  repository_url: z.string().min(1),
  vulnerability_id: z.string().min(1),
});

/** A request after validation; everything downstream works from this. */
export interface ValidatedRequest {
  readonly raw: ResolveRequest;
  readonly vulnerabilityId: string;
  readonly pkg: PackageIdentity;
  readonly repository: RepositoryLocator;
}

/** Upper-case CVE and GHSA prefixes; other ids (PYSEC-, GO-, RUSTSEC-) keep their case. */
export function normalizeVulnerabilityId(id: string): string {
  const t = id.trim();
  if (/^cve-/i.test(t)) return t.toUpperCase();
  if (/^ghsa-/i.test(t)) return `GHSA${t.slice(4).toLowerCase()}`;
  return t;
}

/**
 * Check a request before any external call. Throws InvalidRequestError
 * naming the offending field.
 */
export function validateRequest(input: unknown, apiBases: HostApiBases): ValidatedRequest {
  const parsed = ResolveRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || undefined;
    throw new InvalidRequestError(`invalid request: ${field ? `${field}: ` : ""}${issue?.message ?? "malformed"}`, {
      field,
    });
  }
  const raw = parsed.data;

  const vulnerabilityId = normalizeVulnerabilityId(raw.vulnerability_id);
  if (!VULNERABILITY_ID.test(vulnerabilityId)) {
    throw new InvalidRequestError(`vulnerability_id "${raw.vulnerability_id}" is not a recognised identifier`, {
      field: "vulnerability_id",
    });
  }

  return {
    raw,
    vulnerabilityId,
    pkg: parsePurl(raw.package_url),
    repository: parseRepositoryUrl(raw.repository_url, apiBases),
  };
}
