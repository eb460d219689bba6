import type {
  AdvisoryReference,
  AdvisorySourceId,
  AffectedRange,
  PackageIdentity,
  SeverityRating,
} from "../../types";
import type { CollectorContext } from "../connector";

export interface AdvisoryQuery {
  vulnerabilityId: string;
  pkg: PackageIdentity;
}

/** What one advisory database knows about a vulnerability, before merging. */
export interface SourceAdvisory {
  source: AdvisorySourceId;
  id: string;
  aliases: string[];
  /** Human-readable advisory page */
  url: string;
  summary?: string;
  description?: string;
  weaknesses: string[];
  affected: AffectedRange[];
  references: AdvisoryReference[];
  fixCommits: string[];
  publishedAt?: string;
  modifiedAt?: string;
  severity?: SeverityRating;
}

export interface AdvisorySource {
  readonly id: AdvisorySourceId;
  fetch(query: AdvisoryQuery, ctx: CollectorContext): Promise<SourceAdvisory>;
}

/** "CWE-79", "cwe 79", "79" -> "CWE-79"; anything else -> undefined */
export function normalizeCwe(raw: string): string | undefined {
  const m = /^(?:CWE)?[\s-]*(\d+)$/i.exec(raw.trim());
  return m ? `CWE-${Number(m[1])}` : undefined;
}

export function isCveId(id: string): boolean {
  return /^CVE-\d{4}-\d{4,}$/i.test(id);
}

export function isGhsaId(id: string): boolean {
  return /^GHSA(?:-[23456789cfghjmpqrvwx]{4}){3}$/i.test(id);
}
