import { NotFound, ProviderUnavailable, isProviderError } from "../../errors";
import type { AdvisoryReference, AdvisorySourceId, AffectedRange, VulnerabilityRecord } from "../../types";
import { errorMessage } from "../../utils/error";
import { deepFreeze } from "../../utils/freeze";
import { abortReason } from "../../utils/retry";
import type { CollectorContext, EvidenceCollector } from "../connector";
import type { AdvisoryQuery, AdvisorySource, SourceAdvisory } from "./source";

/** Merge order: fields are taken from the first source in this list that has them. */
const SOURCE_ORDER: readonly AdvisorySourceId[] = ["osv", "github", "nvd"];

export interface SourceResult {
  source: AdvisorySourceId;
  ok: boolean;
  error?: unknown;
  durationMs: number;
  advisory?: SourceAdvisory;
}

function cweNumber(code: string): number {
  return Number(code.slice(4));
}

function earliest(dates: Array<string | undefined>): string | undefined {
  let best: { iso: string; t: number } | undefined;
  for (const d of dates) {
    if (!d) continue;
    const t = Date.parse(d);
    if (Number.isNaN(t)) continue;
    if (!best || t < best.t) best = { iso: new Date(t).toISOString(), t };
  }
  return best?.iso;
}

function latest(dates: Array<string | undefined>): string | undefined {
  let best: { iso: string; t: number } | undefined;
  for (const d of dates) {
    if (!d) continue;
    const t = Date.parse(d);
    if (Number.isNaN(t)) continue;
    if (!best || t > best.t) best = { iso: new Date(t).toISOString(), t };
  }
  return best?.iso;
}

const rangeKey = (r: AffectedRange) => `${r.ecosystem}:${r.packageName.toLowerCase()}`;

/**
 * Reconcile per-source advisories into one record. `parts` must already be in
 * SOURCE_ORDER.
 */
export function mergeAdvisories(requestedId: string, parts: readonly SourceAdvisory[]): VulnerabilityRecord {
  const id = requestedId.toUpperCase();
  const by = (s: AdvisorySourceId) => parts.find((p) => p.source === s);
  const osv = by("osv");
  const github = by("github");
  const nvd = by("nvd");

  const aliases = new Set<string>();
  for (const p of parts) {
    for (const a of [p.id, ...p.aliases]) {
      if (a.toUpperCase() !== id) aliases.add(a.toUpperCase());
    }
  }

  const weaknesses = [...new Set(parts.flatMap((p) => p.weaknesses))].sort((a, b) => cweNumber(a) - cweNumber(b));

  const affected: AffectedRange[] = [...(osv?.affected ?? [])];
  const described = new Set(affected.map(rangeKey));
  for (const r of github?.affected ?? []) {
    if (!described.has(rangeKey(r))) affected.push(r);
  }

  const seenUrls = new Set<string>();
  const references: AdvisoryReference[] = [];
  for (const p of parts) {
    for (const r of p.references) {
      if (seenUrls.has(r.url)) continue;
      seenUrls.add(r.url);
      references.push(r);
    }
  }

  const description = [osv?.description, github?.description, nvd?.description].find((d) => d && d.trim() !== "") ?? "";

  return deepFreeze({
    id,
    aliases: [...aliases].sort(),
    summary: osv?.summary ?? github?.summary,
    description,
    weaknesses,
    affected,
    references,
    fixCommits: [...new Set(parts.flatMap((p) => p.fixCommits))],
    publishedAt: earliest(parts.map((p) => p.publishedAt)),
    modifiedAt: latest(parts.map((p) => p.modifiedAt)),
    severity: nvd?.severity ?? osv?.severity ?? github?.severity,
    sources: parts.map((p) => p.source),
    advisoryPages: parts.map((p) => p.url),
  });
}

/**
 * Queries every enabled advisory source concurrently and merges what comes
 * back. A failing source is logged and treated as absent evidence; only when
 * all of them fail does the collector fail.
 */
export class AdvisoryCollector implements EvidenceCollector<AdvisoryQuery, VulnerabilityRecord> {
  readonly id = "advisory";
  private readonly sources: readonly AdvisorySource[];

  constructor(sources: readonly AdvisorySource[]) {
    this.sources = [...sources].sort((a, b) => SOURCE_ORDER.indexOf(a.id) - SOURCE_ORDER.indexOf(b.id));
  }

  async query(query: AdvisoryQuery, ctx: CollectorContext): Promise<SourceResult[]> {
    return Promise.all(
      this.sources.map(async (source): Promise<SourceResult> => {
        const start = Date.now();
        try {
          const advisory = await source.fetch(query, ctx);
          return { source: source.id, ok: true, durationMs: Date.now() - start, advisory };
        } catch (error) {
          if (ctx.signal?.aborted) throw abortReason(ctx.signal);
          if (!isProviderError(error)) throw error;
          if (error instanceof NotFound) ctx.logger.debug(`${source.id}: ${errorMessage(error)}`);
          else ctx.logger.warn(`${source.id}: ${errorMessage(error)}`);
          return { source: source.id, ok: false, error, durationMs: Date.now() - start };
        }
      }),
    );
  }

  async fetch(query: AdvisoryQuery, ctx: CollectorContext): Promise<VulnerabilityRecord> {
    if (this.sources.length === 0) {
      throw new ProviderUnavailable("advisory: no advisory sources enabled", { transient: false });
    }
    const results = await this.query(query, ctx);
    const parts = results.flatMap((r) => (r.advisory ? [r.advisory] : []));
    if (parts.length > 0) return mergeAdvisories(query.vulnerabilityId, parts);

    const failures = results.map((r) => r.error);
    const hard = failures.find((e) => !(e instanceof NotFound));
    if (hard !== undefined) throw hard;
    throw new NotFound(`advisory: ${query.vulnerabilityId} not found in ${results.map((r) => r.source).join(", ")}`);
  }
}
