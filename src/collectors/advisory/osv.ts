import { z } from "zod";
import { NotFound } from "../../errors";
import { OSV_ECOSYSTEM, advisoryPackageName, ecosystemFromOsv } from "../../ecosystems/purl";
import { makeRange } from "../../ecosystems/ranges";
import type { AdvisoryReference, AffectedRange, RangeEvent, SeverityRating } from "../../types";
import { cvssV3VectorToBaseScore, severityFromCvssScore } from "../../utils/severity";
import { type CollectorContext, type JsonClient, parseEvidence } from "../connector";
import { classifyReference, commitShaFromUrl } from "./references";
import { type AdvisoryQuery, type AdvisorySource, type SourceAdvisory, normalizeCwe } from "./source";

const OsvEventSchema = z.object({
  introduced: z.string().optional(),
  fixed: z.string().optional(),
  last_affected: z.string().optional(),
  limit: z.string().optional(),
});

const OsvVulnSchema = z.object({
  id: z.string(),
  aliases: z.array(z.string()).optional(),
  summary: z.string().optional(),
  details: z.string().optional(),
  published: z.string().optional(),
  modified: z.string().optional(),
  severity: z.array(z.object({ type: z.string(), score: z.string() })).optional(),
  database_specific: z.object({ cwe_ids: z.array(z.string()).optional() }).passthrough().optional(),
  affected: z
    .array(
      z.object({
        package: z.object({ ecosystem: z.string(), name: z.string() }).passthrough().optional(),
        ranges: z
          .array(z.object({ type: z.string(), repo: z.string().optional(), events: z.array(OsvEventSchema) }))
          .optional(),
        versions: z.array(z.string()).optional(),
      }),
    )
    .optional(),
  references: z.array(z.object({ type: z.string().optional(), url: z.string() })).optional(),
});

const OsvQueryResponseSchema = z.object({ vulns: z.array(OsvVulnSchema).optional() });

type OsvVuln = z.infer<typeof OsvVulnSchema>;
type OsvEvent = z.infer<typeof OsvEventSchema>;

function toRangeEvent(e: OsvEvent): RangeEvent | null {
  if (e.introduced !== undefined) return { introduced: e.introduced };
  if (e.fixed !== undefined) return { fixed: e.fixed };
  if (e.last_affected !== undefined) return { lastAffected: e.last_affected };
  if (e.limit !== undefined) return { limit: e.limit };
  return null;
}

function severityOf(v: OsvVuln): SeverityRating | undefined {
  const cvss = v.severity?.find((s) => s.type === "CVSS_V3" || s.type === "CVSS_V4");
  if (!cvss) return undefined;
  const score = cvss.type === "CVSS_V3" ? cvssV3VectorToBaseScore(cvss.score) : undefined;
  return { rating: severityFromCvssScore(score), score, vector: cvss.score, source: "osv" };
}

/** Convert a validated OSV record; exported for tests. */
export function normalizeOsv(v: OsvVuln, baseUrl: string): SourceAdvisory {
  const affected: AffectedRange[] = [];
  const fixCommits: string[] = [];
  for (const a of v.affected ?? []) {
    for (const r of a.ranges ?? []) {
      if (r.type === "GIT") {
        for (const e of r.events) if (e.fixed && /^[0-9a-f]{7,40}$/i.test(e.fixed)) fixCommits.push(e.fixed.toLowerCase());
      }
    }
    const ecosystem = a.package ? ecosystemFromOsv(a.package.ecosystem) : undefined;
    if (!a.package || !ecosystem) continue;
    const versionRanges = (a.ranges ?? []).filter((r) => r.type === "SEMVER" || r.type === "ECOSYSTEM");
    const listed = a.versions ?? [];
    if (versionRanges.length === 0 && listed.length > 0) {
      const range = makeRange(ecosystem, a.package.name, "osv", [], listed);
      if (range) affected.push(range);
    }
    for (const [i, r] of versionRanges.entries()) {
      const events = r.events.map(toRangeEvent).filter((e): e is RangeEvent => e !== null);
      // Enumerated versions belong to the package, not to one range; attach them once
      const range = makeRange(ecosystem, a.package.name, "osv", events, i === 0 ? listed : []);
      if (range) affected.push(range);
    }
  }

  const references: AdvisoryReference[] = (v.references ?? []).map((r) => ({
    url: r.url,
    kind: classifyReference(r.url),
    source: "osv",
  }));
  for (const r of references) {
    const sha = commitShaFromUrl(r.url);
    if (r.kind === "commit" && sha) fixCommits.push(sha);
  }

  const weaknesses = (v.database_specific?.cwe_ids ?? []).map(normalizeCwe).filter((c): c is string => c !== undefined);
  const webBase = baseUrl.includes("api.osv.dev") ? "https://osv.dev/vulnerability" : `${baseUrl}/vulns`;

  return {
    source: "osv",
    id: v.id,
    aliases: v.aliases ?? [],
    url: `${webBase}/${encodeURIComponent(v.id)}`,
    summary: v.summary,
    description: v.details,
    weaknesses,
    affected,
    references,
    fixCommits: [...new Set(fixCommits)],
    publishedAt: v.published,
    modifiedAt: v.modified,
    severity: severityOf(v),
  };
}

/**
 * OSV by id; when OSV does not index the id directly (a CVE it only knows
 * as an alias), fall back to listing the package's vulnerabilities.
 */
export class OsvSource implements AdvisorySource {
  readonly id = "osv" as const;

  constructor(
    private readonly http: JsonClient,
    private readonly baseUrl: string,
  ) {}

  async fetch(query: AdvisoryQuery, ctx: CollectorContext): Promise<SourceAdvisory> {
    const opts = { signal: ctx.signal };
    try {
      const raw = await this.http.getJson(`${this.baseUrl}/vulns/${encodeURIComponent(query.vulnerabilityId)}`, opts);
      return normalizeOsv(parseEvidence(OsvVulnSchema, raw, "osv", "vulnerability"), this.baseUrl);
    } catch (e) {
      if (!(e instanceof NotFound)) throw e;
      ctx.logger.debug(`osv: ${query.vulnerabilityId} not indexed by id, querying by package`);
    }

    const ecosystem = OSV_ECOSYSTEM[query.pkg.ecosystem];
    if (!ecosystem) throw new NotFound(`osv: ${query.vulnerabilityId} not found`, { provider: "osv" });

    const raw = await this.http.postJson(
      `${this.baseUrl}/query`,
      { package: { ecosystem, name: advisoryPackageName(query.pkg) } },
      opts,
    );
    const { vulns } = parseEvidence(OsvQueryResponseSchema, raw, "osv", "query response");
    const wanted = query.vulnerabilityId.toUpperCase();
    const match = (vulns ?? []).find(
      (v) => v.id.toUpperCase() === wanted || (v.aliases ?? []).some((a) => a.toUpperCase() === wanted),
    );
    if (!match) throw new NotFound(`osv: ${query.vulnerabilityId} not found for ${query.pkg.purl}`, { provider: "osv" });
    return normalizeOsv(match, this.baseUrl);
  }
}
