import { z } from "zod";
import { NotFound } from "../../errors";
import type { SeverityRating } from "../../types";
import { mapSeverity, severityFromCvssScore } from "../../utils/severity";
import { type CollectorContext, type JsonClient, parseEvidence } from "../connector";
import { classifyReference, commitShaFromUrl } from "./references";
import { type AdvisoryQuery, type AdvisorySource, type SourceAdvisory, isCveId, normalizeCwe } from "./source";

const CvssMetricSchema = z.object({
  type: z.string().optional(),
  cvssData: z.object({
    baseScore: z.number(),
    vectorString: z.string().optional(),
    baseSeverity: z.string().optional(),
  }),
});

const NvdCveSchema = z.object({
  id: z.string(),
  published: z.string().optional(),
  lastModified: z.string().optional(),
  descriptions: z.array(z.object({ lang: z.string(), value: z.string() })).default([]),
  weaknesses: z
    .array(z.object({ description: z.array(z.object({ lang: z.string(), value: z.string() })) }))
    .default([]),
  references: z.array(z.object({ url: z.string(), tags: z.array(z.string()).optional() })).default([]),
  metrics: z
    .object({
      cvssMetricV31: z.array(CvssMetricSchema).optional(),
      cvssMetricV30: z.array(CvssMetricSchema).optional(),
    })
    .passthrough()
    .optional(),
});

const NvdResponseSchema = z.object({
  vulnerabilities: z.array(z.object({ cve: NvdCveSchema })).default([]),
});

type NvdCve = z.infer<typeof NvdCveSchema>;

/** NVD timestamps carry no zone ("2023-06-15T17:15:09.853"); they are UTC. */
function nvdDate(v: string | undefined): string | undefined {
  if (!v) return undefined;
  const iso = /[zZ]|[+-]\d\d:?\d\d$/.test(v) ? v : `${v}Z`;
  const t = Date.parse(iso);
  return Number.isNaN(t) ? undefined : new Date(t).toISOString();
}

function severityOf(cve: NvdCve): SeverityRating | undefined {
  const metrics = cve.metrics?.cvssMetricV31 ?? cve.metrics?.cvssMetricV30 ?? [];
  const m = metrics.find((x) => x.type === "Primary") ?? metrics[0];
  if (!m) return undefined;
  const byScore = severityFromCvssScore(m.cvssData.baseScore);
  return {
    rating: byScore !== "unknown" ? byScore : mapSeverity(m.cvssData.baseSeverity),
    score: m.cvssData.baseScore,
    vector: m.cvssData.vectorString,
    source: "nvd",
  };
}

export function normalizeNvd(cve: NvdCve): SourceAdvisory {
  const references = cve.references.map((r) => ({ url: r.url, kind: classifyReference(r.url), source: "nvd" as const }));
  const fixCommits = references
    .filter((r) => r.kind === "commit")
    .map((r) => commitShaFromUrl(r.url))
    .filter((s): s is string => s !== undefined);
  const weaknesses = cve.weaknesses
    .flatMap((w) => w.description.map((d) => normalizeCwe(d.value)))
    .filter((c): c is string => c !== undefined);

  return {
    source: "nvd",
    id: cve.id,
    aliases: [],
    url: `https://nvd.nist.gov/vuln/detail/${encodeURIComponent(cve.id)}`,
    description: cve.descriptions.find((d) => d.lang === "en")?.value,
    weaknesses,
    // NVD speaks CPE, not package ecosystems; ranges come from OSV and GitHub
    affected: [],
    references,
    fixCommits: [...new Set(fixCommits)],
    publishedAt: nvdDate(cve.published),
    modifiedAt: nvdDate(cve.lastModified),
    severity: severityOf(cve),
  };
}

export class NvdSource implements AdvisorySource {
  readonly id = "nvd" as const;

  constructor(
    private readonly http: JsonClient,
    private readonly baseUrl: string,
    private readonly apiKey?: string,
  ) {}

  async fetch(query: AdvisoryQuery, ctx: CollectorContext): Promise<SourceAdvisory> {
    const id = query.vulnerabilityId.toUpperCase();
    if (!isCveId(id)) throw new NotFound(`nvd: only CVE ids are indexed, got ${id}`, { provider: "nvd" });

    const headers: Record<string, string> = this.apiKey ? { apiKey: this.apiKey } : {};
    const raw = await this.http.getJson(`${this.baseUrl}?cveId=${encodeURIComponent(id)}`, { headers, signal: ctx.signal });
    const { vulnerabilities } = parseEvidence(NvdResponseSchema, raw, "nvd", "CVE response");
    const cve = vulnerabilities.find((v) => v.cve.id.toUpperCase() === id)?.cve;
    if (!cve) throw new NotFound(`nvd: ${id} not found`, { provider: "nvd" });
    return normalizeNvd(cve);
  }
}
