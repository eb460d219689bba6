import { z } from "zod";
import { NotFound } from "../../errors";
import { ecosystemFromGithub, samePackage } from "../../ecosystems/purl";
import { makeRange, parseGithubRangeExpression } from "../../ecosystems/ranges";
import type { AffectedRange, SeverityRating } from "../../types";
import { mapSeverity, severityFromCvssScore } from "../../utils/severity";
import { type CollectorContext, type JsonClient, parseEvidence } from "../connector";
import { classifyReference, commitShaFromUrl } from "./references";
import { type AdvisoryQuery, type AdvisorySource, type SourceAdvisory, isCveId, isGhsaId, normalizeCwe } from "./source";

const GithubAdvisorySchema = z.object({
  ghsa_id: z.string(),
  cve_id: z.string().nullable().optional(),
  html_url: z.string(),
  summary: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  severity: z.string().nullable().optional(),
  cvss: z
    .object({ vector_string: z.string().nullable().optional(), score: z.number().nullable().optional() })
    .nullable()
    .optional(),
  cwes: z.array(z.object({ cwe_id: z.string() })).nullable().optional(),
  references: z.array(z.string()).nullable().optional(),
  published_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
  vulnerabilities: z
    .array(
      z.object({
        package: z.object({ ecosystem: z.string(), name: z.string().nullable() }).nullable(),
        vulnerable_version_range: z.string().nullable().optional(),
        first_patched_version: z.string().nullable().optional(),
      }),
    )
    .nullable()
    .optional(),
});

type GithubAdvisory = z.infer<typeof GithubAdvisorySchema>;

function severityOf(a: GithubAdvisory): SeverityRating | undefined {
  const score = a.cvss?.score ?? undefined;
  const vector = a.cvss?.vector_string ?? undefined;
  if (score !== undefined && score > 0) {
    return { rating: severityFromCvssScore(score), score, vector, source: "github" };
  }
  const rating = mapSeverity(a.severity ?? undefined);
  return rating === "unknown" ? undefined : { rating, source: "github" };
}

export function normalizeGithubAdvisory(a: GithubAdvisory): SourceAdvisory {
  const affected: AffectedRange[] = [];
  for (const v of a.vulnerabilities ?? []) {
    const ecosystem = v.package ? ecosystemFromGithub(v.package.ecosystem) : undefined;
    if (!ecosystem || !v.package?.name || !v.vulnerable_version_range) continue;
    const parsed = parseGithubRangeExpression(v.vulnerable_version_range, v.first_patched_version ?? undefined);
    if (!parsed) continue;
    const range = makeRange(ecosystem, v.package.name, "github", parsed.events, parsed.versions);
    if (range) affected.push(range);
  }

  const references = (a.references ?? []).map((url) => ({ url, kind: classifyReference(url), source: "github" as const }));
  const fixCommits = references
    .filter((r) => r.kind === "commit")
    .map((r) => commitShaFromUrl(r.url))
    .filter((s): s is string => s !== undefined);

  return {
    source: "github",
    id: a.ghsa_id,
    aliases: a.cve_id ? [a.cve_id] : [],
    url: a.html_url,
    summary: a.summary ?? undefined,
    description: a.description ?? undefined,
    weaknesses: (a.cwes ?? []).map((c) => normalizeCwe(c.cwe_id)).filter((c): c is string => c !== undefined),
    affected,
    references,
    fixCommits: [...new Set(fixCommits)],
    publishedAt: a.published_at ?? undefined,
    modifiedAt: a.updated_at ?? undefined,
    severity: severityOf(a),
  };
}

/** GitHub global security advisories (REST `GET /advisories`). */
export class GitHubAdvisorySource implements AdvisorySource {
  readonly id = "github" as const;

  constructor(
    private readonly http: JsonClient,
    private readonly baseUrl: string,
    private readonly token?: string,
  ) {}

  private headers(): Record<string, string> {
    const h: Record<string, string> = {
      accept: "application/vnd.github+json",
      "x-github-api-version": "2022-11-28",
    };
    if (this.token) h.authorization = `Bearer ${this.token}`;
    return h;
  }

  async fetch(query: AdvisoryQuery, ctx: CollectorContext): Promise<SourceAdvisory> {
    const id = query.vulnerabilityId;
    const opts = { signal: ctx.signal, headers: this.headers() };

    if (isGhsaId(id)) {
      const raw = await this.http.getJson(`${this.baseUrl}/advisories/${encodeURIComponent(id.toUpperCase())}`, opts);
      return normalizeGithubAdvisory(parseEvidence(GithubAdvisorySchema, raw, "github", "advisory"));
    }
    if (!isCveId(id)) {
      throw new NotFound(`github: ${id} is neither a CVE nor a GHSA id`, { provider: "github" });
    }

    const raw = await this.http.getJson(`${this.baseUrl}/advisories?cve_id=${encodeURIComponent(id.toUpperCase())}`, opts);
    const list = parseEvidence(z.array(GithubAdvisorySchema), raw, "github", "advisory list");
    if (list.length === 0) throw new NotFound(`github: no advisory for ${id}`, { provider: "github" });

    // A CVE can map to several advisories; prefer one covering the requested package
    const normalized = list.map(normalizeGithubAdvisory);
    const chosen =
      normalized.find((a) => a.affected.some((r) => samePackage(query.pkg, r.ecosystem, r.packageName))) ?? normalized[0];
    if (list.length > 1) ctx.logger.debug(`github: ${list.length} advisories for ${id}, using ${chosen.id}`);
    return chosen;
  }
}
