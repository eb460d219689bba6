import { issueNumberFromUrl, pullNumberFromUrl, repositorySlugFromUrl } from "../collectors/advisory/references";
import { isAdvisoryNamed } from "../extractor/candidate-extractor";
import type {
  CommitCandidate,
  EvidenceFragment,
  RepositoryLocator,
  ResolverConfig,
  ScoreComponent,
  ScoredCandidate,
  VerdictStatus,
  VulnerabilityRecord,
} from "../types";
import cweKeywordTable from "./data/cwe-keywords.json";
import { commitText, containsKeyword, terms } from "./tokenize";

const CWE_KEYWORDS: Readonly<Record<string, readonly string[] | undefined>> = cweKeywordTable;
const DAY_MS = 86_400_000;
/** Upper bound on commit text considered per candidate */
const MAX_COMMIT_TEXT = 200_000;

export type CorrelationSettings = ResolverConfig["correlation"];

export const REFERENCE_SCORES = { commit: 1, pull: 0.7, issue: 0.4 } as const;

export function round4(x: number): number {
  return Math.round(x * 10_000) / 10_000;
}

/** Advisory-side evidence, computed once per request. */
interface AdvisoryEvidence {
  descriptionTerms: string[];
  weaknessKeywords: string[];
  fixCommits: readonly string[];
  pulls: number[];
  issues: number[];
  hasDisclosure: boolean;
}

function advisoryEvidence(record: VulnerabilityRecord, repo: RepositoryLocator | undefined): AdvisoryEvidence {
  const slug = repo ? `${repo.owner}/${repo.name}`.toLowerCase() : undefined;
  const sameRepo = (url: string) => {
    const s = repositorySlugFromUrl(url);
    return s === undefined || slug === undefined || s === slug;
  };
  const pulls = new Set<number>();
  const issues = new Set<number>();
  for (const r of record.references) {
    if (!sameRepo(r.url)) continue;
    const pull = r.kind === "pull" ? pullNumberFromUrl(r.url) : undefined;
    const issue = r.kind === "issue" ? issueNumberFromUrl(r.url) : undefined;
    if (pull !== undefined) pulls.add(pull);
    if (issue !== undefined) issues.add(issue);
  }

  const keywords = new Set<string>();
  for (const cwe of record.weaknesses) for (const k of CWE_KEYWORDS[cwe] ?? []) keywords.add(k);

  return {
    descriptionTerms: [...terms(`${record.summary ?? ""}\n${record.description}`)].sort(),
    weaknessKeywords: [...keywords].sort(),
    fixCommits: record.fixCommits,
    pulls: [...pulls].sort((a, b) => a - b),
    issues: [...issues].sort((a, b) => a - b),
    hasDisclosure: record.publishedAt !== undefined,
  };
}

/** Components for which the advisory offers any evidence at all. */
function availableComponents(ev: AdvisoryEvidence): ScoreComponent[] {
  const out: ScoreComponent[] = [];
  if (ev.descriptionTerms.length > 0) out.push("description");
  if (ev.weaknessKeywords.length > 0) out.push("weakness");
  if (ev.hasDisclosure) out.push("proximity");
  if (ev.fixCommits.length > 0 || ev.pulls.length > 0 || ev.issues.length > 0) out.push("reference");
  return out;
}

function mentionsNumber(message: string, n: number): boolean {
  return new RegExp(`(?:#|!|pull/|issues/|merge_requests/)${n}(?!\\d)`).test(message);
}

function scoreOne(c: CommitCandidate, ev: AdvisoryEvidence, components: ScoreComponent[], cfg: CorrelationSettings): ScoredCandidate {
  const text = commitText(c.commit, MAX_COMMIT_TEXT);
  const lower = text.toLowerCase();
  const textTerms = terms(text);
  const values: Partial<Record<ScoreComponent, number>> = {};
  const evidence: EvidenceFragment[] = [];

  for (const component of components) {
    switch (component) {
      case "description": {
        const hits = ev.descriptionTerms.filter((t) => textTerms.has(t));
        values.description = Math.min(1, hits.length / cfg.descriptionSaturation);
        if (hits.length > 0) evidence.push({ component, detail: `advisory terms in commit: ${hits.slice(0, 10).join(", ")}` });
        break;
      }
      case "weakness": {
        const hits = ev.weaknessKeywords.filter((k) => containsKeyword(k, textTerms, lower));
        values.weakness = Math.min(1, hits.length / cfg.weaknessSaturation);
        if (hits.length > 0) evidence.push({ component, detail: `weakness keywords in commit: ${hits.join(", ")}` });
        break;
      }
      case "proximity": {
        const days = c.proximityMs / DAY_MS;
        values.proximity = Math.pow(0.5, days / cfg.proximityHalfLifeDays);
        evidence.push({ component, detail: `${days.toFixed(1)} days from disclosure` });
        break;
      }
      case "reference": {
        let value = 0;
        let detail = "";
        if (c.advisoryNamed || isAdvisoryNamed(c.commit.sha, ev.fixCommits)) {
          value = REFERENCE_SCORES.commit;
          detail = "commit linked by the advisory";
        } else {
          const pull = ev.pulls.find((n) => mentionsNumber(c.commit.message, n));
          const issue = ev.issues.find((n) => mentionsNumber(c.commit.message, n));
          if (pull !== undefined) {
            value = REFERENCE_SCORES.pull;
            detail = `message references advisory pull request #${pull}`;
          } else if (issue !== undefined) {
            value = REFERENCE_SCORES.issue;
            detail = `message references advisory issue #${issue}`;
          }
        }
        values.reference = value;
        if (value > 0) evidence.push({ component, detail });
        break;
      }
    }
  }

  let weighted = 0;
  let totalWeight = 0;
  for (const component of components) {
    const w = cfg.weights[component];
    weighted += w * (values[component] ?? 0);
    totalWeight += w;
  }
  const score = totalWeight > 0 ? round4(weighted / totalWeight) : 0;
  for (const k of components) values[k] = round4(values[k] ?? 0);

  return { ...c, score, components: values, evidence };
}

/** Total order: score desc, proximity to disclosure asc, sha asc. */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.proximityMs !== b.proximityMs) return a.proximityMs - b.proximityMs;
  return a.commit.sha < b.commit.sha ? -1 : a.commit.sha > b.commit.sha ? 1 : 0;
}

/**
 * Score every candidate against the advisory and re-sort. Pure: identical
 * inputs give identical scores and order.
 */
export function correlate(
  candidates: readonly CommitCandidate[],
  record: VulnerabilityRecord,
  cfg: CorrelationSettings,
  repo?: RepositoryLocator,
): ScoredCandidate[] {
  const ev = advisoryEvidence(record, repo);
  const components = availableComponents(ev).filter((c) => cfg.weights[c] > 0);
  return candidates.map((c) => scoreOne(c, ev, components, cfg)).sort(compareScored);
}

export interface RankingAssessment {
  status: VerdictStatus;
  top?: ScoredCandidate;
  runnerUp?: ScoredCandidate;
  /** Candidates within the tie band of the top score, top included */
  tied: ScoredCandidate[];
  /** True when correlation alone cannot settle the verdict */
  inconclusive: boolean;
  reasons: string[];
}

/**
 * Status from the ranking alone: UNRESOLVED when nothing clears the
 * threshold, RESOLVED when exactly one does with the required margin over the
 * runner-up, AMBIGUOUS otherwise.
 */
export function assessRanking(scored: readonly ScoredCandidate[], cfg: CorrelationSettings): RankingAssessment {
  const [top, runnerUp] = scored;
  if (!top) return { status: "UNRESOLVED", tied: [], inconclusive: false, reasons: ["no candidates"] };

  const tied = scored.filter((c) => round4(top.score - c.score) <= cfg.tieBand);
  const aboveThreshold = scored.filter((c) => c.score >= cfg.threshold).length;
  const lead = runnerUp ? round4(top.score - runnerUp.score) : 1;
  const reasons: string[] = [];
  if (top.score < cfg.threshold) reasons.push(`top score ${top.score} below threshold ${cfg.threshold}`);
  if (runnerUp && lead < cfg.margin) reasons.push(`lead ${lead} over runner-up below margin ${cfg.margin}`);
  if (tied.length > 1) reasons.push(`${tied.length} candidates within tie band ${cfg.tieBand}`);

  let status: VerdictStatus;
  if (top.score < cfg.threshold) status = "UNRESOLVED";
  else if (aboveThreshold === 1 && lead >= cfg.margin) status = "RESOLVED";
  else {
    status = "AMBIGUOUS";
    if (aboveThreshold > 1 && reasons.length === 0) reasons.push(`${aboveThreshold} candidates above threshold`);
  }

  return { status, top, runnerUp, tied, inconclusive: status !== "RESOLVED" || tied.length > 1, reasons };
}
