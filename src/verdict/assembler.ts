import { commitUrl } from "../collectors/repository/repository-url";
import { type RankingAssessment, round4 } from "../correlation/correlation-engine";
import { describeWindow } from "../extractor/window";
import type {
  ArbitrationOutcome,
  CandidateWindow,
  EvidenceCitation,
  PackageIdentity,
  RepositoryLocator,
  ResolveResponse,
  RootCauseVerdict,
  ScoredCandidate,
  VerdictStatus,
  VulnerabilityRecord,
} from "../types";
import { deepFreeze } from "../utils/freeze";
import { changedFunctions } from "./functions";

export interface AssembleInput {
  record: VulnerabilityRecord;
  repository: RepositoryLocator;
  window: CandidateWindow;
  /** Correlation output, best first */
  scored: readonly ScoredCandidate[];
  assessment: RankingAssessment;
  /** Present only when arbitration was invoked */
  arbitration?: ArbitrationOutcome;
  threshold: number;
}

const clamp01 = (x: number) => round4(Math.min(1, Math.max(0, x)));

function sentence(text: string): string {
  return /[.!?]$/.test(text) ? text : `${text}.`;
}

function advisoryCitations(record: VulnerabilityRecord | undefined): EvidenceCitation[] {
  if (!record) return [];
  const seen = new Set<string>();
  const out: EvidenceCitation[] = [];
  const push = (c: EvidenceCitation) => {
    if (seen.has(c.url)) return;
    seen.add(c.url);
    out.push(c);
  };
  for (const url of record.advisoryPages) push({ kind: "advisory", url });
  for (const r of record.references) push({ kind: "advisory-reference", url: r.url });
  return out;
}

function pluralCandidates(n: number): string {
  return `${n} candidate${n === 1 ? "" : "s"}`;
}

/**
 * Combine the ranking and the arbitration outcome into the final verdict.
 *
 * - no arbitration, or arbitration without a decision: the ranking decides;
 * - `select`: confidence is the mean of the selected score and the provider's
 *   trust weight, RESOLVED only when that clears the threshold;
 * - `reject_all` / `insufficient_evidence`: UNRESOLVED with the best score as
 *   a diagnostic confidence.
 */
export function assembleVerdict(input: AssembleInput): RootCauseVerdict {
  const { record, repository, window, scored, assessment, arbitration, threshold } = input;
  const top = scored[0];
  const decision = arbitration?.decision;

  let status: VerdictStatus;
  let candidate: ScoredCandidate | null;
  let confidence: number;
  const why: string[] = [];

  if (!top) {
    status = "UNRESOLVED";
    candidate = null;
    confidence = 0;
    why.push("no candidate commit survived extraction");
  } else if (decision?.kind === "select") {
    const selected = scored.find((c) => c.commit.sha === decision.sha) ?? top;
    confidence = clamp01((selected.score + (arbitration?.trustWeight ?? 0)) / 2);
    status = confidence >= threshold ? "RESOLVED" : "AMBIGUOUS";
    candidate = selected;
    why.push(`${arbitration?.provider} selected ${selected.commit.sha.slice(0, 12)} (score ${selected.score})`);
  } else if (decision?.kind === "reject_all" || decision?.kind === "insufficient_evidence") {
    status = "UNRESOLVED";
    candidate = null;
    confidence = clamp01(top.score);
    why.push(
      decision.kind === "reject_all"
        ? `${arbitration?.provider} rejected every presented candidate`
        : `${arbitration?.provider} found the evidence insufficient`,
    );
  } else {
    status = assessment.status;
    candidate = status === "UNRESOLVED" ? null : top;
    confidence = clamp01(top.score);
    if (status === "RESOLVED") why.push(`${top.commit.sha.slice(0, 12)} leads the ranking with score ${top.score}`);
    why.push(...assessment.reasons);
    if (decision?.kind === "no_decision") {
      why.push(
        arbitration && arbitration.attempts.length > 0
          ? `arbitration gave no decision (${arbitration.attempts.map((a) => `${a.provider}: ${a.outcome}`).join(", ")})`
          : "arbitration gave no decision (no reasoning provider available)",
      );
    }
  }

  const parts = [`${describeWindow(window)}; ${pluralCandidates(scored.length)} considered`, ...why];
  if (arbitration?.justification) parts.push(`justification from ${arbitration.provider}: ${arbitration.justification}`);

  const evidence = advisoryCitations(record);
  const commitShas =
    status === "AMBIGUOUS"
      ? (assessment.tied.length > 1 ? assessment.tied : candidate ? [candidate] : []).map((c) => c.commit.sha)
      : candidate
        ? [candidate.commit.sha]
        : [];
  for (const sha of commitShas) evidence.push({ kind: "commit", url: commitUrl(repository, sha) });

  return deepFreeze({
    status,
    candidate,
    confidence,
    rationale: sentence(parts.join(". ")),
    evidence,
    window,
    candidatesConsidered: scored.length,
    arbitration,
    functions: candidate ? changedFunctions(candidate.commit) : [],
  });
}

/** Verdict for requests that end before any candidate is ranked. */
export function unresolvedVerdict(
  reason: string,
  opts: { record?: VulnerabilityRecord; window?: CandidateWindow; confidence?: number } = {},
): RootCauseVerdict {
  const prefix = opts.window ? `${describeWindow(opts.window)}; ` : "";
  return deepFreeze({
    status: "UNRESOLVED",
    candidate: null,
    confidence: clamp01(opts.confidence ?? 0),
    rationale: sentence(`${prefix}${reason}`),
    evidence: advisoryCitations(opts.record),
    window: opts.window,
    candidatesConsidered: 0,
    functions: [],
  });
}

/** Response record in the wire shape the external writer expects. */
export function toResponse(
  verdict: RootCauseVerdict,
  request: { vulnerabilityId: string; pkg: PackageIdentity; repository?: RepositoryLocator; packageUrl: string },
  record?: VulnerabilityRecord,
): ResolveResponse {
  const c = verdict.candidate;
  const repo = request.repository;
  return {
    vulnerability_id: request.vulnerabilityId,
    package_url: request.packageUrl,
    status: verdict.status,
    confidence: verdict.confidence,
    root_cause:
      c && repo
        ? {
            repository_url: repo.webUrl,
            commit: c.commit.sha,
            commit_url: commitUrl(repo, c.commit.sha),
            files: c.commit.files.map((f) => f.path),
            functions: [...verdict.functions],
          }
        : null,
    rationale: verdict.rationale,
    evidence: verdict.evidence.map((e) => ({ type: e.kind, url: e.url })),
    vulnerability: record
      ? {
          aliases: [...record.aliases],
          weaknesses: [...record.weaknesses],
          severity: record.severity
            ? { rating: record.severity.rating, score: record.severity.score, vector: record.severity.vector }
            : null,
          published: record.publishedAt ?? null,
        }
      : null,
  };
}
