import type { CandidateWindow, CommitCandidate, CommitNode, RepositorySnapshot, VulnerabilityRecord } from "../types";
import type { Logger } from "../utils/logger";
import { isDocumentationPath } from "./files";
import { touchesHintedPath } from "./path-hints";

export interface ExtractOptions {
  maxCandidates: number;
  pathHints: readonly string[];
  logger?: Logger;
}

export function isAdvisoryNamed(sha: string, fixCommits: readonly string[]): boolean {
  return fixCommits.some((f) => sha.startsWith(f) || f.startsWith(sha));
}

function inDateWindow(c: CommitNode, w: CandidateWindow): boolean {
  const t = Date.parse(c.timestamp);
  if (w.dates.since && t < Date.parse(w.dates.since)) return false;
  if (w.dates.until && t > Date.parse(w.dates.until)) return false;
  return true;
}

function distance(c: CommitNode, iso: string | undefined): number {
  if (!iso) return 0;
  return Math.abs(Date.parse(c.timestamp) - Date.parse(iso));
}

/**
 * Derive the bounded candidate set from a snapshot. Ordered by proximity to
 * the disclosure date, ties by sha; scores stay unset.
 */
export function extractCandidates(
  snapshot: RepositorySnapshot,
  record: Pick<VulnerabilityRecord, "fixCommits" | "publishedAt">,
  window: CandidateWindow,
  opts: ExtractOptions,
): CommitCandidate[] {
  const named = (c: CommitNode) => isAdvisoryNamed(c.sha, record.fixCommits);

  // A tag window is already exact: the snapshot lists the range and nothing else
  const inWindow = snapshot.commits.filter((c) => named(c) || window.kind !== "date" || inDateWindow(c, window));

  const withChanges = inWindow.filter((c) => {
    if (named(c)) return true;
    if (c.files.length === 0) return false;
    return !c.files.every((f) => isDocumentationPath(f.path));
  });

  // Hints that no commit touches are wrong or name a file outside this repository
  const hints = opts.pathHints.filter((h) => withChanges.some((c) => touchesHintedPath(c.files, [h])));
  if (hints.length < opts.pathHints.length) {
    opts.logger?.debug(`extractor: ignoring path hints that match no commit`, {
      ignored: opts.pathHints.filter((h) => !hints.includes(h)),
    });
  }
  const hinted = hints.length === 0 ? withChanges : withChanges.filter((c) => named(c) || touchesHintedPath(c.files, hints));

  const boundary = window.fixBoundary ?? window.disclosedAt;
  const capped = [...hinted]
    .sort((a, b) => {
      const na = named(a) ? 0 : 1;
      const nb = named(b) ? 0 : 1;
      if (na !== nb) return na - nb;
      const d = distance(a, boundary) - distance(b, boundary);
      if (d !== 0) return d;
      return a.sha < b.sha ? -1 : a.sha > b.sha ? 1 : 0;
    })
    .slice(0, opts.maxCandidates);

  const disclosure = window.disclosedAt ?? boundary;
  return capped
    .map(
      (commit): CommitCandidate => ({
        snapshotId: snapshot.snapshotId,
        commit,
        proximityMs: distance(commit, disclosure),
        advisoryNamed: named(commit),
        score: null,
        components: {},
        evidence: [],
      }),
    )
    .sort((a, b) => a.proximityMs - b.proximityMs || (a.commit.sha < b.commit.sha ? -1 : a.commit.sha > b.commit.sha ? 1 : 0));
}
