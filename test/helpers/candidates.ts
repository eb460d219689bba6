import type { ChangedFile, ScoredCandidate } from "../../src/types";

/** A scored candidate with just enough commit detail for arbitration and verdict tests. */
export function scoredCandidate(
  sha: string,
  score: number,
  opts: { message?: string; files?: ChangedFile[]; proximityMs?: number; timestamp?: string } = {},
): ScoredCandidate {
  return {
    snapshotId: "snapshot-1",
    commit: {
      sha,
      timestamp: opts.timestamp ?? "2023-06-13T09:30:00.000Z",
      message: opts.message ?? `change ${sha.slice(0, 7)}`,
      parents: [],
      files: opts.files ?? [],
      url: `https://github.com/xerial/snappy-java/commit/${sha}`,
    },
    proximityMs: opts.proximityMs ?? 0,
    advisoryNamed: false,
    score,
    components: {},
    evidence: [],
  };
}
