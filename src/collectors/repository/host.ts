import type { CommitNode, RepositoryHostKind, RepositoryLocator, TagInfo } from "../../types";
import type { CollectorContext } from "../connector";

/** A commit as listed, before its file changes are fetched. */
export interface CommitSummary {
  sha: string;
  timestamp: string;
  message: string;
  parents: string[];
}

export interface ListCommitsOptions {
  ref: string;
  since?: string;
  until?: string;
  /** Stop paging once this many commits are collected */
  limit: number;
}

/** The source-hosting API operations the collectors need. */
export interface RepositoryHost {
  readonly kind: RepositoryHostKind;
  describe(repo: RepositoryLocator, ctx: CollectorContext): Promise<{ defaultBranch: string }>;
  listCommits(repo: RepositoryLocator, opts: ListCommitsOptions, ctx: CollectorContext): Promise<CommitSummary[]>;
  /** Commits reachable from head and not from base, oldest first */
  compare(repo: RepositoryLocator, base: string, head: string, limit: number, ctx: CollectorContext): Promise<CommitSummary[]>;
  getCommit(repo: RepositoryLocator, sha: string, ctx: CollectorContext): Promise<CommitNode>;
  listTags(repo: RepositoryLocator, limit: number, ctx: CollectorContext): Promise<TagInfo[]>;
}

/** Per-page size both hosts accept. */
export const PAGE_SIZE = 100;

/** Count +/- lines of a unified diff, ignoring the file headers. */
export function countDiffLines(patch: string): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;
  for (const line of patch.split("\n")) {
    if (line.startsWith("+++") || line.startsWith("---")) continue;
    if (line.startsWith("+")) additions++;
    else if (line.startsWith("-")) deletions++;
  }
  return { additions, deletions };
}

export function toIsoTimestamp(v: string): string {
  const t = Date.parse(v);
  return Number.isNaN(t) ? v : new Date(t).toISOString();
}
