import { randomUUID } from "node:crypto";
import { MalformedEvidence, NotFound, RepositoryUnavailableError, TimeoutError, isResolutionError } from "../../errors";
import type { CommitNode, RepositoryHostKind, RepositoryQuery, RepositorySnapshot } from "../../types";
import { processWithConcurrency } from "../../utils/concurrency";
import { errorMessage } from "../../utils/error";
import { deepFreeze } from "../../utils/freeze";
import { abortReason } from "../../utils/retry";
import type { CollectorContext, EvidenceCollector } from "../connector";
import type { CommitSummary, RepositoryHost } from "./host";

export interface RepositoryCollectorOptions {
  maxCommits: number;
  fetchConcurrency: number;
}

/**
 * Builds the per-request commit-graph snapshot. This is the one mandatory
 * evidence source: a failure to describe or list the repository, or an
 * outage while fetching commits, surfaces as RepositoryUnavailableError.
 * A single commit that is missing or fails validation is dropped and
 * recorded in `skipped`.
 */
export class RepositoryCollector implements EvidenceCollector<RepositoryQuery, RepositorySnapshot> {
  readonly id = "repository";

  constructor(
    private readonly hosts: Partial<Record<RepositoryHostKind, RepositoryHost>>,
    private readonly opts: RepositoryCollectorOptions,
  ) {}

  hostFor(kind: RepositoryHostKind): RepositoryHost | undefined {
    return this.hosts[kind];
  }

  async fetch(query: RepositoryQuery, ctx: CollectorContext): Promise<RepositorySnapshot> {
    const repo = query.repository;
    const host = this.hosts[repo.host];
    if (!host) {
      throw new RepositoryUnavailableError(`repository: no ${repo.host} host configured for ${repo.webUrl}`);
    }

    try {
      return await this.collect(host, query, ctx);
    } catch (e) {
      if (ctx.signal?.aborted) throw abortReason(ctx.signal);
      if (e instanceof TimeoutError || e instanceof RepositoryUnavailableError) throw e;
      if (!isResolutionError(e)) throw e;
      throw new RepositoryUnavailableError(`repository: ${repo.webUrl} unavailable: ${errorMessage(e)}`, {
        provider: repo.host,
        cause: e,
      });
    }
  }

  private async collect(host: RepositoryHost, query: RepositoryQuery, ctx: CollectorContext): Promise<RepositorySnapshot> {
    const repo = query.repository;
    const { defaultBranch } = await host.describe(repo, ctx);
    const ref = query.ref ?? defaultBranch;
    // One past the cap tells us whether the listing was cut short
    const wanted = this.opts.maxCommits + 1;

    let listed: CommitSummary[];
    if (query.range) {
      listed = await host.compare(repo, query.range.base, query.range.head, wanted, ctx);
    } else {
      listed = await host.listCommits(repo, { ref, since: query.window.since, until: query.window.until, limit: wanted }, ctx);
    }
    const truncated = listed.length > this.opts.maxCommits;
    if (truncated) {
      ctx.logger.warn(`repository: ${repo.webUrl} listing capped at ${this.opts.maxCommits} commits`);
      listed = listed.slice(0, this.opts.maxCommits);
    }

    const listedShas = new Set(listed.map((c) => c.sha));
    const extra = [...new Set(query.includeShas.map((s) => s.toLowerCase()))].filter(
      (sha) => !listedShas.has(sha) && ![...listedShas].some((l) => l.startsWith(sha)),
    );

    const skipped: string[] = [];
    const details = await processWithConcurrency(
      [...listed.map((c) => ({ sha: c.sha, required: true })), ...extra.map((sha) => ({ sha, required: false }))],
      this.opts.fetchConcurrency,
      async ({ sha, required }): Promise<CommitNode | null> => {
        try {
          return await host.getCommit(repo, sha, ctx);
        } catch (e) {
          if (!(e instanceof NotFound || e instanceof MalformedEvidence)) throw e;
          if (required) {
            ctx.logger.warn(`repository: dropping commit ${sha} of ${repo.webUrl}: ${errorMessage(e)}`);
            skipped.push(sha);
          } else {
            // An advisory may name a sha from a fork or a rewritten history
            ctx.logger.warn(`repository: advisory-named commit ${sha} unavailable in ${repo.webUrl}: ${errorMessage(e)}`);
          }
          return null;
        }
      },
      ctx.signal,
    );

    const seen = new Set<string>();
    const commits: CommitNode[] = [];
    for (const c of details) {
      if (!c || seen.has(c.sha)) continue;
      seen.add(c.sha);
      commits.push(c);
    }
    ctx.logger.debug(`repository: snapshot of ${commits.length} commits from ${repo.webUrl}@${ref}`);

    return deepFreeze({
      snapshotId: randomUUID(),
      repository: repo,
      defaultBranch,
      ref,
      window: query.window,
      range: query.range,
      commits,
      truncated,
      skipped: skipped.sort(),
    });
  }
}
