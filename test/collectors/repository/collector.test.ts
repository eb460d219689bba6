import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RepositoryCollector } from "../../../src/collectors/repository/collector";
import type { CommitSummary, ListCommitsOptions, RepositoryHost } from "../../../src/collectors/repository/host";
import { MalformedEvidence, NotFound, ProviderUnavailable, RepositoryUnavailableError } from "../../../src/errors";
import type { CommitNode, RepositoryQuery } from "../../../src/types";
import { silentLogger } from "../../../src/utils/logger";
import { SNAPPY_REPO } from "../../helpers/fakes";

const ctx = { logger: silentLogger };

function summary(sha: string): CommitSummary {
  return { sha, timestamp: "2023-06-13T09:30:00.000Z", message: `commit ${sha}`, parents: [] };
}

interface FakeHostOptions {
  listed?: string[];
  known?: string[];
  describeError?: Error;
  commitErrors?: Record<string, Error>;
}

function fakeHost(o: FakeHostOptions) {
  const calls: { list: ListCommitsOptions[]; compare: string[]; commits: string[] } = { list: [], compare: [], commits: [] };
  const listed = (o.listed ?? []).map(summary);
  const known = new Set([...(o.listed ?? []), ...(o.known ?? [])]);
  const host: RepositoryHost = {
    kind: "github",
    describe: async () => {
      if (o.describeError) throw o.describeError;
      return { defaultBranch: "master" };
    },
    listCommits: async (_repo, opts) => {
      calls.list.push(opts);
      return listed.slice(0, opts.limit);
    },
    compare: async (_repo, base, head, limit) => {
      calls.compare.push(`${base}...${head}`);
      return listed.slice(-limit);
    },
    getCommit: async (_repo, sha): Promise<CommitNode> => {
      calls.commits.push(sha);
      const failure = o.commitErrors?.[sha];
      if (failure) throw failure;
      if (!known.has(sha)) throw new NotFound(`github: no commit ${sha}`, { provider: "github" });
      return { ...summary(sha), files: [], url: `https://github.com/xerial/snappy-java/commit/${sha}` };
    },
    listTags: async () => [],
  };
  return { host, calls };
}

function query(overrides: Partial<RepositoryQuery> = {}): RepositoryQuery {
  return {
    repository: SNAPPY_REPO,
    window: { since: "2023-02-01T00:00:00.000Z", until: "2023-10-27T00:00:00.000Z" },
    includeShas: [],
    ...overrides,
  };
}

describe("RepositoryCollector", () => {
  it("snapshots the commits listed inside the window", async () => {
    const { host, calls } = fakeHost({ listed: ["c1", "c2"] });
    const snap = await new RepositoryCollector({ github: host }, { maxCommits: 10, fetchConcurrency: 2 }).fetch(query(), ctx);

    assert.equal(snap.ref, "master");
    assert.equal(snap.truncated, false);
    assert.deepEqual(
      snap.commits.map((c) => c.sha),
      ["c1", "c2"],
    );
    assert.deepEqual(calls.list, [
      { ref: "master", since: "2023-02-01T00:00:00.000Z", until: "2023-10-27T00:00:00.000Z", limit: 11 },
    ]);
    assert.ok(Object.isFrozen(snap.commits));
  });

  it("marks the snapshot truncated when the listing exceeds the cap", async () => {
    const { host } = fakeHost({ listed: ["c1", "c2", "c3"] });
    const snap = await new RepositoryCollector({ github: host }, { maxCommits: 2, fetchConcurrency: 1 }).fetch(query(), ctx);
    assert.equal(snap.truncated, true);
    assert.deepEqual(
      snap.commits.map((c) => c.sha),
      ["c1", "c2"],
    );
  });

  it("follows a ref range instead of the window when given one", async () => {
    const { host, calls } = fakeHost({ listed: ["c1"] });
    await new RepositoryCollector({ github: host }, { maxCommits: 10, fetchConcurrency: 1 }).fetch(
      query({ ref: "v1.1.10.1", range: { base: "v1.1.10.0", head: "v1.1.10.1" } }),
      ctx,
    );
    assert.deepEqual(calls.compare, ["v1.1.10.0...v1.1.10.1"]);
    assert.deepEqual(calls.list, []);
  });

  it("adds advisory-named commits and skips the ones the host does not know", async () => {
    const { host, calls } = fakeHost({ listed: ["c1aaaaa"], known: ["f1e0000"] });
    const snap = await new RepositoryCollector({ github: host }, { maxCommits: 10, fetchConcurrency: 1 }).fetch(
      query({ includeShas: ["F1E0000", "c1a", "dead000"] }),
      ctx,
    );
    assert.deepEqual(calls.commits, ["c1aaaaa", "f1e0000", "dead000"]);
    assert.deepEqual(
      snap.commits.map((c) => c.sha),
      ["c1aaaaa", "f1e0000"],
    );
  });

  it("turns provider failures into RepositoryUnavailableError", async () => {
    const cause = new ProviderUnavailable("github: HTTP 503", { provider: "github", status: 503 });
    const { host } = fakeHost({ describeError: cause });
    await assert.rejects(
      new RepositoryCollector({ github: host }, { maxCommits: 10, fetchConcurrency: 1 }).fetch(query(), ctx),
      (e) =>
        e instanceof RepositoryUnavailableError &&
        e.cause === cause &&
        e.message === "repository: https://github.com/xerial/snappy-java unavailable: github: HTTP 503",
    );
  });

  it("drops listed commits that are missing or fail validation", async () => {
    const { host, calls } = fakeHost({
      listed: ["c1", "c2", "c3", "c4"],
      commitErrors: {
        c3: new MalformedEvidence("github: commit failed validation", { provider: "github" }),
        c2: new NotFound("github: gone", { provider: "github" }),
      },
    });
    const snap = await new RepositoryCollector({ github: host }, { maxCommits: 10, fetchConcurrency: 2 }).fetch(query(), ctx);

    assert.deepEqual(
      snap.commits.map((c) => c.sha),
      ["c1", "c4"],
    );
    assert.deepEqual(snap.skipped, ["c2", "c3"]);
    assert.equal(calls.commits.length, 4);
  });

  it("fails when the host is down while fetching a listed commit", async () => {
    const { host } = fakeHost({
      listed: ["c1"],
      commitErrors: { c1: new ProviderUnavailable("github: HTTP 502", { provider: "github", status: 502 }) },
    });
    await assert.rejects(
      new RepositoryCollector({ github: host }, { maxCommits: 10, fetchConcurrency: 1 }).fetch(query(), ctx),
      { message: "repository: https://github.com/xerial/snappy-java unavailable: github: HTTP 502" },
    );
  });

  it("stops fetching commits once one fetch has failed", async () => {
    const listed = Array.from({ length: 40 }, (_, i) => `c${i}`);
    const { host, calls } = fakeHost({
      listed,
      commitErrors: { c0: new ProviderUnavailable("github: HTTP 503", { provider: "github", status: 503 }) },
    });
    await assert.rejects(
      new RepositoryCollector({ github: host }, { maxCommits: 50, fetchConcurrency: 2 }).fetch(query(), ctx),
      RepositoryUnavailableError,
    );
    await new Promise((resolve) => setTimeout(resolve, 20));
    assert.deepEqual(calls.commits, ["c0", "c1"]);
  });

  it("fails when no host serves the repository", async () => {
    await assert.rejects(
      new RepositoryCollector({}, { maxCommits: 10, fetchConcurrency: 1 }).fetch(query(), ctx),
      { message: "repository: no github host configured for https://github.com/xerial/snappy-java" },
    );
  });
});
