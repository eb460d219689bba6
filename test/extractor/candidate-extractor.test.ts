import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { extractCandidates, isAdvisoryNamed } from "../../src/extractor/candidate-extractor";
import type { CandidateWindow, CommitNode } from "../../src/types";
import { snapshotOf } from "../helpers/fakes";

const DISCLOSED = "2023-06-15T17:15:00.000Z";
const HOUR = 3_600_000;

const dateWindow: CandidateWindow = {
  kind: "date",
  dates: { since: "2023-02-01T17:15:00.000Z", until: "2023-10-27T17:15:00.000Z" },
  fixBoundary: DISCLOSED,
  disclosedAt: DISCLOSED,
};

function commit(sha: string, timestamp: string, paths: string[]): CommitNode {
  return {
    sha,
    timestamp,
    message: `change ${sha.slice(0, 4)}`,
    parents: [],
    files: paths.map((path) => ({ path, status: "modified", additions: 1, deletions: 1 })),
    url: `https://github.com/xerial/snappy-java/commit/${sha}`,
  };
}

const A = commit("aaaa000000", "2023-06-13T09:30:00.000Z", ["src/A.java"]);
const DOCS = commit("bbbb000000", "2023-06-20T00:00:00.000Z", ["README.md", "docs/usage.rst"]);
const OLD = commit("cccc000000", "2022-01-01T00:00:00.000Z", ["src/C.java"]);
const NAMED = commit("dddd000000", "2022-01-01T00:00:00.000Z", []);
const EMPTY = commit("eeee000000", "2023-07-15T00:00:00.000Z", []);
const F = commit("ffff000000", "2023-06-16T00:00:00.000Z", ["src/F.java"]);
const snapshot = snapshotOf([A, DOCS, OLD, NAMED, EMPTY, F]);
const record = { fixCommits: ["dddd000"], publishedAt: DISCLOSED };

describe("extractCandidates", () => {
  it("keeps code changes inside the window and advisory-named commits", () => {
    const out = extractCandidates(snapshot, record, dateWindow, { maxCandidates: 25, pathHints: [] });
    assert.deepEqual(
      out.map((c) => c.commit.sha),
      ["ffff000000", "aaaa000000", "dddd000000"],
    );
    assert.deepEqual(
      out.map((c) => c.advisoryNamed),
      [false, false, true],
    );
    assert.equal(out[0].proximityMs, 6.75 * HOUR);
    assert.equal(out[1].proximityMs, 55.75 * HOUR);
    assert.equal(out[0].score, null);
    assert.equal(out[0].snapshotId, "snapshot-1");
  });

  it("caps the set by distance to the fix, keeping named commits first", () => {
    const out = extractCandidates(snapshot, record, dateWindow, { maxCandidates: 2, pathHints: [] });
    assert.deepEqual(
      out.map((c) => c.commit.sha),
      ["ffff000000", "dddd000000"],
    );
  });

  it("narrows to commits touching hinted paths and drops hints nothing touches", () => {
    const out = extractCandidates(snapshot, record, dateWindow, {
      maxCandidates: 25,
      pathHints: ["A.java", "nowhere.c"],
    });
    assert.deepEqual(
      out.map((c) => c.commit.sha),
      ["aaaa000000", "dddd000000"],
    );
  });

  it("does not filter by date inside a tag window", () => {
    const tagWindow: CandidateWindow = { ...dateWindow, kind: "tag" };
    const out = extractCandidates(snapshot, { fixCommits: [], publishedAt: DISCLOSED }, tagWindow, {
      maxCandidates: 25,
      pathHints: [],
    });
    assert.deepEqual(
      out.map((c) => c.commit.sha),
      ["ffff000000", "aaaa000000", "cccc000000"],
    );
  });

  it("breaks proximity ties by sha", () => {
    const twin = commit("0000aaaa00", A.timestamp, ["src/B.java"]);
    const out = extractCandidates(snapshotOf([A, twin]), { fixCommits: [] }, { kind: "unbounded", dates: {} }, {
      maxCandidates: 25,
      pathHints: [],
    });
    assert.deepEqual(
      out.map((c) => c.commit.sha),
      ["0000aaaa00", "aaaa000000"],
    );
    assert.equal(out[0].proximityMs, 0);
  });
});

describe("isAdvisoryNamed", () => {
  it("matches abbreviated shas either way round", () => {
    assert.equal(isAdvisoryNamed("a1b2c3d4e5", ["a1b2c3d"]), true);
    assert.equal(isAdvisoryNamed("a1b2c3d", ["a1b2c3d4e5"]), true);
    assert.equal(isAdvisoryNamed("a1b2c3d", ["ffffff0"]), false);
  });
});
