import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { AdvisoryCollector, mergeAdvisories } from "../../../src/collectors/advisory/aggregator";
import type { AdvisorySource, SourceAdvisory } from "../../../src/collectors/advisory/source";
import { NotFound, ProviderUnavailable } from "../../../src/errors";
import { parsePurl } from "../../../src/ecosystems/purl";
import type { AdvisorySourceId } from "../../../src/types";
import { silentLogger } from "../../../src/utils/logger";

const ctx = { logger: silentLogger };
const pkg = parsePurl("pkg:maven/org.xerial.snappy/snappy-java@1.1.8.4");
const query = { vulnerabilityId: "CVE-2023-34455", pkg };

function part(source: AdvisorySourceId, overrides: Partial<SourceAdvisory> = {}): SourceAdvisory {
  return {
    source,
    id: "CVE-2023-34455",
    aliases: [],
    url: `https://${source}.example.test/CVE-2023-34455`,
    weaknesses: [],
    affected: [],
    references: [],
    fixCommits: [],
    ...overrides,
  };
}

function stubSource(id: AdvisorySourceId, result: SourceAdvisory | Error): AdvisorySource {
  return {
    id,
    fetch: async () => {
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

const mavenRange = (source: AdvisorySourceId, fixed: string) => ({
  ecosystem: "maven" as const,
  packageName: "org.xerial.snappy:snappy-java",
  events: [{ introduced: "0" }, { fixed }],
  versions: [],
  source,
});

describe("mergeAdvisories", () => {
  it("merges fields across sources", () => {
    const record = mergeAdvisories("cve-2023-34455", [
      part("osv", {
        id: "GHSA-qcwq-55hx-v3vh",
        aliases: ["CVE-2023-34455"],
        summary: "osv summary",
        description: "",
        weaknesses: ["CWE-770"],
        affected: [mavenRange("osv", "1.1.10.1")],
        references: [{ url: "https://x.test/a", kind: "other", source: "osv" }],
        fixCommits: ["aaaaaaa"],
        publishedAt: "2023-06-15T17:15:00Z",
        modifiedAt: "2023-06-20T00:00:00Z",
        severity: { rating: "high", score: 7.5, source: "osv" },
      }),
      part("github", {
        id: "GHSA-qcwq-55hx-v3vh",
        description: "github description",
        weaknesses: ["CWE-20", "CWE-770"],
        affected: [mavenRange("github", "1.1.10.0")],
        references: [
          { url: "https://x.test/a", kind: "other", source: "github" },
          { url: "https://x.test/b", kind: "other", source: "github" },
        ],
        fixCommits: ["aaaaaaa", "bbbbbbb"],
        publishedAt: "2023-06-14T00:00:00Z",
      }),
      part("nvd", {
        modifiedAt: "2023-06-27T15:00:00Z",
        severity: { rating: "high", score: 7.4, source: "nvd" },
      }),
    ]);

    assert.equal(record.id, "CVE-2023-34455");
    assert.deepEqual(record.aliases, ["GHSA-QCWQ-55HX-V3VH"]);
    assert.equal(record.summary, "osv summary");
    assert.equal(record.description, "github description");
    assert.deepEqual(record.weaknesses, ["CWE-20", "CWE-770"]);
    assert.deepEqual(record.affected, [mavenRange("osv", "1.1.10.1")]);
    assert.deepEqual(
      record.references.map((r) => `${r.source} ${r.url}`),
      ["osv https://x.test/a", "github https://x.test/b"],
    );
    assert.deepEqual(record.fixCommits, ["aaaaaaa", "bbbbbbb"]);
    assert.equal(record.publishedAt, "2023-06-14T00:00:00.000Z");
    assert.equal(record.modifiedAt, "2023-06-27T15:00:00.000Z");
    assert.equal(record.severity?.source, "nvd");
    assert.deepEqual(record.sources, ["osv", "github", "nvd"]);
    assert.ok(Object.isFrozen(record));
  });

  it("keeps github ranges for packages osv does not describe", () => {
    const npmRange = { ...mavenRange("github", "2.0.0"), ecosystem: "npm" as const, packageName: "snappy" };
    const record = mergeAdvisories("CVE-2023-34455", [
      part("osv", { affected: [mavenRange("osv", "1.1.10.1")] }),
      part("github", { affected: [mavenRange("github", "1.1.10.0"), npmRange] }),
    ]);
    assert.deepEqual(record.affected, [mavenRange("osv", "1.1.10.1"), npmRange]);
  });
});

describe("AdvisoryCollector", () => {
  it("treats a failing source as absent evidence", async () => {
    const collector = new AdvisoryCollector([
      stubSource("nvd", new ProviderUnavailable("nvd: HTTP 503", { provider: "nvd", status: 503 })),
      stubSource("osv", part("osv", { description: "from osv" })),
    ]);
    const record = await collector.fetch(query, ctx);
    assert.deepEqual(record.sources, ["osv"]);
    assert.equal(record.description, "from osv");
  });

  it("orders sources osv, github, nvd whatever order they are given in", async () => {
    const collector = new AdvisoryCollector([
      stubSource("nvd", part("nvd")),
      stubSource("github", part("github")),
      stubSource("osv", part("osv")),
    ]);
    const results = await collector.query(query, ctx);
    assert.deepEqual(
      results.map((r) => r.source),
      ["osv", "github", "nvd"],
    );
  });

  it("reports NotFound when every source lacks the id", async () => {
    const collector = new AdvisoryCollector([
      stubSource("osv", new NotFound("osv: missing", { provider: "osv" })),
      stubSource("nvd", new NotFound("nvd: missing", { provider: "nvd" })),
    ]);
    await assert.rejects(collector.fetch(query, ctx), {
      name: "NotFound",
      message: "advisory: CVE-2023-34455 not found in osv, nvd",
    });
  });

  it("surfaces an outage over a miss when nothing answered", async () => {
    const outage = new ProviderUnavailable("github: HTTP 502", { provider: "github", status: 502 });
    const collector = new AdvisoryCollector([
      stubSource("osv", new NotFound("osv: missing", { provider: "osv" })),
      stubSource("github", outage),
    ]);
    await assert.rejects(collector.fetch(query, ctx), (e) => e === outage);
  });

  it("rethrows errors that are not provider failures", async () => {
    const bug = new TypeError("boom");
    const collector = new AdvisoryCollector([stubSource("osv", bug)]);
    await assert.rejects(collector.fetch(query, ctx), (e) => e === bug);
  });

  it("fails when no source is enabled", async () => {
    await assert.rejects(new AdvisoryCollector([]).fetch(query, ctx), ProviderUnavailable);
  });
});
