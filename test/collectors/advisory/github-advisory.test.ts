import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { GitHubAdvisorySource, normalizeGithubAdvisory } from "../../../src/collectors/advisory/github-advisory";
import { NotFound } from "../../../src/errors";
import { parsePurl } from "../../../src/ecosystems/purl";
import { silentLogger } from "../../../src/utils/logger";
import { fakeJsonClient } from "../../helpers/fakes";

const BASE = "https://api.github.com";
const ctx = { logger: silentLogger };
const pkg = parsePurl("pkg:maven/org.xerial.snappy/snappy-java@1.1.8.4");

function advisory(overrides: Record<string, unknown> = {}) {
  return {
    ghsa_id: "GHSA-qcwq-55hx-v3vh",
    cve_id: "CVE-2023-34455",
    html_url: "https://github.com/advisories/GHSA-qcwq-55hx-v3vh",
    summary: "snappy-java's unchecked chunk length leads to DoS",
    description: "Unchecked chunk length.",
    severity: "high",
    cvss: { vector_string: "CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:H", score: 7.5 },
    cwes: [{ cwe_id: "CWE-770" }],
    references: [
      "https://github.com/xerial/snappy-java/security/advisories/GHSA-qcwq-55hx-v3vh",
      "https://github.com/xerial/snappy-java/commit/3bf67857fcf70d9eea56eed4af7c925671e8eaea",
    ],
    published_at: "2023-06-15T17:15:00Z",
    updated_at: "2023-06-20T00:00:00Z",
    vulnerabilities: [
      {
        package: { ecosystem: "maven", name: "org.xerial.snappy:snappy-java" },
        vulnerable_version_range: "< 1.1.10.1",
        first_patched_version: "1.1.10.1",
      },
    ],
    ...overrides,
  };
}

describe("normalizeGithubAdvisory", () => {
  it("turns a version range expression into range events", () => {
    const adv = normalizeGithubAdvisory(advisory());
    assert.deepEqual(adv.affected, [
      {
        ecosystem: "maven",
        packageName: "org.xerial.snappy:snappy-java",
        events: [{ introduced: "0" }, { fixed: "1.1.10.1" }],
        versions: [],
        source: "github",
      },
    ]);
    assert.deepEqual(adv.aliases, ["CVE-2023-34455"]);
    assert.deepEqual(adv.weaknesses, ["CWE-770"]);
    assert.deepEqual(adv.fixCommits, ["3bf67857fcf70d9eea56eed4af7c925671e8eaea"]);
    assert.deepEqual(adv.severity, {
      rating: "high",
      score: 7.5,
      vector: "CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:H",
      source: "github",
    });
  });

  it("falls back to the textual severity when no score is given", () => {
    const adv = normalizeGithubAdvisory(advisory({ cvss: { vector_string: null, score: 0 }, severity: "moderate" }));
    assert.deepEqual(adv.severity, { rating: "medium", source: "github" });
  });

  it("skips packages in ecosystems it cannot place", () => {
    const adv = normalizeGithubAdvisory(
      advisory({
        vulnerabilities: [{ package: { ecosystem: "actions", name: "x/y" }, vulnerable_version_range: "< 2" }],
      }),
    );
    assert.deepEqual(adv.affected, []);
  });
});

describe("GitHubAdvisorySource", () => {
  it("prefers the advisory that covers the requested package", async () => {
    const other = advisory({
      ghsa_id: "GHSA-2222-3333-4444",
      html_url: "https://github.com/advisories/GHSA-2222-3333-4444",
      vulnerabilities: [{ package: { ecosystem: "npm", name: "snappy" }, vulnerable_version_range: "< 7.0.0" }],
    });
    const http = fakeJsonClient("github", {
      [`GET ${BASE}/advisories?cve_id=CVE-2023-34455`]: [other, advisory()],
    });
    const adv = await new GitHubAdvisorySource(http, BASE, "test-secret").fetch(
      { vulnerabilityId: "cve-2023-34455", pkg },
      ctx,
    );
    assert.equal(adv.id, "GHSA-qcwq-55hx-v3vh");
    assert.equal(http.requests[0].headers?.authorization, "Bearer test-secret");
    assert.equal(http.requests[0].headers?.["x-github-api-version"], "2022-11-28");
  });

  it("looks up GHSA ids directly and sends no token when none is configured", async () => {
    const http = fakeJsonClient("github", { [`GET ${BASE}/advisories/GHSA-QCWQ-55HX-V3VH`]: advisory() });
    const adv = await new GitHubAdvisorySource(http, BASE).fetch({ vulnerabilityId: "GHSA-qcwq-55hx-v3vh", pkg }, ctx);
    assert.equal(adv.url, "https://github.com/advisories/GHSA-qcwq-55hx-v3vh");
    assert.equal(http.requests[0].headers?.authorization, undefined);
  });

  it("reports NotFound for an empty list and for foreign ids", async () => {
    const http = fakeJsonClient("github", { [`GET ${BASE}/advisories?cve_id=CVE-2023-34455`]: [] });
    const source = new GitHubAdvisorySource(http, BASE);
    await assert.rejects(source.fetch({ vulnerabilityId: "CVE-2023-34455", pkg }, ctx), NotFound);
    await assert.rejects(source.fetch({ vulnerabilityId: "PYSEC-2021-1", pkg }, ctx), NotFound);
    assert.equal(http.requests.length, 1);
  });
});
