import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { cvssV3VectorToBaseScore, mapSeverity, severityFromCvssScore } from "../../src/utils/severity";

describe("mapSeverity", () => {
  it("maps labels case-insensitively", () => {
    assert.equal(mapSeverity("CRITICAL"), "critical");
    assert.equal(mapSeverity("High"), "high");
    assert.equal(mapSeverity("low"), "low");
  });

  it("treats moderate as medium", () => {
    assert.equal(mapSeverity("moderate"), "medium");
    assert.equal(mapSeverity("MEDIUM"), "medium");
  });

  it("returns unknown for anything else", () => {
    assert.equal(mapSeverity("severe"), "unknown");
    assert.equal(mapSeverity(""), "unknown");
    assert.equal(mapSeverity(undefined), "unknown");
  });
});

describe("severityFromCvssScore", () => {
  it("uses the CVSS rating bands", () => {
    assert.equal(severityFromCvssScore(9.0), "critical");
    assert.equal(severityFromCvssScore(8.9), "high");
    assert.equal(severityFromCvssScore(7.0), "high");
    assert.equal(severityFromCvssScore(4.0), "medium");
    assert.equal(severityFromCvssScore(0.1), "low");
  });

  it("returns unknown for zero, out of range and missing scores", () => {
    assert.equal(severityFromCvssScore(0), "unknown");
    assert.equal(severityFromCvssScore(10.5), "unknown");
    assert.equal(severityFromCvssScore(-1), "unknown");
    assert.equal(severityFromCvssScore(Number.NaN), "unknown");
    assert.equal(severityFromCvssScore(undefined), "unknown");
  });
});

describe("cvssV3VectorToBaseScore", () => {
  it("scores scope-unchanged vectors", () => {
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H"), 9.8);
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:H"), 7.5);
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.0/AV:N/AC:L/PR:N/UI:R/S:U/C:H/I:H/A:H"), 8.8);
  });

  it("scores scope-changed vectors", () => {
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:C/C:H/I:H/A:H"), 10);
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:R/S:C/C:L/I:L/A:N"), 6.1);
  });

  it("returns 0 when there is no impact", () => {
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:N/I:N/A:N"), 0);
  });

  it("rejects other versions and incomplete vectors", () => {
    assert.equal(cvssV3VectorToBaseScore("CVSS:2.0/AV:N/AC:L/Au:N/C:P/I:P/A:P"), undefined);
    assert.equal(cvssV3VectorToBaseScore("AV:N/AC:L/Au:N/C:P/I:P/A:P"), undefined);
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H"), undefined);
    assert.equal(cvssV3VectorToBaseScore("CVSS:3.1/AV:X/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H"), undefined);
  });
});
