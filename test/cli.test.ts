import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Arbiter } from "../src/arbitration/arbiter";
import { EXIT_OK, EXIT_SETUP, EXIT_TERMINAL, runCli } from "../src/cli";
import { RepositoryUnavailableError } from "../src/errors";
import type { PipelineDeps } from "../src/pipeline";
import type { CommitNode, ReleaseMetadata, RepositorySnapshot, ResolverConfig, VulnerabilityRecord } from "../src/types";
import { silentLogger } from "../src/utils/logger";
import { SNAPPY_REQUEST, fakeCollector, fixture, snapshotOf } from "./helpers/fakes";

let dir: string;

before(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "fixtrace-cli-"));
  await fs.writeFile(path.join(dir, "request.json"), JSON.stringify(SNAPPY_REQUEST), "utf-8");
  await fs.writeFile(path.join(dir, "broken.json"), "{ not json", "utf-8");
  await fs.writeFile(
    path.join(dir, "bad-url.json"),
    JSON.stringify({ ...SNAPPY_REQUEST, repository_url: "not a url" }),
    "utf-8",
  );
  await fs.writeFile(path.join(dir, "strict.yaml"), "credentials:\n  require:\n    - GITHUB_TOKEN\n", "utf-8");
});

after(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function fakeDeps(repository?: () => Promise<RepositorySnapshot>): (config: ResolverConfig) => PipelineDeps {
  return (config) => {
    const record = fixture<VulnerabilityRecord>("snappy-advisory.json");
    const commits = fixture<CommitNode[]>("snappy-commits.json");
    return {
      config,
      logger: silentLogger,
      advisory: fakeCollector("advisory", async () => record),
      registry: fakeCollector("registry", async (): Promise<ReleaseMetadata> => ({ releases: [], tags: [] })),
      repository: fakeCollector("repository", repository ?? (async () => snapshotOf(commits))),
      arbiter: new Arbiter([], config.arbitration),
    };
  };
}

function run(argv: string[], opts: { env?: Record<string, string | undefined>; repository?: () => Promise<RepositorySnapshot> } = {}) {
  return runCli(argv, { cwd: dir, env: opts.env ?? {}, logger: silentLogger, deps: fakeDeps(opts.repository) });
}

describe("runCli", () => {
  it("writes the verdict as pretty JSON and exits 0", async () => {
    const code = await run(["--input", "request.json", "--output", "out/response.json"]);
    assert.equal(code, EXIT_OK);

    const text = await fs.readFile(path.join(dir, "out", "response.json"), "utf-8");
    assert.ok(text.endsWith("}\n"));
    const response: unknown = JSON.parse(text);
    assert.ok(typeof response === "object" && response !== null && "status" in response);
    assert.equal(response.status, "RESOLVED");
  });

  it("accepts short flags", async () => {
    const code = await run(["-i", "request.json", "-o", "short.json"]);
    assert.equal(code, EXIT_OK);
    await fs.access(path.join(dir, "short.json"));
  });

  it("exits 2 when input or output is missing", async () => {
    assert.equal(await run([]), EXIT_SETUP);
    assert.equal(await run(["--input", "request.json"]), EXIT_SETUP);
  });

  it("exits 2 on an unknown flag", async () => {
    assert.equal(await run(["--input", "request.json", "--output", "x.json", "--verbose"]), EXIT_SETUP);
  });

  it("exits 2 when an explicit config file cannot be read", async () => {
    assert.equal(
      await run(["--input", "request.json", "--output", "x.json", "--config", "missing.yaml"]),
      EXIT_SETUP,
    );
  });

  it("exits 2 when a required credential is unset", async () => {
    const argv = ["--input", "request.json", "--output", "cred.json", "--config", "strict.yaml"];
    assert.equal(await run(argv), EXIT_SETUP);
    assert.equal(await run(argv, { env: { GITHUB_TOKEN: "  " } }), EXIT_SETUP);
    assert.equal(await run(argv, { env: { GITHUB_TOKEN: "test-secret" } }), EXIT_OK);
  });

  it("exits 2 when the request is not JSON or does not exist", async () => {
    assert.equal(await run(["--input", "broken.json", "--output", "x.json"]), EXIT_SETUP);
    assert.equal(await run(["--input", "absent.json", "--output", "x.json"]), EXIT_SETUP);
  });

  it("exits 1 on an invalid request and writes nothing", async () => {
    const code = await run(["--input", "bad-url.json", "--output", "invalid.json"]);
    assert.equal(code, EXIT_TERMINAL);
    await assert.rejects(fs.access(path.join(dir, "invalid.json")));
  });

  it("exits 1 when the repository is unavailable", async () => {
    const code = await run(["--input", "request.json", "--output", "down.json"], {
      repository: async () => {
        throw new RepositoryUnavailableError("repository: https://github.com/xerial/snappy-java unavailable: github: HTTP 503");
      },
    });
    assert.equal(code, EXIT_TERMINAL);
    await assert.rejects(fs.access(path.join(dir, "down.json")));
  });
});
