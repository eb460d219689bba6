import { after, afterEach, before, describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import http from "node:http";
import type { AddressInfo } from "node:net";
import { MemoryCache } from "../../src/cache/memory-cache";
import { MalformedEvidence, NotFound, ProviderUnavailable, RateLimited, TimeoutError } from "../../src/errors";
import { createDeadline } from "../../src/utils/deadline";
import { HttpClient, HttpError, classifyHttpError, parseRetryAfter } from "../../src/utils/http";

interface SeenRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

function stubFetch(responses: Array<() => Response>): SeenRequest[] {
  const seen: SeenRequest[] = [];
  let i = 0;
  mock.method(globalThis, "fetch", async (input: string | URL | Request, init?: RequestInit) => {
    seen.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    });
    const make = responses[Math.min(i++, responses.length - 1)];
    return make();
  });
  return seen;
}

const json = (body: unknown, init: ResponseInit = {}) => () =>
  new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" }, ...init });

function client(extra: Partial<ConstructorParameters<typeof HttpClient>[0]> = {}): HttpClient {
  return new HttpClient({
    provider: "osv",
    timeoutMs: 1000,
    userAgent: "fixtrace-test",
    headers: { "x-client": "test" },
    retry: { retries: 2, minDelayMs: 1, maxDelayMs: 2, factor: 2, jitter: 0 },
    ...extra,
  });
}

describe("HttpClient", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("parses JSON and sends the client headers", async () => {
    const seen = stubFetch([json({ id: "CVE-2023-34455" })]);
    const out = await client().getJson("https://api.osv.dev/v1/vulns/CVE-2023-34455", {
      headers: { authorization: "Bearer test-token" },
    });
    assert.deepEqual(out, { id: "CVE-2023-34455" });
    assert.equal(seen.length, 1);
    assert.equal(seen[0].headers.get("user-agent"), "fixtrace-test");
    assert.equal(seen[0].headers.get("x-client"), "test");
    assert.equal(seen[0].headers.get("authorization"), "Bearer test-token");
  });

  it("posts a JSON body", async () => {
    const seen = stubFetch([json({ vulns: [] })]);
    await client().postJson("https://api.osv.dev/v1/query", { package: { name: "left-pad" } });
    assert.equal(seen[0].method, "POST");
    assert.equal(seen[0].headers.get("content-type"), "application/json");
    assert.equal(seen[0].body, '{"package":{"name":"left-pad"}}');
  });

  it("maps 404 to NotFound without retrying", async () => {
    const seen = stubFetch([() => new Response("missing", { status: 404, statusText: "Not Found" })]);
    await assert.rejects(client().getJson("https://api.osv.dev/v1/vulns/X"), NotFound);
    assert.equal(seen.length, 1);
  });

  it("retries a rate limit and then succeeds", async () => {
    const seen = stubFetch([
      () => new Response("", { status: 429, headers: { "retry-after": "0" } }),
      json({ ok: true }),
    ]);
    assert.deepEqual(await client().getJson("https://api.osv.dev/v1/vulns/X"), { ok: true });
    assert.equal(seen.length, 2);
  });

  it("retries server errors up to the limit", async () => {
    const seen = stubFetch([() => new Response("", { status: 503, statusText: "Service Unavailable" })]);
    await assert.rejects(client().getJson("https://api.osv.dev/v1/vulns/X"), (e: unknown) => {
      return e instanceof ProviderUnavailable && e.status === 503 && e.retryable;
    });
    assert.equal(seen.length, 3);
  });

  it("does not retry authentication failures", async () => {
    const seen = stubFetch([() => new Response("", { status: 401, statusText: "Unauthorized" })]);
    await assert.rejects(client().getJson("https://api.osv.dev/v1/vulns/X"), (e: unknown) => {
      return e instanceof ProviderUnavailable && !e.retryable;
    });
    assert.equal(seen.length, 1);
  });

  it("reports an unparsable body as malformed evidence", async () => {
    stubFetch([() => new Response("<html>", { status: 200 })]);
    await assert.rejects(client().getJson("https://api.osv.dev/v1/vulns/X"), MalformedEvidence);
  });

  it("refuses non-http URLs", async () => {
    const seen = stubFetch([json({})]);
    await assert.rejects(client().getJson("file:///etc/passwd"), ProviderUnavailable);
    assert.equal(seen.length, 0);
  });

  it("serves repeated calls from the cache", async () => {
    const cache = new MemoryCache<unknown>();
    const seen = stubFetch([json({ n: 1 }), json({ n: 2 })]);
    const http = client({ cache, cacheTtlSeconds: 60 });

    assert.deepEqual(await http.getJson("https://api.osv.dev/v1/vulns/X"), { n: 1 });
    assert.deepEqual(await http.getJson("https://api.osv.dev/v1/vulns/X"), { n: 1 });
    assert.equal(seen.length, 1);
    assert.equal(cache.size, 1);
  });

  it("keys POST cache entries by body", async () => {
    const cache = new MemoryCache<unknown>();
    const seen = stubFetch([json({ n: 1 }), json({ n: 2 })]);
    const http = client({ cache });

    assert.deepEqual(await http.postJson("https://api.osv.dev/v1/query", { a: 1 }), { n: 1 });
    assert.deepEqual(await http.postJson("https://api.osv.dev/v1/query", { a: 2 }), { n: 2 });
    assert.equal(seen.length, 2);
  });

  it("does not cache failures", async () => {
    const cache = new MemoryCache<unknown>();
    stubFetch([() => new Response("", { status: 404 }), json({ n: 1 })]);
    const http = client({ cache });
    await assert.rejects(http.getJson("https://api.osv.dev/v1/vulns/X"), NotFound);
    assert.deepEqual(await http.getJson("https://api.osv.dev/v1/vulns/X"), { n: 1 });
  });
});

describe("parseRetryAfter", () => {
  it("reads delta-seconds", () => {
    assert.equal(parseRetryAfter("120"), 120);
    assert.equal(parseRetryAfter(" "), undefined);
    assert.equal(parseRetryAfter(undefined), undefined);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("2024-03-01T10:00:00Z");
    assert.equal(parseRetryAfter("Fri, 01 Mar 2024 10:00:30 GMT", now), 30);
    assert.equal(parseRetryAfter("Fri, 01 Mar 2024 09:00:00 GMT", now), 0);
  });
});

describe("classifyHttpError", () => {
  const err = (status: number, retryAfter?: string) =>
    new HttpError(`HTTP ${status}`, { url: "https://api.github.com/repos/a/b", status, retryAfter });

  it("treats an exhausted GitHub quota as a rate limit", () => {
    const e = classifyHttpError(err(403, "60"), "github", "0");
    assert.ok(e instanceof RateLimited);
    assert.equal(e.retryAfterSeconds, 60);
  });

  it("treats other 403s as an auth failure", () => {
    const e = classifyHttpError(err(403), "github", "12");
    assert.ok(e instanceof ProviderUnavailable);
    assert.equal(e.retryable, false);
  });

  it("treats 422 as not found", () => {
    assert.ok(classifyHttpError(err(422), "github") instanceof NotFound);
  });
});

describe("HttpClient against a server that stalls mid-body", () => {
  let server: http.Server;
  let url: string;
  const open = new Set<http.ServerResponse>();

  before(async () => {
    server = http.createServer((_req, res) => {
      open.add(res);
      res.writeHead(200, { "content-type": "application/json" });
      res.write('{"a":');
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const addr: AddressInfo | string | null = server.address();
    assert.ok(addr !== null && typeof addr === "object");
    url = `http://127.0.0.1:${addr.port}/stall`;
  });

  after(async () => {
    for (const res of open) res.destroy();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const stalling = (timeoutMs: number) =>
    new HttpClient({
      provider: "github",
      timeoutMs,
      userAgent: "fixtrace-test",
      retry: { retries: 0, minDelayMs: 1, maxDelayMs: 1, factor: 2, jitter: 0 },
    });

  it("applies the per-call timeout to the body read", async () => {
    await assert.rejects(stalling(300).getJson(url), (e: unknown) => {
      assert.ok(e instanceof ProviderUnavailable);
      assert.equal(e.message, "github: response body timed out after 300ms");
      return true;
    });
  });

  it("lets the request deadline cancel a body read in progress", async () => {
    const deadline = createDeadline(80);
    const started = Date.now();
    try {
      await assert.rejects(stalling(10_000).getJson(url, { signal: deadline.signal }), TimeoutError);
    } finally {
      deadline.clear();
    }
    assert.ok(Date.now() - started < 5000);
  });
});
