import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TimeoutError } from "../../src/errors";
import { createDeadline } from "../../src/utils/deadline";

describe("createDeadline", () => {
  it("aborts with a TimeoutError once the time is up", async () => {
    const deadline = createDeadline(5);
    await new Promise<void>((resolve) => deadline.signal.addEventListener("abort", () => resolve(), { once: true }));
    assert.ok(deadline.signal.reason instanceof TimeoutError);
    assert.equal(deadline.signal.reason.message, "Request deadline of 5ms exceeded");
    deadline.clear();
  });

  it("does not fire after clear()", async () => {
    const deadline = createDeadline(5);
    deadline.clear();
    await new Promise((resolve) => setTimeout(resolve, 20));
    assert.equal(deadline.signal.aborted, false);
  });

  it("follows an outer signal", () => {
    const outer = new AbortController();
    const deadline = createDeadline(60_000, outer.signal);
    outer.abort(new TimeoutError("caller gave up"));
    assert.equal(deadline.signal.aborted, true);
    assert.equal(deadline.signal.reason.message, "caller gave up");
    deadline.clear();
  });

  it("starts aborted when the outer signal already is", () => {
    const outer = new AbortController();
    outer.abort();
    const deadline = createDeadline(60_000, outer.signal);
    assert.equal(deadline.signal.aborted, true);
    deadline.clear();
  });

  it("aborts the signal on release() so outstanding work stops", async () => {
    const deadline = createDeadline(5);
    deadline.release();
    assert.equal(deadline.signal.aborted, true);
    assert.equal(deadline.signal.reason instanceof TimeoutError, false);
    await new Promise((resolve) => setTimeout(resolve, 20));
    assert.equal(deadline.signal.reason.message, "request finished");
  });

  it("keeps the timeout reason when released after expiry", async () => {
    const deadline = createDeadline(1);
    await new Promise((resolve) => setTimeout(resolve, 10));
    deadline.release();
    assert.ok(deadline.signal.reason instanceof TimeoutError);
  });
});
