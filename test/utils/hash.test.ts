import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { sha256Hex } from "../../src/utils/hash";

describe("sha256Hex", () => {
  it("returns the lowercase hex digest", () => {
    assert.equal(sha256Hex("abc"), "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("differs for different input", () => {
    assert.notEqual(sha256Hex("osv GET a"), sha256Hex("osv GET b"));
  });
});
