import { describe, it, expect } from "vitest";
import { bytesToHex } from "@noble/hashes/utils";
import { commit } from "../../src/tree/commit.js";
import { filledHash } from "../helpers/referencetree.js";

describe("commit", () => {
  it("hashes 64 zero bytes to the keccak256 of the concatenation", () => {
    const zero = new Uint8Array(32);
    expect(bytesToHex(commit(zero, zero))).toBe(
      "ad3228b676f7d3cd4284a5443f17f1962b36e491b30a40b2405849e597ba5fb5",
    );
  });

  it("is deterministic", () => {
    const a = filledHash(0x01);
    const b = filledHash(0x02);
    expect(commit(a, b)).toEqual(commit(a, b));
  });

  it("is order sensitive", () => {
    const a = filledHash(0x01);
    const b = filledHash(0x02);
    expect(commit(a, b)).not.toEqual(commit(b, a));
  });

  it("returns 32 bytes without touching its inputs", () => {
    const a = filledHash(0xaa);
    const b = filledHash(0xbb);
    const result = commit(a, b);
    expect(result.length).toBe(32);
    expect(a).toEqual(filledHash(0xaa));
    expect(b).toEqual(filledHash(0xbb));
  });
});
