import { describe, it, expect } from "vitest";
import { bytesToHex } from "@noble/hashes/utils";
import { commit } from "../../src/tree/commit.js";
import { zeroHash, zeroHashes } from "../../src/tree/zerohashes.js";
import { readFixture, type ZeroHashFixture } from "../helpers/referencetree.js";

describe("zero hashes", () => {
  it("starts from 32 zero bytes", () => {
    expect(zeroHash(0)).toEqual(new Uint8Array(32));
  });

  it("follows the recurrence for every height of a depth 32 tree", () => {
    for (let i = 1; i < 32; i++) {
      expect(zeroHash(i)).toEqual(commit(zeroHash(i - 1), zeroHash(i - 1)));
    }
  });

  it("matches the legacy deployed constants", () => {
    const fixture = readFixture<ZeroHashFixture>("zerohashes.json");
    expect(fixture.zeroHashes.length).toBe(32);
    expect(zeroHashes(32).map((hash) => bytesToHex(hash))).toEqual(
      fixture.zeroHashes,
    );
  });

  it("extends past the table to the empty root of a depth 32 tree", () => {
    const fixture = readFixture<ZeroHashFixture>("zerohashes.json");
    expect(bytesToHex(zeroHash(32))).toBe(fixture.emptyRoot);
  });

  it("returns the table for the requested depth", () => {
    const zeros = zeroHashes(4);
    expect(zeros.length).toBe(4);
    expect(zeros[3]).toEqual(zeroHash(3));
  });

  it("defaults to depth 32", () => {
    expect(zeroHashes().length).toBe(32);
  });

  it("returns copies the caller may mutate", () => {
    const first = zeroHash(1);
    first.fill(0xff);
    expect(zeroHash(1)).toEqual(commit(new Uint8Array(32), new Uint8Array(32)));

    const table = zeroHashes(2);
    table[0].fill(0xff);
    expect(zeroHash(0)).toEqual(new Uint8Array(32));
  });

  it("rejects heights outside 0..53", () => {
    expect(() => zeroHash(-1)).toThrow("height must be an integer");
    expect(() => zeroHash(54)).toThrow("height must be an integer");
    expect(() => zeroHash(1.5)).toThrow("height must be an integer");
  });

  it("rejects invalid depths", () => {
    expect(() => zeroHashes(0)).toThrow("depth must be an integer");
  });
});
