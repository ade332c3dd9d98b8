/**
 * Explicit full tree used to check the frontier against.
 *
 * Materializes every populated node level by level, padding odd levels with
 * the empty subtree hash, so roots and sibling paths can be read off
 * directly.
 */
import { readFileSync } from "node:fs";
import { keccak_256 } from "@noble/hashes/sha3";
import { commit } from "../../src/tree/commit.js";
import type { Hash } from "../../src/tree/types.js";

/** zeros[h] is the empty subtree hash of height h, computed here independently */
function zeroLadder(height: number): Hash[] {
  const zeros: Hash[] = [new Uint8Array(32)];
  while (zeros.length <= height) {
    const below = zeros[zeros.length - 1];
    zeros.push(commit(below, below));
  }
  return zeros;
}

export class ReferenceTree {
  readonly depth: number;
  private readonly zeros: Hash[];
  /** levels[h] holds the populated nodes at height h, left to right */
  private readonly levels: Hash[][];

  constructor(leaves: Hash[], depth: number = 32) {
    this.depth = depth;
    this.zeros = zeroLadder(depth);
    this.levels = [leaves.slice()];
    for (let h = 0; h < depth; h++) {
      const nodes = this.levels[h];
      const parents: Hash[] = [];
      for (let i = 0; i < nodes.length; i += 2) {
        const right = i + 1 < nodes.length ? nodes[i + 1] : this.zeros[h];
        parents.push(commit(nodes[i], right));
      }
      this.levels.push(parents);
    }
  }

  root(): Hash {
    const top = this.levels[this.depth];
    return top.length > 0 ? top[0] : this.zeros[this.depth];
  }

  /** Sibling path of the leaf at index, heights 0..depth-1 */
  proof(index: number): Hash[] {
    const path: Hash[] = [];
    let position = index;
    for (let h = 0; h < this.depth; h++) {
      const siblingPosition = position % 2 === 0 ? position + 1 : position - 1;
      const sibling: Hash | undefined = this.levels[h][siblingPosition];
      path.push(sibling ?? this.zeros[h]);
      position = Math.floor(position / 2);
    }
    return path;
  }
}

/** Distinct, deterministic leaf for position k */
export function testLeaf(k: number): Hash {
  const seed = new Uint8Array(4);
  new DataView(seed.buffer).setUint32(0, k);
  return keccak_256(seed);
}

/** A 32 byte value with every byte set to fill */
export function filledHash(fill: number): Hash {
  return new Uint8Array(32).fill(fill);
}

export function readFixture<T>(name: string): T {
  const url = new URL(`../fixtures/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf8")) as T;
}

export interface ZeroHashFixture {
  zeroHashes: string[];
  emptyRoot: string;
}

export interface RootVectorFixture {
  description: string;
  roots: { count: number; root: string }[];
}
