/**
 * Empty subtree hashes
 *
 * zeroHash(0) is 32 zero bytes and zeroHash(h) = commit(zeroHash(h - 1), zeroHash(h - 1)).
 * The table is generated from commit on first use and extended on demand;
 * it is shared by every tree in the process and never changes once computed.
 */

import { commit } from "./commit.js";
import { DEFAULT_TREE_DEPTH, HASH_SIZE, MAX_TREE_DEPTH, resolveDepth } from "./config.js";
import type { Hash } from "./types.js";

const table: Hash[] = [new Uint8Array(HASH_SIZE)];

function extendTo(height: number): void {
  while (table.length <= height) {
    const below = table[table.length - 1];
    table.push(commit(below, below));
  }
}

/**
 * The memoized table for heights 0..depth-1. Not copied; callers inside the
 * package must not mutate the entries.
 */
export function zeroHashTable(depth: number): readonly Hash[] {
  extendTo(depth - 1);
  return table.slice(0, depth);
}

/**
 * Returns the root of an empty subtree of the given height.
 *
 * Heights run to MAX_TREE_DEPTH inclusive, so zeroHash(depth) is the root of
 * an empty tree of that depth.
 */
export function zeroHash(height: number): Hash {
  if (!Number.isInteger(height) || height < 0 || height > MAX_TREE_DEPTH) {
    throw new Error(
      `height must be an integer between 0 and ${MAX_TREE_DEPTH}, got ${height}`,
    );
  }
  extendTo(height);
  return table[height].slice();
}

/**
 * Returns copies of the empty subtree hashes for heights 0..depth-1
 */
export function zeroHashes(depth: number = DEFAULT_TREE_DEPTH): Hash[] {
  return zeroHashTable(resolveDepth({ depth })).map((hash) => hash.slice());
}
