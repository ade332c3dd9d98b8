/**
 * Root derivation from a frontier
 *
 * Walks the levels from the leaves up, pairing the accumulated right-hand
 * value with the cached left subtree where the count has a bit set and with
 * the empty subtree hash where it does not.
 */

import { isHash } from "../utils/arrays.js";
import { isBitSet } from "../utils/bits.js";
import { commit } from "./commit.js";
import { HASH_SIZE, maxLeaves, resolveDepth } from "./config.js";
import { InvalidStateError } from "./errors.js";
import { checkFrontier } from "./frontier.js";
import { zeroHashTable } from "./zerohashes.js";
import type { Frontier, Hash, TreeOptions } from "./types.js";

/**
 * Calculates the root of tree given the empty subtree hashes for heights
 * 0..depth-1. The frontier is not modified.
 *
 * @throws InvalidStateError if the frontier or the zero table is malformed
 */
export function rootWithZeros(
  tree: Frontier,
  zeros: readonly Hash[],
  options: TreeOptions = {},
): Hash {
  const depth = resolveDepth(options);

  checkFrontier(tree, depth);
  if (zeros.length !== depth || !zeros.every(isHash)) {
    throw new InvalidStateError(
      `Zero hash table must hold ${depth} hashes, got ${zeros.length} entries`,
    );
  }
  if (tree.count > maxLeaves(depth)) {
    throw new InvalidStateError(
      `Frontier count ${tree.count} exceeds capacity of a depth ${depth} tree`,
    );
  }

  const index = BigInt(tree.count);
  let current: Hash = new Uint8Array(HASH_SIZE);

  for (let i = 0; i < depth; i++) {
    if (isBitSet(index, i)) {
      const left: Hash | undefined = tree.branch[i];
      if (left === undefined) {
        throw new InvalidStateError(
          `Frontier branch entry ${i} is missing for count ${tree.count}`,
        );
      }
      current = commit(left, current);
    } else {
      current = commit(current, zeros[i]);
    }
  }

  return current;
}

/**
 * Calculates the current root of tree
 */
export function root(tree: Frontier, options: TreeOptions = {}): Hash {
  const depth = resolveDepth(options);
  return rootWithZeros(tree, zeroHashTable(depth), { depth });
}
