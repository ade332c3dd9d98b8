/**
 * Frontier construction and incremental insertion
 *
 * The frontier keeps, for each height, the root of the latest complete
 * subtree of that height. Appending a leaf is a ripple-carry over the bits
 * of the new count: every clear bit folds the cached left sibling into the
 * carry, and the first set bit stores the carry and ends the insert.
 */

import { arraysEqual, isHash } from "../utils/arrays.js";
import { isBitSet } from "../utils/bits.js";
import { commit } from "./commit.js";
import { maxLeaves, resolveDepth } from "./config.js";
import {
  InvalidInputError,
  InvalidStateError,
  InvariantViolationError,
  TreeFullError,
} from "./errors.js";
import type { Frontier, Hash, TreeOptions } from "./types.js";

/**
 * Creates an empty frontier
 */
export function createFrontier(): Frontier {
  return { branch: [], count: 0 };
}

/**
 * Deep copy, branch hashes included
 */
export function cloneFrontier(tree: Frontier): Frontier {
  return {
    branch: tree.branch.map((hash) => hash.slice()),
    count: tree.count,
  };
}

/**
 * Value equality of two frontiers
 */
export function frontiersEqual(a: Frontier, b: Frontier): boolean {
  if (a.count !== b.count || a.branch.length !== b.branch.length) {
    return false;
  }
  return a.branch.every((hash, i) => arraysEqual(hash, b.branch[i]));
}

function checkCount(tree: Frontier): void {
  if (!Number.isSafeInteger(tree.count) || tree.count < 0) {
    throw new InvalidStateError(
      `Frontier count must be a non-negative integer, got ${tree.count}`,
    );
  }
}

/**
 * Checks the structural invariants shared by insert and root.
 *
 * @throws InvalidStateError
 */
export function checkFrontier(tree: Frontier, depth: number): void {
  checkCount(tree);
  if (tree.branch.length > depth) {
    throw new InvalidStateError(
      `Frontier branch has ${tree.branch.length} entries, more than depth ${depth}`,
    );
  }
  for (let i = 0; i < tree.branch.length; i++) {
    const entry: unknown = tree.branch[i];
    // Sparse arrays can come back from storage with holes.
    if (entry !== undefined && !isHash(entry)) {
      throw new InvalidStateError(`Frontier branch entry ${i} is not a 32 byte hash`);
    }
  }
}

/**
 * Appends leaf to the tree.
 *
 * The tree is modified in place, and only once the level that completes
 * has been found: a thrown error leaves it exactly as it was passed in.
 * Callers must not run inserts concurrently on the same frontier.
 *
 * @throws InvalidInputError if leaf is not a 32 byte Uint8Array
 * @throws TreeFullError if the tree already holds maxLeaves(depth) leaves
 * @throws InvalidStateError if the frontier breaks its invariants
 * @throws InvariantViolationError if no level completes, which the
 *   capacity check rules out
 */
export function insert(
  tree: Frontier,
  leaf: Hash,
  options: TreeOptions = {},
): void {
  const depth = resolveDepth(options);

  if (!isHash(leaf)) {
    throw new InvalidInputError("Leaf must be a 32 byte Uint8Array");
  }

  // A corrupt count is InvalidState here as it is in root.
  checkCount(tree);
  const limit = maxLeaves(depth);
  if (tree.count >= limit) {
    throw new TreeFullError(tree.count, limit);
  }
  checkFrontier(tree, depth);

  const size = BigInt(tree.count + 1);
  let node: Hash = leaf.slice();

  for (let i = 0; i < depth; i++) {
    if (isBitSet(size, i)) {
      // Every lower level was read on the way up, so i <= branch.length and
      // this either overwrites or appends.
      tree.branch[i] = node;
      tree.count += 1;
      return;
    }

    const left: Hash | undefined = tree.branch[i];
    if (left === undefined) {
      throw new InvalidStateError(
        `Frontier branch entry ${i} is missing for count ${tree.count}`,
      );
    }
    node = commit(left, node);
  }

  throw new InvariantViolationError(
    `Insert of leaf ${tree.count + 1} completed no level of a depth ${depth} tree`,
  );
}
