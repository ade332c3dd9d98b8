/**
 * Result-returning variants of the throwing operations
 *
 * Declared errors come back as `{ ok: false }`. InvariantViolationError and
 * anything else unexpected still throws.
 */

import { branchRoot } from "./branchroot.js";
import { isMerkleTreeError } from "./errors.js";
import type { MerkleTreeError } from "./errors.js";
import { insert } from "./frontier.js";
import { root } from "./root.js";
import type { BranchRootOptions, Frontier, Hash, TreeOptions } from "./types.js";

export type Result<T, E = MerkleTreeError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Runs fn, capturing a declared error as a failed result
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (isMerkleTreeError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function tryInsert(
  tree: Frontier,
  leaf: Hash,
  options: TreeOptions = {},
): Result<void> {
  return attempt(() => insert(tree, leaf, options));
}

export function tryRoot(tree: Frontier, options: TreeOptions = {}): Result<Hash> {
  return attempt(() => root(tree, options));
}

export function tryBranchRoot(
  leaf: Hash,
  proof: readonly Hash[],
  index: number | bigint,
  options: BranchRootOptions = {},
): Result<Hash> {
  return attempt(() => branchRoot(leaf, proof, index, options));
}
