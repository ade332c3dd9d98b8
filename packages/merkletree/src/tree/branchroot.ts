/**
 * Inclusion proof verification
 *
 * Stateless: works from a leaf, its sibling path and its index alone, so a
 * third party can check a proof without access to the frontier.
 */

import { arraysEqual, isHash } from "../utils/arrays.js";
import { isBitSet } from "../utils/bits.js";
import { commit } from "./commit.js";
import { HASH_SIZE, resolveDepth } from "./config.js";
import { InvalidInputError } from "./errors.js";
import type { BranchRootOptions, Hash } from "./types.js";

function toIndex(index: number | bigint, depth: number): bigint {
  if (typeof index === "number" && !Number.isSafeInteger(index)) {
    throw new InvalidInputError(`Leaf index must be an integer, got ${index}`);
  }
  const value = BigInt(index);
  if (value < 0n || value >= 1n << BigInt(depth)) {
    throw new InvalidInputError(
      `Leaf index ${value} is outside a depth ${depth} tree`,
    );
  }
  return value;
}

/**
 * Calculates the root implied by leaf, its sibling path and its index.
 *
 * proof[i] is the sibling at height i. Bit i of index says which side the
 * running hash is on: set means it is the right child.
 *
 * The result must be compared against a trusted root by the caller;
 * see verifyInclusion.
 *
 * @throws InvalidInputError for a malformed leaf or sibling, an index
 *   outside the tree, a proof longer than depth, or a shorter one unless
 *   padShortProof is set
 */
export function branchRoot(
  leaf: Hash,
  proof: readonly Hash[],
  index: number | bigint,
  options: BranchRootOptions = {},
): Hash {
  const depth = resolveDepth(options);

  if (!isHash(leaf)) {
    throw new InvalidInputError("Leaf must be a 32 byte Uint8Array");
  }
  if (proof.length > depth) {
    throw new InvalidInputError(
      `Proof has ${proof.length} siblings, more than depth ${depth}`,
    );
  }
  if (proof.length < depth && !options.padShortProof) {
    throw new InvalidInputError(
      `Proof has ${proof.length} siblings, expected ${depth}`,
    );
  }
  proof.forEach((sibling, i) => {
    if (!isHash(sibling)) {
      throw new InvalidInputError(`Proof sibling ${i} is not a 32 byte hash`);
    }
  });
  const position = toIndex(index, depth);

  const padding = new Uint8Array(HASH_SIZE);
  let current = leaf;

  for (let i = 0; i < depth; i++) {
    const sibling = i < proof.length ? proof[i] : padding;
    current = isBitSet(position, i)
      ? commit(sibling, current)
      : commit(current, sibling);
  }

  return current;
}

/**
 * Verifies an inclusion proof against a trusted root
 *
 * @returns True if the proof reproduces root
 */
export function verifyInclusion(
  leaf: Hash,
  proof: readonly Hash[],
  index: number | bigint,
  root: Hash,
  options: BranchRootOptions = {},
): boolean {
  return arraysEqual(branchRoot(leaf, proof, index, options), root);
}
