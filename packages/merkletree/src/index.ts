/**
 * @frontier/merkletree - append-only Keccak-256 incremental Merkle accumulator
 *
 * Inserts 32 byte leaves into a fixed depth binary tree while keeping only
 * O(depth) state, derives the root from that state, and verifies
 * single-leaf inclusion proofs.
 *
 * @packageDocumentation
 */

export type {
  Hash,
  Frontier,
  TreeOptions,
  BranchRootOptions,
} from "./tree/types.js";

export {
  DEFAULT_TREE_DEPTH,
  MAX_TREE_DEPTH,
  HASH_SIZE,
  resolveDepth,
  maxLeaves,
} from "./tree/config.js";

export { commit } from "./tree/commit.js";
export { zeroHash, zeroHashes } from "./tree/zerohashes.js";
export {
  createFrontier,
  cloneFrontier,
  frontiersEqual,
  checkFrontier,
  insert,
} from "./tree/frontier.js";
export { root, rootWithZeros } from "./tree/root.js";
export { branchRoot, verifyInclusion } from "./tree/branchroot.js";

export type { MerkleTreeErrorCode } from "./tree/errors.js";
export {
  MerkleTreeError,
  TreeFullError,
  InvalidStateError,
  InvalidInputError,
  InvariantViolationError,
  isMerkleTreeError,
} from "./tree/errors.js";

export type { Result } from "./tree/result.js";
export { attempt, tryInsert, tryRoot, tryBranchRoot } from "./tree/result.js";

export { arraysEqual, isHash } from "./utils/arrays.js";
