/**
 * Error types for accumulator operations.
 *
 * Every declared error is raised before the frontier is touched, so a
 * caller that catches one still holds the state it passed in.
 */

/** Codes of the declared error kinds */
export type MerkleTreeErrorCode = "TreeFull" | "InvalidState" | "InvalidInput";

/**
 * Base class of the declared errors. Switch on `code` to tell them apart.
 */
export class MerkleTreeError extends Error {
  readonly code: MerkleTreeErrorCode;

  constructor(code: MerkleTreeErrorCode, message: string) {
    super(message);
    this.name = "MerkleTreeError";
    this.code = code;
  }
}

/**
 * Thrown by insert when the tree holds its maximum number of leaves.
 *
 * Capacity driven and expected; the tree is left as it was.
 */
export class TreeFullError extends MerkleTreeError {
  /** Leaf count at the time of the failed insert */
  readonly count: number;

  /** Maximum leaf count for the configured depth */
  readonly maxLeaves: number;

  constructor(count: number, maxLeaves: number) {
    super("TreeFull", `Merkle tree full: count ${count} >= ${maxLeaves}`);
    this.name = "TreeFullError";
    this.count = count;
    this.maxLeaves = maxLeaves;
  }
}

/**
 * Thrown when a frontier or zero-hash table breaks its invariants.
 *
 * Signals corrupted persisted state or an upstream construction bug.
 * Not retryable.
 */
export class InvalidStateError extends MerkleTreeError {
  constructor(message: string) {
    super("InvalidState", message);
    this.name = "InvalidStateError";
  }
}

/**
 * Thrown when a caller passes a malformed leaf, proof or index.
 */
export class InvalidInputError extends MerkleTreeError {
  constructor(message: string) {
    super("InvalidInput", message);
    this.name = "InvalidInputError";
  }
}

/**
 * Internal fault: a condition the capacity invariant guarantees did not
 * hold. Not a MerkleTreeError; the result helpers rethrow it.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

/**
 * Type guard for the declared error kinds
 */
export function isMerkleTreeError(value: unknown): value is MerkleTreeError {
  return value instanceof MerkleTreeError;
}
