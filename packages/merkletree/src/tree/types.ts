/**
 * Types shared by the accumulator operations
 */

/**
 * Hash - a 32 byte value. Leaves, branch entries and roots are all hashes.
 */
export type Hash = Uint8Array;

/**
 * Frontier - the O(depth) state needed to recompute the root of an
 * append-only tree without holding its leaves.
 */
export interface Frontier {
  /**
   * branch[i] is the root of the most recently completed subtree of height i.
   * Only the entries selected by the set bits of count take part in the root.
   */
  branch: Hash[];
  /** Number of leaves inserted so far */
  count: number;
}

/**
 * Options accepted by every tree operation
 */
export interface TreeOptions {
  /** Tree depth in levels. Defaults to 32. */
  depth?: number;
}

/**
 * Options for recomputing a root from an inclusion proof
 */
export interface BranchRootOptions extends TreeOptions {
  /**
   * Pad a proof shorter than depth with 32 zero bytes instead of rejecting
   * it. Zero bytes only equal the empty subtree hash at height 0, so this
   * exists for compatibility with verifiers that padded this way.
   */
  padShortProof?: boolean;
}
