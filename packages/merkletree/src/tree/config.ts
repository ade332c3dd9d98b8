/**
 * Tree depth and capacity
 */

import type { TreeOptions } from "./types.js";

/** Depth used when none is configured */
export const DEFAULT_TREE_DEPTH = 32;

/** Largest depth whose leaf count still fits a safe integer */
export const MAX_TREE_DEPTH = 53;

/** Size in bytes of every hash the tree handles */
export const HASH_SIZE = 32;

/**
 * Returns the configured depth, validating it.
 *
 * @throws Error if the depth is not an integer in 1..MAX_TREE_DEPTH
 */
export function resolveDepth(options: TreeOptions = {}): number {
  const depth = options.depth ?? DEFAULT_TREE_DEPTH;
  if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TREE_DEPTH) {
    throw new Error(
      `depth must be an integer between 1 and ${MAX_TREE_DEPTH}, got ${depth}`,
    );
  }
  return depth;
}

/**
 * Maximum number of leaves a tree of the given depth accepts.
 *
 * This is one less than the number of leaf positions, the largest count a
 * depth-bit counter can represent.
 */
export function maxLeaves(depth: number): number {
  return 2 ** depth - 1;
}
