/**
 * Utility functions for Uint8Array operations
 */

import { HASH_SIZE } from "../tree/config.js";
import type { Hash } from "../tree/types.js";

/**
 * Compares two Uint8Arrays for equality
 *
 * Byte-by-byte comparison, sized for 32 byte hashes.
 */
export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * True if value is a Uint8Array of exactly HASH_SIZE bytes
 */
export function isHash(value: unknown): value is Hash {
  return value instanceof Uint8Array && value.length === HASH_SIZE;
}
