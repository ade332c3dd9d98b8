import { keccak_256 } from "@noble/hashes/sha3";
import type { Hash } from "./types.js";

/**
 * Combines two child hashes into their parent: keccak256(left || right).
 *
 * The argument order is part of the wire format shared with external
 * verifiers. Both inputs are expected to be 32 bytes; callers validate.
 */
export function commit(left: Hash, right: Hash): Hash {
  const hasher = keccak_256.create();
  hasher.update(left);
  hasher.update(right);
  return hasher.digest();
}
