/**
 * CBOR encoding of the persisted frontier record.
 *
 * Uses positional array format for a compact record:
 * [version, count, [branch0, branch1, ...]]
 * with every branch entry a 32 byte string, index = tree level.
 */

import { Encoder } from "cbor-x";
import { InvalidStateError, isHash } from "@frontier/merkletree";
import type { Frontier, Hash } from "@frontier/merkletree";

export const FRONTIER_RECORD_VERSION = 1;

// Hashes go out as bare byte strings (major type 2), never tag 64.
const encoder = new Encoder({ tagUint8Array: false, useRecords: false });

/**
 * Encode a frontier to its CBOR record.
 */
export function encodeFrontier(tree: Frontier): Uint8Array {
  const encoded = encoder.encode([
    FRONTIER_RECORD_VERSION,
    tree.count,
    tree.branch,
  ]);
  // cbor-x returns a Buffer under Node
  return new Uint8Array(encoded);
}

/**
 * Decode a CBOR record back to a frontier.
 *
 * Only the record shape is checked here; depth dependent invariants are
 * enforced by the tree operations.
 *
 * @throws InvalidStateError if the record is corrupt
 */
export function decodeFrontier(data: Uint8Array): Frontier {
  let decoded: unknown;
  try {
    decoded = encoder.decode(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidStateError(`Frontier record is not valid CBOR: ${reason}`);
  }

  if (!Array.isArray(decoded) || decoded.length !== 3) {
    throw new InvalidStateError("Frontier record must be a 3 element array");
  }
  const [version, rawCount, rawBranch]: unknown[] = decoded;

  if (version !== FRONTIER_RECORD_VERSION) {
    throw new InvalidStateError(
      `Unsupported frontier record version ${String(version)}`,
    );
  }

  // Counts above 2^32 may come back as bigint
  const count = typeof rawCount === "bigint" ? Number(rawCount) : rawCount;
  if (typeof count !== "number" || !Number.isSafeInteger(count) || count < 0) {
    throw new InvalidStateError(
      "Frontier record count must be a non-negative integer",
    );
  }

  if (!Array.isArray(rawBranch)) {
    throw new InvalidStateError("Frontier record branch must be an array");
  }
  const branch: Hash[] = rawBranch.map((entry: unknown, i: number) => {
    if (!isHash(entry)) {
      throw new InvalidStateError(
        `Frontier record branch entry ${i} is not a 32 byte hash`,
      );
    }
    return new Uint8Array(entry);
  });

  return { branch, count };
}
