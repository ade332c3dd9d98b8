/**
 * Bit access for leaf counts and indices
 *
 * Counts can exceed 32 bits, so the JavaScript bitwise operators (which
 * truncate to int32) are not used; everything goes through bigint.
 */

/**
 * Returns true if bit `bit` of value is set
 */
export function isBitSet(value: bigint, bit: number): boolean {
  return ((value >> BigInt(bit)) & 1n) === 1n;
}
