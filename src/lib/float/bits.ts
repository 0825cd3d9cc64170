/**
 * Bit-level view of IEEE-754 doubles.
 *
 * A single 8-byte scratch buffer is shared by both directions; reads and
 * writes are big-endian so the bigint matches the textbook bit layout.
 */

const buffer = new ArrayBuffer(8);
const view = new DataView(buffer);

export const FRACTION_BITS = 52n;
export const FRACTION_MASK = 0xfffffffffffffn;
export const IMPLICIT_BIT = 1n << FRACTION_BITS;
export const EXPONENT_MASK = 0x7ffn;
export const SIGN_BIT = 1n << 63n;

/** Largest raw exponent field of a finite double (2047 encodes Inf/NaN) */
export const MAX_FINITE_EXPONENT = 2046;

export function float64ToBits(value: number): bigint {
  view.setFloat64(0, value);
  return view.getBigUint64(0);
}

export function bitsToFloat64(bits: bigint): number {
  view.setBigUint64(0, BigInt.asUintN(64, bits));
  return view.getFloat64(0);
}
