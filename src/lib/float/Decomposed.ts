/**
 * Exact sign/exponent/mantissa view of a finite double
 *
 * Decomposes an IEEE-754 binary64 value into its raw fields so that values can
 * be ordered without going through floating-point comparison, and rebuilds the
 * original bit pattern exactly.
 *
 * Ordering notes:
 * - The order is total: every pair of values compares as exactly one of <, =, >
 * - -0 decomposes with sign = false and +0 with sign = true, so -0 < +0 and the
 *   two are not equal. Native `===` treats them as equal; this type does not.
 */

import { z } from 'zod';
import {
  EXPONENT_MASK,
  FRACTION_BITS,
  FRACTION_MASK,
  IMPLICIT_BIT,
  MAX_FINITE_EXPONENT,
  SIGN_BIT,
  bitsToFloat64,
  float64ToBits
} from './bits.js';
import { DecomposedFloatError } from './errors.js';

export interface DecomposedFloatJSON {
  mantissa: string;
  exponent: number;
  sign: boolean;
}

const jsonSchema = z.object({
  mantissa: z.string().regex(/^\d+$/, 'mantissa must be a non-negative decimal integer'),
  exponent: z.number().int(),
  sign: z.boolean()
}).strict();

export class DecomposedFloat {
  /** Stored fraction with the implicit bit set (normal) or shifted left by one (subnormal) */
  readonly mantissa: bigint;
  /** Raw biased exponent field, 0 for subnormals and zero */
  readonly exponent: number;
  /** true when the sign bit is clear */
  readonly sign: boolean;

  private constructor(mantissa: bigint, exponent: number, sign: boolean) {
    this.mantissa = mantissa;
    this.exponent = exponent;
    this.sign = sign;
  }

  /**
   * Decompose a double. Returns null for NaN and ±Infinity, which have no
   * place in the order.
   */
  static fromNumber(value: number): DecomposedFloat | null {
    if (!Number.isFinite(value)) return null;

    const bits = float64ToBits(value);
    const sign = bits >> 63n === 0n;
    const exponent = Number((bits >> FRACTION_BITS) & EXPONENT_MASK);
    const fraction = bits & FRACTION_MASK;
    const mantissa = exponent === 0 ? fraction << 1n : fraction | IMPLICIT_BIT;

    return new DecomposedFloat(mantissa, exponent, sign);
  }

  /**
   * Build from raw components. Throws unless the triple is one that
   * fromNumber could have produced.
   */
  static fromComponents(mantissa: bigint, exponent: number, sign: boolean): DecomposedFloat {
    if (!Number.isInteger(exponent) || exponent < 0 || exponent > MAX_FINITE_EXPONENT) {
      throw new DecomposedFloatError(
        `exponent must be an integer in [0, ${MAX_FINITE_EXPONENT}], got ${exponent}`,
        'INVALID_COMPONENTS',
        { mantissa, exponent, sign }
      );
    }
    if (exponent === 0) {
      if (mantissa < 0n || mantissa >= IMPLICIT_BIT << 1n || (mantissa & 1n) !== 0n) {
        throw new DecomposedFloatError(
          `subnormal mantissa must be even and below 2^53, got ${mantissa}`,
          'INVALID_COMPONENTS',
          { mantissa, exponent, sign }
        );
      }
    } else if (mantissa < IMPLICIT_BIT || mantissa >= IMPLICIT_BIT << 1n) {
      throw new DecomposedFloatError(
        `normal mantissa must be in [2^52, 2^53), got ${mantissa}`,
        'INVALID_COMPONENTS',
        { mantissa, exponent, sign }
      );
    }
    return new DecomposedFloat(mantissa, exponent, sign);
  }

  static fromJSON(input: unknown): DecomposedFloat {
    const parsed = jsonSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new DecomposedFloatError(`Invalid DecomposedFloat JSON: ${detail}`, 'INVALID_JSON', input);
    }
    const { mantissa, exponent, sign } = parsed.data;
    return DecomposedFloat.fromComponents(BigInt(mantissa), exponent, sign);
  }

  static readonly ZERO = new DecomposedFloat(0n, 0, true);
  static readonly NEG_ZERO = new DecomposedFloat(0n, 0, false);

  // ============================================================================
  // Properties
  // ============================================================================

  isZero(): boolean {
    return this.exponent === 0 && this.mantissa === 0n;
  }

  isSubnormal(): boolean {
    return this.exponent === 0 && this.mantissa !== 0n;
  }

  isNegative(): boolean {
    return !this.sign;
  }

  // ============================================================================
  // Reconstruction
  // ============================================================================

  /**
   * Raw 64-bit pattern of the represented double.
   * Exponent 0 is treated as subnormal here exactly as in fromNumber, otherwise
   * the smallest normal would not survive the round trip.
   */
  toBits(): bigint {
    const signBit = this.sign ? 0n : SIGN_BIT;
    if (this.exponent <= 0) {
      return signBit | ((this.mantissa >> 1n) & FRACTION_MASK);
    }
    return signBit | (BigInt(this.exponent) << FRACTION_BITS) | (this.mantissa & FRACTION_MASK);
  }

  toNumber(): number {
    return bitsToFloat64(this.toBits());
  }

  toJSON(): DecomposedFloatJSON {
    return {
      mantissa: this.mantissa.toString(),
      exponent: this.exponent,
      sign: this.sign
    };
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  /**
   * Compare this with other
   * Returns: -1 if this < other, 0 if equal, 1 if this > other
   */
  cmp(other: DecomposedFloat): -1 | 0 | 1 {
    if (this.sign !== other.sign) {
      return this.sign ? 1 : -1;
    }

    const magCmp = this._cmpMagnitude(other);
    // Both negative: the larger magnitude is the smaller value
    if (!this.sign) {
      if (magCmp === -1) return 1;
      if (magCmp === 1) return -1;
    }
    return magCmp;
  }

  private _cmpMagnitude(other: DecomposedFloat): -1 | 0 | 1 {
    if (this.exponent < other.exponent) return -1;
    if (this.exponent > other.exponent) return 1;
    if (this.mantissa < other.mantissa) return -1;
    if (this.mantissa > other.mantissa) return 1;
    return 0;
  }

  eq(other: DecomposedFloat): boolean { return this.cmp(other) === 0; }
  lt(other: DecomposedFloat): boolean { return this.cmp(other) === -1; }
  lte(other: DecomposedFloat): boolean { return this.cmp(other) <= 0; }
  gt(other: DecomposedFloat): boolean { return this.cmp(other) === 1; }
  gte(other: DecomposedFloat): boolean { return this.cmp(other) >= 0; }
}

// ============================================================================
// Utility functions
// ============================================================================

/**
 * Comparator for Array.prototype.sort
 */
export function compare(a: DecomposedFloat, b: DecomposedFloat): -1 | 0 | 1 {
  return a.cmp(b);
}

/**
 * Compare two doubles through their decompositions.
 * Returns null when either side is NaN or infinite.
 */
export function compareNumbers(a: number, b: number): -1 | 0 | 1 | null {
  const da = DecomposedFloat.fromNumber(a);
  const db = DecomposedFloat.fromNumber(b);
  if (da === null || db === null) return null;
  return da.cmp(db);
}

/**
 * Sort finite doubles by the decomposed order; non-finite values are dropped.
 */
export function sortNumbers(values: readonly number[]): number[] {
  const decomposed: DecomposedFloat[] = [];
  for (const v of values) {
    const d = DecomposedFloat.fromNumber(v);
    if (d !== null) decomposed.push(d);
  }
  return decomposed.sort(compare).map(d => d.toNumber());
}

export function min(a: DecomposedFloat, b: DecomposedFloat): DecomposedFloat {
  return a.lt(b) ? a : b;
}

export function max(a: DecomposedFloat, b: DecomposedFloat): DecomposedFloat {
  return a.gt(b) ? a : b;
}

export function clamp(value: DecomposedFloat, lo: DecomposedFloat, hi: DecomposedFloat): DecomposedFloat {
  if (value.lt(lo)) return lo;
  if (value.gt(hi)) return hi;
  return value;
}
