/**
 * Human-readable renderings of a DecomposedFloat
 */

import { DecomposedFloat } from './Decomposed.js';
import { EXPONENT_MASK, FRACTION_BITS, FRACTION_MASK } from './bits.js';

/**
 * The three IEEE fields in binary: "s eeeeeeeeeee ffff...ffff"
 */
export function formatBits(value: DecomposedFloat): string {
  const bits = value.toBits();
  const sign = (bits >> 63n).toString(2);
  const exponent = ((bits >> FRACTION_BITS) & EXPONENT_MASK).toString(2).padStart(11, '0');
  const fraction = (bits & FRACTION_MASK).toString(2).padStart(52, '0');
  return `${sign} ${exponent} ${fraction}`;
}

export function classify(value: DecomposedFloat): 'zero' | 'subnormal' | 'normal' {
  if (value.isZero()) return 'zero';
  if (value.isSubnormal()) return 'subnormal';
  return 'normal';
}

export function formatDebug(value: DecomposedFloat): string {
  const n = value.toNumber();
  return [
    `Value: ${Object.is(n, -0) ? '-0' : String(n)}`,
    `Bits: 0x${value.toBits().toString(16).padStart(16, '0')}`,
    `Components: sign=${value.sign ? '+' : '-'}, exponent=${value.exponent}, mantissa=${value.mantissa}`,
    `Class: ${classify(value)}`
  ].join('\n');
}
