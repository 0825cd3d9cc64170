/**
 * Decomposed double-precision floats with an exact total order
 */

export {
  DecomposedFloat,
  compare,
  compareNumbers,
  sortNumbers,
  min,
  max,
  clamp
} from './Decomposed.js';

export type { DecomposedFloatJSON } from './Decomposed.js';

export { DecomposedFloatError } from './errors.js';

export type { DecomposedFloatErrorCode } from './errors.js';

export {
  float64ToBits,
  bitsToFloat64,
  FRACTION_BITS,
  FRACTION_MASK,
  IMPLICIT_BIT,
  EXPONENT_MASK,
  SIGN_BIT,
  MAX_FINITE_EXPONENT
} from './bits.js';

export {
  formatBits,
  formatDebug,
  classify
} from './format.js';
