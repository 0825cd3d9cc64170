import { describe, test, expect } from '@jest/globals';
import { FRACTION_MASK, IMPLICIT_BIT, SIGN_BIT, bitsToFloat64, float64ToBits } from './bits.js';

describe('float64ToBits', () => {
  test('known patterns', () => {
    expect(float64ToBits(1)).toBe(0x3ff0000000000000n);
    expect(float64ToBits(-2)).toBe(0xc000000000000000n);
    expect(float64ToBits(0)).toBe(0n);
    expect(float64ToBits(-0)).toBe(0x8000000000000000n);
    expect(float64ToBits(Number.MIN_VALUE)).toBe(1n);
    expect(float64ToBits(Number.POSITIVE_INFINITY)).toBe(0x7ff0000000000000n);
  });
});

describe('bitsToFloat64', () => {
  test('known patterns', () => {
    expect(bitsToFloat64(0x4000000000000000n)).toBe(2);
    expect(bitsToFloat64(0x7fefffffffffffffn)).toBe(Number.MAX_VALUE);
    expect(Object.is(bitsToFloat64(SIGN_BIT), -0)).toBe(true);
  });

  test('reduces the input to 64 unsigned bits', () => {
    expect(bitsToFloat64((1n << 64n) | 0x3ff0000000000000n)).toBe(1);
    expect(Number.isNaN(bitsToFloat64(-1n))).toBe(true);
  });
});

describe('constants', () => {
  test('field masks', () => {
    expect(IMPLICIT_BIT).toBe(4503599627370496n);
    expect(FRACTION_MASK).toBe(IMPLICIT_BIT - 1n);
    expect(SIGN_BIT).toBe(9223372036854775808n);
  });
});
