import { describe, it, expect } from '@jest/globals';
import {
  comparisonCases,
  conversionCases,
  formatResult,
  generateTestNumbers,
  orderingCases,
  runCase,
  runSuite,
  totalOrderKey,
  type BenchCase,
} from '../src/bench/harness.js';
import { mulberry32, uniform } from '../src/util/rng.js';

describe('generateTestNumbers', () => {
  it('produces the requested count within range', () => {
    const numbers = generateTestNumbers(200, 10, mulberry32(7));
    expect(numbers).toHaveLength(200);
    for (const n of numbers) {
      expect(n).toBeGreaterThanOrEqual(-10);
      expect(n).toBeLessThan(10);
    }
  });

  it('is deterministic for a seed', () => {
    expect(generateTestNumbers(20, 1000, mulberry32(99))).toEqual(generateTestNumbers(20, 1000, mulberry32(99)));
  });
});

describe('uniform', () => {
  it('maps the RNG range onto [lo, hi)', () => {
    expect(uniform(() => 0, -10, 10)).toBe(-10);
    expect(uniform(max => max / 2, -10, 10)).toBe(0);
    expect(uniform(max => max / 4, 0, 8)).toBe(2);
  });
});

describe('totalOrderKey', () => {
  it('orders keys like the numbers they encode', () => {
    const values = [-Number.MAX_VALUE, -3, -Number.MIN_VALUE, -0, 0, Number.MIN_VALUE, 1, 1e300];
    const keys = values.map(totalOrderKey);
    for (let i = 0; i < keys.length - 1; i++) expect(keys[i] < keys[i + 1]).toBe(true);
  });

  it('folds the sign bit', () => {
    expect(totalOrderKey(0)).toBe(0x8000000000000000n);
    expect(totalOrderKey(-0)).toBe(0x7fffffffffffffffn);
  });
});

describe('runCase', () => {
  it('times the case against the supplied clock', () => {
    let calls = 0;
    const c: BenchCase = { name: 'counter', group: 'comparison', run: () => { calls++; } };
    const ticks = [0, 5];
    const result = runCase(c, 10, 100, () => ticks.shift() ?? 5);

    expect(calls).toBe(11);
    expect(result).toEqual({
      name: 'counter',
      group: 'comparison',
      iterations: 10,
      totalMs: 5,
      meanNs: 5000,
      opsPerSec: 200000,
    });
  });
});

describe('runSuite', () => {
  it('runs every comparison, conversion and ordering case', () => {
    const results = runSuite({ samples: 20, range: 5, iterations: 2, seed: 1, logLevel: 'silent' });
    expect(results.map(r => r.name)).toEqual([
      'native_comparison',
      'decomposed_comparison',
      'bitkey_comparison',
      'float_to_decomposed',
      'decomposed_to_float',
      'float_to_bitkey',
      'native_ordering',
      'decomposed_ordering',
      'bitkey_ordering',
    ]);
    expect(results.every(r => r.iterations === 2)).toBe(true);
  });

  it('builds three cases per group', () => {
    const numbers = [1, -2, 3];
    expect(comparisonCases(numbers).map(c => c.group)).toEqual(['comparison', 'comparison', 'comparison']);
    expect(conversionCases(numbers).map(c => c.group)).toEqual(['conversion', 'conversion', 'conversion']);
    expect(orderingCases(numbers).map(c => c.group)).toEqual(['ordering', 'ordering', 'ordering']);
  });

  it('ordering cases sort copies and leave the input untouched', () => {
    const numbers = [3, -1.5, 0, 2e-310, -7];
    for (const c of orderingCases(numbers)) c.run();
    expect(numbers).toEqual([3, -1.5, 0, 2e-310, -7]);
  });
});

describe('formatResult', () => {
  it('renders one line per case', () => {
    const line = formatResult({
      name: 'decomposed_comparison',
      group: 'comparison',
      iterations: 1,
      totalMs: 1,
      meanNs: 12.5,
      opsPerSec: 1234567.4,
    });
    expect(line).toBe('decomposed_comparison: 12.50 ns/op (1,234,567 ops/s)');
  });
});
