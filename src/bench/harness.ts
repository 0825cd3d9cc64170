/**
 * Comparison, conversion and ordering micro-benchmarks.
 *
 * Three contenders are timed over the same inputs:
 * - native: plain `<` / `>` on numbers
 * - decomposed: DecomposedFloat.cmp
 * - bitkey: a sign-folded 64-bit key compared as bigint (the usual total-order trick)
 */

import { performance } from 'node:perf_hooks';
import { DecomposedFloat, compare } from '../lib/float/Decomposed.js';
import { SIGN_BIT, float64ToBits } from '../lib/float/bits.js';
import { type RNG, cryptoRNG, mulberry32, uniform } from '../util/rng.js';
import type { BenchConfig } from '../config/index.js';

export interface BenchCase {
  name: string;
  group: 'comparison' | 'conversion' | 'ordering';
  run: () => void;
}

export interface BenchResult {
  name: string;
  group: BenchCase['group'];
  iterations: number;
  totalMs: number;
  meanNs: number;
  opsPerSec: number;
}

// Results land here so the timed loops cannot be optimized away
let sink = 0;

export function getSink(): number {
  return sink;
}

export function generateTestNumbers(count: number, range: number, rng: RNG = cryptoRNG): number[] {
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(uniform(rng, -range, range));
  return out;
}

/**
 * Key whose unsigned order matches the numeric order of finite doubles
 * (negatives have every bit flipped, non-negatives only the sign bit).
 */
export function totalOrderKey(value: number): bigint {
  const bits = float64ToBits(value);
  return (bits & SIGN_BIT) !== 0n ? BigInt.asUintN(64, ~bits) : bits | SIGN_BIT;
}

function decomposeAll(numbers: readonly number[]): DecomposedFloat[] {
  const out: DecomposedFloat[] = [];
  for (const n of numbers) {
    const d = DecomposedFloat.fromNumber(n);
    if (d !== null) out.push(d);
  }
  return out;
}

export function comparisonCases(numbers: readonly number[]): BenchCase[] {
  const decomposed = decomposeAll(numbers);
  const keys = numbers.map(totalOrderKey);

  return [
    {
      name: 'native_comparison',
      group: 'comparison',
      run: () => {
        for (let i = 0; i < numbers.length - 1; i++) {
          const a = numbers[i];
          const b = numbers[i + 1];
          sink += a < b ? -1 : a > b ? 1 : 0;
        }
      },
    },
    {
      name: 'decomposed_comparison',
      group: 'comparison',
      run: () => {
        for (let i = 0; i < decomposed.length - 1; i++) sink += decomposed[i].cmp(decomposed[i + 1]);
      },
    },
    {
      name: 'bitkey_comparison',
      group: 'comparison',
      run: () => {
        for (let i = 0; i < keys.length - 1; i++) {
          const a = keys[i];
          const b = keys[i + 1];
          sink += a < b ? -1 : a > b ? 1 : 0;
        }
      },
    },
  ];
}

export function conversionCases(numbers: readonly number[]): BenchCase[] {
  const decomposed = decomposeAll(numbers);

  return [
    {
      name: 'float_to_decomposed',
      group: 'conversion',
      run: () => {
        for (const n of numbers) sink += DecomposedFloat.fromNumber(n)?.exponent ?? 0;
      },
    },
    {
      name: 'decomposed_to_float',
      group: 'conversion',
      run: () => {
        for (const d of decomposed) sink += d.toNumber();
      },
    },
    {
      name: 'float_to_bitkey',
      group: 'conversion',
      run: () => {
        for (const n of numbers) sink += Number(totalOrderKey(n) & 1n);
      },
    },
  ];
}

function compareKeys(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Each run sorts a fresh copy, so every iteration starts from the same unsorted input.
 */
export function orderingCases(numbers: readonly number[]): BenchCase[] {
  const decomposed = decomposeAll(numbers);
  const keys = numbers.map(totalOrderKey);

  return [
    {
      name: 'native_ordering',
      group: 'ordering',
      run: () => {
        const sorted = [...numbers].sort((a, b) => a - b);
        sink += sorted.length > 0 ? sorted[0] : 0;
      },
    },
    {
      name: 'decomposed_ordering',
      group: 'ordering',
      run: () => {
        const sorted = [...decomposed].sort(compare);
        sink += sorted.length > 0 ? sorted[0].exponent : 0;
      },
    },
    {
      name: 'bitkey_ordering',
      group: 'ordering',
      run: () => {
        const sorted = [...keys].sort(compareKeys);
        sink += sorted.length > 0 ? Number(sorted[0] & 1n) : 0;
      },
    },
  ];
}

export function runCase(c: BenchCase, iterations: number, opsPerIteration: number, now: () => number = () => performance.now()): BenchResult {
  // one untimed pass to warm up the JIT
  c.run();
  const start = now();
  for (let i = 0; i < iterations; i++) c.run();
  const totalMs = now() - start;
  const ops = iterations * Math.max(1, opsPerIteration);
  const meanNs = (totalMs * 1e6) / ops;
  return {
    name: c.name,
    group: c.group,
    iterations,
    totalMs,
    meanNs,
    opsPerSec: totalMs > 0 ? (ops / totalMs) * 1000 : Number.POSITIVE_INFINITY,
  };
}

export function runSuite(config: BenchConfig, now?: () => number): BenchResult[] {
  const rng = config.seed !== undefined ? mulberry32(config.seed) : cryptoRNG;
  const numbers = generateTestNumbers(config.samples, config.range, rng);

  const results: BenchResult[] = [];
  for (const c of comparisonCases(numbers)) {
    results.push(runCase(c, config.iterations, numbers.length - 1, now));
  }
  for (const c of conversionCases(numbers)) {
    results.push(runCase(c, config.iterations, numbers.length, now));
  }
  for (const c of orderingCases(numbers)) {
    results.push(runCase(c, config.iterations, numbers.length, now));
  }
  return results;
}

export function formatResult(r: BenchResult): string {
  return `${r.name}: ${r.meanNs.toFixed(2)} ns/op (${Math.round(r.opsPerSec).toLocaleString('en-US')} ops/s)`;
}
