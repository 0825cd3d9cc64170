import { randomInt as cryptoRandomInt } from 'crypto';

export type RNG = (maxExclusive: number) => number;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new Error('maxExclusive must be > 0');
  return cryptoRandomInt(0, maxExclusive);
};

// Deterministic PRNG for seeded bench runs and tests
export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return (maxExclusive: number) => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    r = ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 0..1
    return Math.floor(r * maxExclusive);
  };
}

const UNIT_STEPS = 2 ** 32;

/** Uniform double in [lo, hi) with 2^32 steps of resolution */
export function uniform(rng: RNG, lo: number, hi: number): number {
  return lo + (rng(UNIT_STEPS) / UNIT_STEPS) * (hi - lo);
}
