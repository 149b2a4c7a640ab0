import { randomBytes } from 'node:crypto';
import { type RngFn, TrainingError, TrainingErrorCode } from './types.js';

const U32 = 0x1_0000_0000;
const U64_MAX = (1n << 64n) - 1n;

/** Deterministic seeded RNG (mulberry32). */
export function createSeededRng(seed: number | bigint): RngFn {
  let s = foldSeed(seed) | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Non-deterministic RNG seeded from the OS entropy pool. */
export function createEntropyRng(): RngFn {
  return createSeededRng(randomBytes(4).readUInt32LE(0));
}

/**
 * Fold a u64 seed into the 32-bit state mulberry32 runs on (low word XOR high word).
 * Throws INVALID_SEED for negative, fractional or out-of-range values.
 */
export function foldSeed(seed: number | bigint): number {
  let big: bigint;
  if (typeof seed === 'bigint') {
    big = seed;
  } else {
    if (!Number.isSafeInteger(seed)) {
      throw new TrainingError(TrainingErrorCode.INVALID_SEED, `Seed must be a safe integer, got ${seed}`);
    }
    big = BigInt(seed);
  }
  if (big < 0n || big > U64_MAX) {
    throw new TrainingError(TrainingErrorCode.INVALID_SEED, `Seed out of u64 range: ${big}`);
  }
  const low = Number(big & 0xffff_ffffn);
  const high = Number(big >> 32n);
  return (low ^ high) >>> 0;
}

/** Uniform integer in [lo, hi], both inclusive. */
export function randInt(rng: RngFn, lo: number, hi: number): number {
  return lo + Math.floor(rng() * (hi - lo + 1));
}

export function randBool(rng: RngFn, p = 0.5): boolean {
  return rng() < p;
}

export function randU32(rng: RngFn): number {
  return Math.floor(rng() * U32);
}
