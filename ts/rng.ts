/**
 * Seeded random streams.
 *
 * Every operation that consumes randomness takes a `RandomSource`, so a run
 * is reproducible from its seed and nothing is shared between runs.
 */

import { randomInt } from "node:crypto";

/** Minimal interface the simulation needs from a random stream. */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, bound). */
  nextInt(bound: number): number;
}

/**
 * Mulberry32 generator over a uint32 state.
 *
 * Period 2^32, which is plenty for tables of at most 2^24 entries.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}

/**
 * 32-bit FNV-1a hash over UTF-16 code units.
 */
export function fnv1a32(s: string): number {
  let x = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 0x01000193) >>> 0;
  }
  return x >>> 0;
}

/**
 * Derive the seed of sub-stream `index` from a parent seed.
 *
 * Used to give each estimator trial its own stream, so trial k can be
 * replayed without running trials 0..k-1.
 */
export function deriveSeed(seed: number, index: number): number {
  return fnv1a32(`${seed >>> 0}:${index}`);
}

/** Fresh uint32 seed from the OS entropy pool. */
export function randomSeed(): number {
  return randomInt(0, 0x100000000);
}

/**
 * Fisher-Yates shuffle in place.
 */
export function shuffleInPlace(values: Uint32Array, rng: RandomSource): Uint32Array {
  for (let i = values.length - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1);
    const temp = values[i];
    values[i] = values[j];
    values[j] = temp;
  }
  return values;
}
