import type { Clock, RandomSource } from '../types/index.js';

/**
 * Mulberry32 - small deterministic PRNG, returns floats in [0, 1)
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

class UniformRandom implements RandomSource {
  constructor(private readonly next: () => number) {}

  uniform(low: number, high: number): number {
    return low + (high - low) * this.next();
  }
}

export function createSeededRandom(seed: number): RandomSource {
  return new UniformRandom(mulberry32(seed));
}

export const mathRandom: RandomSource = new UniformRandom(Math.random);

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(iso: string): Clock {
  const instant = new Date(iso);
  return { now: () => new Date(instant.getTime()) };
}
