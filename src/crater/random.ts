import alea from 'alea';
import type { RandomSource } from '../types';

/**
 * Process-level source, fresh on every call
 */
export const defaultRandom: RandomSource = Math.random;

/**
 * Reproducible source for tests and pinned generations
 */
export function createSeededRandom(seed: number | string): RandomSource {
  const prng = alea(seed);
  return () => prng();
}

/**
 * Uniform angle in [0, 2π)
 */
export function randomAngle(random: RandomSource): number {
  return random() * Math.PI * 2;
}

export function randomInRange(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/**
 * Uniform integer in [min, max], both inclusive
 */
export function randomIntInRange(random: RandomSource, min: number, max: number): number {
  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  return lo + Math.floor(random() * (hi - lo + 1));
}
