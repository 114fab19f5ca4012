/**
 * Random Sources
 *
 * All randomness (asset picks, probability gates) flows through an
 * injected source so that a plan can be reproduced from a seed.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic source (mulberry32). The same seed always yields
 * the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
