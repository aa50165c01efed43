import type { RandomSource } from "./types.js";

/**
 * Seeded random number generator using a Linear Congruential Generator (LCG).
 *
 * - Multiplier: 1664525 (from Numerical Recipes)
 * - Increment: 1013904223
 * - Modulus: 2^32 (implicit via unsigned 32-bit overflow)
 *
 * Values are divided by 2^32 so the result stays in [0, 1); the walk compares
 * draws against the branch probability and scales them into list positions,
 * both of which need the upper bound to be exclusive.
 *
 * @param seed - Initial seed value (0 is replaced with 1 to avoid degenerate case)
 * @returns Function that returns next random value in [0, 1)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  if (state === 0) {
    state = 1;
  }
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/**
 * Draws a fresh seed for runs that did not ask for one.
 * The seed is reported back so the run can be replayed.
 */
export function drawSeed(): number {
  return Math.floor(Math.random() * 1e9);
}

/**
 * Picks a list position uniformly.
 */
export function pickIndex(random: RandomSource, length: number): number {
  const index = Math.floor(random() * length);
  return Math.min(index, length - 1);
}
