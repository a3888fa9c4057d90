/**
 * Seeded pseudo-random generator for reproducible deals.
 *
 * A linear congruential generator (Numerical Recipes constants) over
 * 2^32. With the state below 2^32 every intermediate product stays
 * below 2^53, so the arithmetic is exact in IEEE doubles and the
 * sequence is identical on every JavaScript engine.
 */

/** Largest accepted seed (seeds are unsigned 32-bit integers). */
export const MAX_SEED = 0xffffffff;

const MODULUS = 4294967296;

/**
 * Create a deterministic RNG from a numeric seed, compatible with the
 * `() => number` contract of Math.random (values in [0, 1)).
 */
export function createSeededRng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % MODULUS;
    return s / MODULUS;
  };
}

/**
 * Pick a fresh seed for a new deal.
 *
 * This is the one non-deterministic entry point; everything downstream
 * of the returned seed is reproducible.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * (MAX_SEED + 1));
}
