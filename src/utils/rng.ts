/**
 * Random number helpers shared by the policy operators and the evolution engine.
 *
 * Every stochastic step in the library draws from a {@link RandomSource} passed
 * in by the caller, so a seeded engine replays the same run draw for draw.
 */

/** Uniform generator returning values in [0, 1). */
export type RandomSource = () => number;

/** Seed used when a zero seed would lock xorshift in its fixed point. */
const ZERO_SEED_REPLACEMENT = 0x1a2b3c4d;

/** 2^32, used to map a 32-bit state into [0, 1). */
const UINT32_RANGE = 0x100000000;

/**
 * Normalize an arbitrary numeric seed into a non-zero unsigned 32-bit state.
 *
 * @param seed Any finite number; fractional parts are discarded.
 */
export function normalizeSeed(seed: number): number {
  const state = Math.trunc(seed) >>> 0;
  return state === 0 ? ZERO_SEED_REPLACEMENT : state;
}

/**
 * Derive a seed from the clock for unseeded engines.
 */
export function timeSeed(): number {
  return normalizeSeed(Date.now() ^ 0x9e3779b1);
}

/**
 * One xorshift32 step.
 *
 * @param state Current unsigned 32-bit state (must be non-zero).
 * @returns Next state.
 */
export function xorshift32(state: number): number {
  let x = state >>> 0;
  x ^= x << 13;
  x >>>= 0;
  x ^= x >> 17;
  x >>>= 0;
  x ^= x << 5;
  return x >>> 0;
}

/**
 * Map a 32-bit state to a float in [0, 1).
 */
export function stateToUnit(state: number): number {
  return (state >>> 0) / UINT32_RANGE;
}

/**
 * Uniform draw in [min, max).
 *
 * @example
 * randomRange(rng, -1, 1); // initial weight
 */
export function randomRange(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Uniform integer index in [0, maxExclusive).
 */
export function randomIndex(rng: RandomSource, maxExclusive: number): number {
  // Guard against a custom source that returns exactly 1.
  return Math.min(maxExclusive - 1, Math.floor(rng() * maxExclusive));
}

/** Fair coin flip. */
export function randomBool(rng: RandomSource): boolean {
  return rng() < 0.5;
}
