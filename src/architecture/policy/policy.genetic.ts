import type { FeedforwardPolicy } from '../policy';
import type { CrossoverMethod } from '../../methods/crossover';
import { randomBool, type RandomSource } from '../../utils/rng';

/**
 * Genetic operator: parameter-wise recombination of two same-shape policies.
 *
 * Both parents have the fixed 4→8→1 layout, so parameters line up one to one
 * through {@link FeedforwardPolicy.toArray}.
 *
 * @module policy.genetic
 */

/**
 * Write the recombination of `a` and `b` into `child`.
 *
 * - `UNIFORM`: each parameter copied from `a` or `b` on a fair coin flip
 *   (one draw per parameter).
 * - `AVERAGE`: each parameter is `(a + b) / 2`; no random draws.
 *
 * Bounding is left to the caller.
 */
export function recombine(
  child: FeedforwardPolicy,
  a: FeedforwardPolicy,
  b: FeedforwardPolicy,
  method: CrossoverMethod,
  rng: RandomSource
): void {
  const left = a.toArray();
  const right = b.toArray();
  switch (method.name) {
    case 'UNIFORM':
      child.assign(left.map((value, i) => (randomBool(rng) ? value : right[i])));
      return;
    case 'AVERAGE':
      child.assign(left.map((value, i) => (value + right[i]) * 0.5));
      return;
  }
}
