import type { FeedforwardPolicy } from '../policy';
import { randomRange, type RandomSource } from '../../utils/rng';

/**
 * Parameter perturbation & bounding for {@link FeedforwardPolicy}.
 *
 * @module policy.mutate
 */

/** Default symmetric bound for every parameter after mutation / uniform crossover. */
export const DEFAULT_CLIP_LIMIT = 6;

/**
 * Independently for every scalar parameter, with probability `rate`, add a value
 * drawn from U[-step, step]; afterwards clamp everything into `[-limit, limit]`.
 *
 * One draw decides selection for each parameter in {@link FeedforwardPolicy.toArray}
 * order, followed by a second draw for the perturbation when selected. A pass
 * that selects no parameter (always the case with `rate = 0`) leaves the policy
 * untouched, bounds included.
 */
export function mutate(
  this: FeedforwardPolicy,
  rate: number,
  step: number,
  rng: RandomSource,
  limit: number
): void {
  let changed = false;
  const values = this.toArray().map((value) => {
    if (rng() >= rate) return value;
    changed = true;
    return value + randomRange(rng, -step, step);
  });
  if (!changed) return;
  this.assign(values);
  clipAll.call(this, limit);
}

/**
 * Clamp every parameter into `[-limit, limit]` in place.
 *
 * @throws When `limit` is negative or not finite.
 */
export function clipAll(this: FeedforwardPolicy, limit: number): void {
  if (!(limit >= 0) || !Number.isFinite(limit)) {
    throw new Error(`Clip limit must be a finite non-negative number, got ${limit}.`);
  }
  const clamp = (value: number) => Math.min(limit, Math.max(-limit, value));
  this.inputWeights = this.inputWeights.map((row) => row.map(clamp));
  this.outputWeights = this.outputWeights.map(clamp);
  this.hiddenBias = this.hiddenBias.map(clamp);
  this.outputBias = clamp(this.outputBias);
}
