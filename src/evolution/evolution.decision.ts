import {
  DISTANCE_HORIZON,
  EPSILON,
  RAW_DISTANCE_HORIZON,
  VELOCITY_SCALE,
} from './evolution.constants';
import { genomeAt } from './evolution.lifecycle';
import type { EngineLike, InputEncoding, Observation } from './evolution.types';

/**
 * Observation encoding & the flap decision.
 *
 * `relative` encoding (used by the ADVANCED presets):
 * ```
 * gapCenter = (topY + botY) / 2
 * gapHalf   = max(ε, (topY - botY) / 2)
 * yRel  = (birdY - gapCenter) / gapHalf     // ≈ [-1, 1] inside the gap
 * velN  = clamp(velY / 400, -1, 1)
 * distN = clamp(dist, 0, 200) / 200
 * gapN  = gapHalf / max(ε, height)
 * ```
 * `raw` encoding (SIMPLE preset): `[birdY/h, topY/h, botY/h, clamp(dist, 0, 600)/600]`.
 *
 * The ε floors keep every input finite for collapsed gaps or a zero-height world.
 */

const clamp = (value: number, min: number, max: number) =>
  Math.min(max, Math.max(min, value));

/**
 * Map one observation to the four policy inputs.
 */
export function encodeObservation(
  observation: Observation,
  encoding: InputEncoding
): number[] {
  const { birdY, topY, botY, dist, height } = observation;
  if (encoding === 'raw') {
    const h = Math.max(EPSILON, height);
    return [
      birdY / h,
      topY / h,
      botY / h,
      clamp(dist, 0, RAW_DISTANCE_HORIZON) / RAW_DISTANCE_HORIZON,
    ];
  }
  const gapCenter = (topY + botY) * 0.5;
  const gapHalf = Math.max(EPSILON, (topY - botY) * 0.5);
  return [
    (birdY - gapCenter) / gapHalf,
    clamp((observation.velY ?? 0) / VELOCITY_SCALE, -1, 1),
    clamp(dist, 0, DISTANCE_HORIZON) / DISTANCE_HORIZON,
    gapHalf / Math.max(EPSILON, height),
  ];
}

/**
 * Ask individual `index` whether to flap this tick.
 *
 * Dead or unknown individuals never flap and consume no random draw.
 * Deterministic mode flaps when the output exceeds the threshold; stochastic
 * mode flaps when it exceeds a fresh uniform draw.
 */
export function decide(
  this: EngineLike,
  index: number,
  observation: Observation
): boolean {
  const genome = genomeAt(this, index);
  if (!genome?.alive) return false;
  const output = genome.policy.predict(
    encodeObservation(observation, this.options.inputEncoding)
  );
  const { stochastic, threshold } = this.options.decision;
  return stochastic ? output > this._getRNG()() : output > threshold;
}
