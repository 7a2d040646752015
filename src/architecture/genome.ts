import type { FeedforwardPolicy } from './policy';
import type { DisplayColor } from '../utils/color';

/**
 * Weight of one obstacle passed in the fitness sum. Any distance below this
 * value can never outrank an extra point of score.
 */
export const FITNESS_SCORE_WEIGHT = 1000;

/**
 * One individual: an exclusively owned policy plus its per-episode run state.
 *
 * Run state (`alive`, `score`, `distance`) is reset at every episode start;
 * the policy persists until the genome itself is replaced by `evolve()`.
 */
export class Genome {
  /** Engine-unique identifier, increasing in creation order. */
  readonly id: number;
  readonly policy: FeedforwardPolicy;
  readonly color: DisplayColor;
  /** Still flying this episode. Goes false exactly once. */
  alive = true;
  /** Obstacles passed this episode. */
  score = 0;
  /** Best distance reached this episode. */
  distance = 0;

  constructor(id: number, policy: FeedforwardPolicy, color: DisplayColor) {
    this.id = id;
    this.policy = policy;
    this.color = color;
  }

  /**
   * Ranking value: `score * 1000 + distance`.
   */
  get fitness(): number {
    return fitnessOf(this.score, this.distance);
  }

  /** Revive and zero the counters; the policy is untouched. */
  resetRunState(): void {
    this.alive = true;
    this.score = 0;
    this.distance = 0;
  }
}

/**
 * Fitness formula shared by genomes and archived captures.
 */
export function fitnessOf(score: number, distance: number): number {
  return score * FITNESS_SCORE_WEIGHT + distance;
}

export default Genome;
