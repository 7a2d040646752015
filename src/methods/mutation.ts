/**
 * Mutation schedules deciding the `rate` (per-parameter probability) and
 * `step` (half-width of the uniform perturbation) applied to every child of a
 * generation.
 *
 * ## Supported schedules
 *
 * - `FIXED`: the same rate/step every generation.
 * - `ANNEALED`: staged on the best score of the generation being replaced.
 *   Exploration is high while the population cannot pass a handful of
 *   obstacles and shrinks as it improves, never below `minRate` / `minStep`.
 *
 * @see {@link https://en.wikipedia.org/wiki/Mutation_(genetic_algorithm) Mutation (Genetic Algorithm) - Wikipedia}
 */

/**
 * One stage of an annealed schedule. A stage applies while the best score is
 * below `belowScore`; the last stage omits it and catches everything else.
 */
export interface MutationStage {
  belowScore?: number;
  rate: number;
  step: number;
}

/** Constant rate/step. */
export interface FixedMutationSchedule {
  name: 'FIXED';
  rate: number;
  step: number;
}

/** Score-staged rate/step with floors. */
export interface AnnealedMutationSchedule {
  name: 'ANNEALED';
  stages: MutationStage[];
  minRate: number;
  minStep: number;
}

/** Any mutation schedule accepted by the engine. */
export type MutationSchedule = FixedMutationSchedule | AnnealedMutationSchedule;

/** Rate/step pair resolved for one generation. */
export interface MutationAmount {
  rate: number;
  step: number;
}

export const mutation = {
  /**
   * Small constant drift: 3% of parameters move by at most 0.08.
   */
  FIXED: {
    name: 'FIXED',
    rate: 0.03,
    step: 0.08,
  } satisfies FixedMutationSchedule,

  /**
   * Three stages split at best scores 5 and 12.
   */
  ANNEALED: {
    name: 'ANNEALED',
    stages: [
      { belowScore: 5, rate: 0.18, step: 0.45 },
      { belowScore: 12, rate: 0.12, step: 0.25 },
      { rate: 0.06, step: 0.15 },
    ],
    minRate: 0.05,
    minStep: 0.1,
  } satisfies AnnealedMutationSchedule,
};

/**
 * Resolve the rate/step for a generation whose best individual scored `bestScore`.
 *
 * @example
 * resolveMutation(mutation.ANNEALED, 7); // { rate: 0.12, step: 0.25 }
 */
export function resolveMutation(
  schedule: MutationSchedule,
  bestScore: number
): MutationAmount {
  if (schedule.name === 'FIXED') {
    return { rate: schedule.rate, step: schedule.step };
  }
  // First stage whose threshold is above the score; the last stage is the catch-all.
  const stage =
    schedule.stages.find(
      (candidate) =>
        candidate.belowScore === undefined || bestScore < candidate.belowScore
    ) ?? schedule.stages[schedule.stages.length - 1];
  return {
    rate: Math.max(schedule.minRate, stage.rate),
    step: Math.max(schedule.minStep, stage.step),
  };
}
