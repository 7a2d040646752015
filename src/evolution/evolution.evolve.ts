import { FeedforwardPolicy } from '../architecture/policy';
import type { Genome } from '../architecture/genome';
import { resolveMutation } from '../methods/mutation';
import { updateArchive } from './evolution.archive';
import { MIN_POPULATION } from './evolution.constants';
import { getParent, sort } from './evolution.selection';
import { recordGeneration } from './evolution.telemetry';
import type {
  EliteOptions,
  EngineLike,
  GenerationSummary,
} from './evolution.types';

/**
 * Elite count for a population: `max(minimum, floor(popSize * fraction))`,
 * never below 2 and never above `popSize`.
 */
export function computeEliteCount(popSize: number, elite: EliteOptions): number {
  const requested = Math.max(
    MIN_POPULATION,
    elite.minimum,
    Math.floor(popSize * elite.fraction)
  );
  return Math.min(popSize, requested);
}

/**
 * Run a single evolution step. Call only once every individual is dead and
 * no decision call is in flight.
 *
 * 1. Stable sort by descending fitness.
 * 2. Champion / hall-of-fame bookkeeping (see `updateArchive`).
 * 3. Take the elites; resolve mutation rate/step from the best score.
 * 4. Build the next generation in order: champion clone in slot 0, hall-of-fame
 *    injections, unmutated elite clones (together at most the elite count),
 *    then children of two selected elites, recombined and mutated, until the
 *    population is full.
 * 5. Replace the population and advance the generation counter.
 *
 * Elite and champion clones keep their display color; children get a fresh one.
 *
 * @this the engine instance
 * @returns Summary of the generation that was just evaluated.
 */
export function evolve(this: EngineLike): GenerationSummary {
  const startTime = performance.now();
  const rng = this._getRNG();
  const { options } = this;
  const evaluatedGeneration = this.generation;

  // 1. Rank
  sort.call(this);
  const ranked = this.population;
  const leader = ranked[0];
  const meanFitness =
    ranked.reduce((sum, genome) => sum + genome.fitness, 0) / ranked.length;

  // 2. Cross-generation memory
  updateArchive.call(this, ranked);

  // 3. Elites and mutation amount
  const eliteCount = computeEliteCount(options.popSize, options.elite);
  const elites = ranked.slice(0, eliteCount);
  const amount = resolveMutation(options.mutation, leader.score);

  // 4. Next generation
  const next: Genome[] = [];
  if (options.champion && this.champion) {
    next.push(this._createGenome(this.champion.policy.copy(), this.champion.color));
  }
  if (options.hallOfFame) {
    const injected = this.hallOfFame
      .filter((entry) => entry !== this.champion)
      .slice(0, options.hallOfFame.inject);
    for (const entry of injected) {
      if (next.length >= eliteCount) break;
      next.push(this._createGenome(entry.policy.copy(), entry.color));
    }
  }
  for (const elite of elites) {
    if (next.length >= eliteCount) break;
    next.push(this._createGenome(elite.policy.copy(), elite.color));
  }
  while (next.length < options.popSize) {
    const parentA = getParent(elites, options.selection, rng);
    const parentB = getParent(elites, options.selection, rng);
    const child = FeedforwardPolicy.crossover(
      parentA.policy,
      parentB.policy,
      options.crossover,
      rng,
      options.clipLimit
    );
    child.mutate(amount.rate, amount.step, rng, options.clipLimit);
    next.push(this._createGenome(child));
  }

  // 5. Turnover
  this.population = next;
  this.generation = evaluatedGeneration + 1;

  const summary: GenerationSummary = {
    generation: evaluatedGeneration,
    bestScore: leader.score,
    bestFitness: leader.fitness,
    meanFitness,
    championScore: this.champion?.score ?? null,
    championFitness: this.champion?.fitness ?? null,
    mutationRate: amount.rate,
    mutationStep: amount.step,
    eliteCount,
    hallOfFameSize: this.hallOfFame.length,
    durationMs: performance.now() - startTime,
  };
  recordGeneration.call(this, summary);
  return summary;
}
