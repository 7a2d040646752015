import type { Genome } from '../architecture/genome';
import type { SelectionMethod } from '../methods/selection';
import { randomIndex, type RandomSource } from '../utils/rng';
import { MIN_TOURNAMENT } from './evolution.constants';
import type { EngineLike } from './evolution.types';

/**
 * Sorts the population in place by descending fitness.
 *
 * `Array.prototype.sort` is stable, so equal-fitness genomes keep their
 * previous relative order.
 */
export function sort(this: EngineLike): void {
  this.population.sort((a, b) => b.fitness - a.fitness);
}

/**
 * Tournament pick: draw `size` candidates (clamped to `[2, pool.length]`, at
 * least 2) with replacement and keep the fittest. The first drawn wins ties.
 *
 * @throws When `pool` is empty.
 */
export function tournamentPick(
  pool: readonly Genome[],
  size: number,
  rng: RandomSource
): Genome {
  if (pool.length === 0) throw new Error('Cannot select from an empty parent pool.');
  const rounds = Math.max(MIN_TOURNAMENT, Math.min(size, pool.length));
  let best = pool[randomIndex(rng, pool.length)];
  for (let i = 1; i < rounds; i++) {
    const challenger = pool[randomIndex(rng, pool.length)];
    if (challenger.fitness > best.fitness) best = challenger;
  }
  return best;
}

/**
 * Select one parent from `pool` according to `method`.
 *
 * @throws When `pool` is empty.
 */
export function getParent(
  pool: readonly Genome[],
  method: SelectionMethod,
  rng: RandomSource
): Genome {
  switch (method.name) {
    case 'TOURNAMENT':
      return tournamentPick(pool, method.size, rng);
    case 'RANDOM_PAIR':
      if (pool.length === 0)
        throw new Error('Cannot select from an empty parent pool.');
      return pool[randomIndex(rng, pool.length)];
  }
}

/**
 * Fittest genome of the current population, without reordering it.
 */
export function getFittest(this: EngineLike): Genome {
  return this.population.reduce((best, genome) =>
    genome.fitness > best.fitness ? genome : best
  );
}

/**
 * Mean fitness across the population.
 */
export function getAverage(this: EngineLike): number {
  const total = this.population.reduce((sum, genome) => sum + genome.fitness, 0);
  return total / this.population.length;
}
