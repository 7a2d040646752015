import type { Genome } from '../architecture/genome';
import type { ArchiveEntry, EngineLike } from './evolution.types';

/**
 * Cross-generation memory: the all-time champion and the hall of fame.
 *
 * Both hold private clones, so nothing in them changes when the live
 * population is replaced or mutated.
 */

/**
 * Clone a genome's policy and freeze its run result.
 */
export function capture(genome: Genome, generation: number): ArchiveEntry {
  return {
    genomeId: genome.id,
    generation,
    policy: genome.policy.copy(),
    color: genome.color,
    score: genome.score,
    distance: genome.distance,
    fitness: genome.fitness,
  };
}

/**
 * Update champion and hall of fame from a population already sorted by
 * descending fitness.
 *
 * 1. Champion (when enabled): replaced only by a strictly fitter top genome,
 *    so its fitness never decreases.
 * 2. Hall of fame (when enabled): the generation's top-K are appended, the pool
 *    is re-sorted and truncated to capacity; a champion pushed out by the
 *    truncation takes the last slot back.
 *
 * @returns true when the champion changed.
 */
export function updateArchive(this: EngineLike, ranked: readonly Genome[]): boolean {
  const { champion: championEnabled, hallOfFame: hallOptions } = this.options;
  const leader = ranked[0];
  let promoted: ArchiveEntry | undefined;
  if (
    championEnabled &&
    leader &&
    leader.fitness > (this.champion?.fitness ?? Number.NEGATIVE_INFINITY)
  ) {
    promoted = capture(leader, this.generation);
    this.champion = promoted;
  }

  if (hallOptions) {
    // The promoted capture is reused so the champion and its pool entry are one object.
    const captures = ranked
      .slice(0, hallOptions.topK)
      .map((genome, rank) =>
        rank === 0 && promoted ? promoted : capture(genome, this.generation)
      );
    const pool = [...this.hallOfFame, ...captures]
      .sort((a, b) => b.fitness - a.fitness)
      .slice(0, hallOptions.capacity);
    if (championEnabled && this.champion && !pool.includes(this.champion)) {
      if (pool.length < hallOptions.capacity) pool.push(this.champion);
      else pool[pool.length - 1] = this.champion;
      pool.sort((a, b) => b.fitness - a.fitness);
    }
    this.hallOfFame = pool;
  }
  return promoted !== undefined;
}
