import type { Genome } from '../architecture/genome';
import type { EngineLike } from './evolution.types';

/**
 * Per-tick lifecycle reporting from the game loop.
 *
 * Every call addresses an individual by its stable population slot. Indices
 * outside `[0, population.length)` (or non-integers) are ignored rather than
 * rejected: a caller may still hold indices from before a `reset()`.
 */

/**
 * Resolve a slot index to its genome, or `undefined` when out of range.
 */
export function genomeAt(engine: EngineLike, index: number): Genome | undefined {
  if (!Number.isInteger(index) || index < 0) return undefined;
  return engine.population[index];
}

/** Revive everyone and zero scores/distances; policies are untouched. */
export function resetRunState(this: EngineLike): void {
  for (const genome of this.population) genome.resetRunState();
}

/**
 * Record the distance reached by a live individual (keeps the maximum).
 * Non-finite distances are ignored.
 */
export function tickAlive(this: EngineLike, index: number, distance: number): void {
  const genome = genomeAt(this, index);
  if (!genome?.alive || !Number.isFinite(distance)) return;
  genome.distance = Math.max(genome.distance, distance);
}

/** One more obstacle passed by a live individual. */
export function addScore(this: EngineLike, index: number): void {
  const genome = genomeAt(this, index);
  if (!genome?.alive) return;
  genome.score += 1;
}

/**
 * Award a point to every live individual.
 *
 * This is how the game scores the population: when the leading bird passes an
 * obstacle every bird still flying is credited, whether or not it has reached
 * that obstacle itself. It is a simplification of per-bird obstacle clearing.
 *
 * @returns Number of individuals credited.
 */
export function awardAlive(this: EngineLike): number {
  let credited = 0;
  for (const genome of this.population) {
    if (!genome.alive) continue;
    genome.score += 1;
    credited++;
  }
  return credited;
}

/** Mark an individual dead. Repeated calls are harmless. */
export function kill(this: EngineLike, index: number): void {
  const genome = genomeAt(this, index);
  if (genome) genome.alive = false;
}

/** Individuals still flying. */
export function aliveCount(this: EngineLike): number {
  return this.population.reduce((count, genome) => count + (genome.alive ? 1 : 0), 0);
}
