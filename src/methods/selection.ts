/**
 * Parent selection methods used when filling the non-elite slots of a new
 * generation. Both draw from the elite pool of the generation being replaced.
 *
 * High selection pressure converges faster but risks stagnating early; the
 * random pair keeps every elite equally likely.
 *
 * @see {@link https://en.wikipedia.org/wiki/Selection_(genetic_algorithm)|Selection (genetic algorithm) - Wikipedia}
 */
export const selection = {
  /**
   * Random pair.
   *
   * Each parent is an elite drawn uniformly at random (with replacement).
   */
  RANDOM_PAIR: {
    name: 'RANDOM_PAIR',
  },

  /**
   * Tournament Selection.
   *
   * Draws `size` candidates uniformly at random (with replacement) from the
   * elite pool and keeps the fittest. The effective size is clamped to
   * `[2, pool length]` so a pool of one or a size below two never degenerates.
   *
   * @property {number} size - Number of candidates per tournament. Defaults to 5.
   */
  TOURNAMENT: {
    name: 'TOURNAMENT',
    size: 5,
  },
} as const;

/** Random pair descriptor. */
export interface RandomPairSelection {
  name: 'RANDOM_PAIR';
}

/** Tournament descriptor; `size` may be overridden by callers. */
export interface TournamentSelection {
  name: 'TOURNAMENT';
  size: number;
}

/** Any selection descriptor accepted by the engine. */
export type SelectionMethod = RandomPairSelection | TournamentSelection;
