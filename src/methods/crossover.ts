/**
 * Crossover methods for the fixed-topology flap policy.
 *
 * Both parents always share the same 4→8→1 shape, so recombination works
 * parameter by parameter; no gene alignment is needed.
 *
 * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)}
 */
export const crossover = {
  /**
   * Uniform crossover.
   * Each parameter is taken from one of the parents with equal probability,
   * then the child is clipped into the parameter bound.
   *
   * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)#Uniform_crossover}
   */
  UNIFORM: {
    name: 'UNIFORM',
  },

  /**
   * Average crossover.
   * The offspring's parameters are the arithmetic mean of the parents'.
   * Usually paired with a small fixed mutation afterwards.
   *
   * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)#Arithmetic_recombination}
   */
  AVERAGE: {
    name: 'AVERAGE',
  },
} as const;

/** Any crossover descriptor accepted by the engine. */
export type CrossoverMethod = (typeof crossover)[keyof typeof crossover];

/** Discriminant of {@link CrossoverMethod}. */
export type CrossoverName = CrossoverMethod['name'];
