/**
 * Global neuroflap configuration contract & default instance.
 *
 * Only ambient, cross-cutting switches live here (console output). Everything
 * that shapes the genetic algorithm itself is passed to the
 * {@link EvolutionEngine} constructor instead, so two engines in the same
 * process never share hidden state.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'neuroflap';
 *   config.warnings = true;        // surface clamped configuration values
 *   config.logGenerations = true;  // one summary line per evolve()
 *
 * Adjust BEFORE constructing engines; the default logger reads the flags at
 * call time, so toggling later also takes effect.
 */
export interface NeuroflapConfig {
  /**
   * Emit warnings (clamped population sizes, degenerate elite settings) to stderr.
   * Default: false
   */
  warnings: boolean;

  /**
   * Print the per-generation summary line produced by `evolve()` to stdout.
   * Default: false
   */
  logGenerations: boolean;
}

/**
 * Singleton mutable configuration object consumed by the default logger.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: NeuroflapConfig = {
  warnings: false, // clamped-option guidance
  logGenerations: false, // generation summary lines
};
