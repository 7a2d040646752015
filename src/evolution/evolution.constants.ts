/**
 * Shared numerical constants for the evolution modules.
 *
 * Keeping these in a single dependency-free module avoids scattering magic
 * numbers across the decision and reproduction code.
 */

/** Floor for gap and world-height denominators during normalization. */
export const EPSILON = 1e-6;

/** Vertical speed mapped to ±1 by the relative encoding. */
export const VELOCITY_SCALE = 400;

/** Distance at which the relative encoding saturates. */
export const DISTANCE_HORIZON = 200;

/** Distance at which the raw encoding saturates. */
export const RAW_DISTANCE_HORIZON = 600;

/** Smallest population and elite pool the engine will run with. */
export const MIN_POPULATION = 2;

/** Smallest effective tournament. */
export const MIN_TOURNAMENT = 2;

/** Generation number of a freshly reset engine. */
export const FIRST_GENERATION = 1;
