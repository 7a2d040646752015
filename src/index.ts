export { config, type NeuroflapConfig } from './config';
export {
  FeedforwardPolicy,
  HIDDEN_SIZE,
  INPUT_SIZE,
  PARAMETER_COUNT,
  type NetworkParameters,
  type PolicyOptions,
} from './architecture/policy';
export { DEFAULT_CLIP_LIMIT } from './architecture/policy/policy.mutate';
export type { PolicyJSON } from './architecture/policy/policy.serialize';
export { Genome, FITNESS_SCORE_WEIGHT, fitnessOf } from './architecture/genome';
export { EvolutionEngine, type ImportOverrides } from './evolution';
export {
  presets,
  DEFAULT_OPTIONS,
  resolveOptions,
} from './evolution/evolution.options';
export { encodeObservation } from './evolution/evolution.decision';
export { computeEliteCount } from './evolution/evolution.evolve';
export { formatSummaryLine } from './evolution/evolution.telemetry';
export type { EvolutionStateJSON } from './evolution/evolution.export';
export type * from './evolution/evolution.types';
export * from './methods/methods';
export type { DisplayColor } from './utils/color';
export type { EngineLogger } from './utils/logger';
export type { RandomSource } from './utils/rng';
