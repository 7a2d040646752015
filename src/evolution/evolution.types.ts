/**
 * Shared structural types for the modular evolution components.
 *
 * Helper modules type their `this` as {@link EngineLike} instead of importing
 * the concrete `EvolutionEngine` class, which keeps them free of circular
 * references.
 */
import type { Genome } from '../architecture/genome';
import type { FeedforwardPolicy } from '../architecture/policy';
import type { HiddenActivationName } from '../methods/activation';
import type { CrossoverMethod } from '../methods/crossover';
import type { MutationSchedule } from '../methods/mutation';
import type { SelectionMethod } from '../methods/selection';
import type { DisplayColor } from '../utils/color';
import type { EngineLogger } from '../utils/logger';
import type { RandomSource } from '../utils/rng';

/** How raw world measurements become the four policy inputs. */
export type InputEncoding = 'relative' | 'raw';

/** Retained pool of historically top-ranked networks. */
export interface HallOfFameOptions {
  /** Maximum retained entries after truncation. */
  capacity: number;
  /** How many of each generation's best are offered to the pool. */
  topK: number;
  /** Entries (other than the champion) cloned into every new generation. */
  inject: number;
}

/** Flap decision rule. */
export interface DecisionOptions {
  /** Sample `output > U[0, 1)` instead of comparing with `threshold`. */
  stochastic: boolean;
  /** Deterministic flap threshold. */
  threshold: number;
}

/** Elite count = `max(minimum, floor(popSize * fraction))`, at least 2. */
export interface EliteOptions {
  fraction: number;
  minimum: number;
}

/** Bounded in-memory generation history. */
export interface TelemetryOptions {
  enabled: boolean;
  maxEntries: number;
}

/**
 * Fully resolved engine configuration (every field present).
 *
 * Capability flags (`champion`, `hallOfFame`, `selection`, `crossover`,
 * `mutation`) select the engine variant; there is one engine type.
 */
export interface EvolutionOptions {
  popSize: number;
  champion: boolean;
  hallOfFame: HallOfFameOptions | false;
  selection: SelectionMethod;
  crossover: CrossoverMethod;
  mutation: MutationSchedule;
  elite: EliteOptions;
  hiddenActivation: HiddenActivationName;
  inputEncoding: InputEncoding;
  /** Symmetric parameter bound after mutation and uniform crossover. */
  clipLimit: number;
  decision: DecisionOptions;
  telemetry: TelemetryOptions;
  /** Seed for the built-in xorshift generator. Ignored when `rng` is set. */
  seed?: number;
  /** Custom random source (e.g. a seedrandom stream). */
  rng?: RandomSource;
  logger?: EngineLogger;
}

/**
 * Caller-facing options: every field optional, nested groups partially
 * overridable.
 */
export type EvolutionOptionsInput = Partial<
  Omit<EvolutionOptions, 'decision' | 'elite' | 'telemetry'>
> & {
  decision?: Partial<DecisionOptions>;
  elite?: Partial<EliteOptions>;
  telemetry?: Partial<TelemetryOptions>;
};

/**
 * One tick of world measurements for a single bird. Heights are measured
 * above the ground.
 */
export interface Observation {
  birdY: number;
  /** Upper edge of the next gap. */
  topY: number;
  /** Lower edge of the next gap. */
  botY: number;
  /** Horizontal distance to the next obstacle. */
  dist: number;
  /** Vertical velocity; treated as 0 when absent. */
  velY?: number;
  /** Playable world height. */
  height: number;
}

/**
 * Snapshot of a genome captured for the champion record or hall of fame.
 * `policy` is a private clone.
 */
export interface ArchiveEntry {
  genomeId: number;
  generation: number;
  policy: FeedforwardPolicy;
  color: DisplayColor;
  score: number;
  distance: number;
  fitness: number;
}

/** Read-only export of one population slot for the presentation layer. */
export interface PopulationMember {
  readonly policy: FeedforwardPolicy;
  readonly color: DisplayColor;
}

/** Diagnostic record produced by every `evolve()`. */
export interface GenerationSummary {
  /** Generation that was just evaluated. */
  generation: number;
  bestScore: number;
  bestFitness: number;
  meanFitness: number;
  championScore: number | null;
  championFitness: number | null;
  mutationRate: number;
  mutationStep: number;
  eliteCount: number;
  hallOfFameSize: number;
  durationMs: number;
}

/**
 * Minimal surface the helper modules expect from an engine instance.
 */
export interface EngineLike {
  options: EvolutionOptions;
  population: Genome[];
  generation: number;
  champion: ArchiveEntry | undefined;
  hallOfFame: ArchiveEntry[];
  logger: EngineLogger;
  _telemetry: GenerationSummary[];
  _getRNG(): RandomSource;
  _createGenome(policy?: FeedforwardPolicy, color?: DisplayColor, id?: number): Genome;
}
