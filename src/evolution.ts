import { Genome } from './architecture/genome';
import { FeedforwardPolicy } from './architecture/policy';
import { randomDisplayColor, type DisplayColor } from './utils/color';
import { defaultLogger, type EngineLogger } from './utils/logger';
import {
  normalizeSeed,
  stateToUnit,
  timeSeed,
  xorshift32,
  type RandomSource,
} from './utils/rng';
import { FIRST_GENERATION } from './evolution/evolution.constants';
import { decide } from './evolution/evolution.decision';
import { evolve } from './evolution/evolution.evolve';
import {
  exportState,
  importStateInto,
  parseEvolutionState,
  type EvolutionStateJSON,
} from './evolution/evolution.export';
import {
  addScore,
  aliveCount,
  awardAlive,
  kill,
  resetRunState,
  tickAlive,
} from './evolution/evolution.lifecycle';
import { clampPopulationSize, resolveOptions } from './evolution/evolution.options';
import { getAverage, getFittest, sort } from './evolution/evolution.selection';
import {
  exportTelemetryCSV,
  exportTelemetryJSONL,
} from './evolution/evolution.telemetry';
import type {
  ArchiveEntry,
  EngineLike,
  EvolutionOptions,
  EvolutionOptionsInput,
  GenerationSummary,
  Observation,
  PopulationMember,
} from './evolution/evolution.types';

/** Options that may be changed when resuming from a state bundle. */
export type ImportOverrides = Pick<
  EvolutionOptionsInput,
  'rng' | 'logger' | 'decision' | 'telemetry'
>;

/**
 * Genetic neuroevolution engine for a population of flap policies.
 *
 * The engine is driven entirely by the host game loop, on one thread:
 *
 * ```
 * resetRunState() → per tick: shouldFlap / tickAlive / addScore / kill
 *                 → once everyone is dead: evolve() → resetRunState() → …
 * ```
 *
 * Individuals are addressed by their population slot (`0 ≤ index < popSize`);
 * slot identity holds between two `evolve()` calls.
 *
 * @example
 * const engine = new EvolutionEngine({ ...presets.ADVANCED, popSize: 30, seed: 7 });
 * if (engine.shouldFlap(0, birdY, topY, botY, dist, velY, height)) flap(0);
 * engine.kill(0);
 * if (engine.allDead()) engine.evolve();
 */
export class EvolutionEngine implements EngineLike {
  options: EvolutionOptions;
  population: Genome[] = [];
  generation: number = FIRST_GENERATION;
  /** Best individual ever seen (when `options.champion`). */
  champion: ArchiveEntry | undefined;
  /** Retained top performers (when `options.hallOfFame`), best first. */
  hallOfFame: ArchiveEntry[] = [];
  logger: EngineLogger;
  /** @internal Buffered generation summaries. */
  _telemetry: GenerationSummary[] = [];
  /**
   * Internal numeric state of the built-in xorshift RNG. Unused when a
   * custom `rng` is supplied.
   */
  private _rngState: number;
  /** Cached RNG function; created lazily from `_rngState`. */
  private _rng?: RandomSource;
  /** Counter for assigning unique genome ids. */
  private _nextGenomeId = 1;

  constructor(options: EvolutionOptionsInput = {}) {
    this.options = resolveOptions(options);
    this.logger = this.options.logger ?? defaultLogger;
    this._rngState =
      this.options.seed !== undefined ? normalizeSeed(this.options.seed) : timeSeed();
    this.reset(this.options.popSize);
  }

  /**
   * Rebuild an engine from a bundle produced by {@link exportState}.
   *
   * @throws Error listing every schema violation in `json`.
   */
  static importState(json: unknown, overrides: ImportOverrides = {}): EvolutionEngine {
    const state = parseEvolutionState(json);
    const engine = new EvolutionEngine({
      ...state.options,
      ...overrides,
      decision: { ...state.options.decision, ...overrides.decision },
      telemetry: { ...state.options.telemetry, ...overrides.telemetry },
    });
    importStateInto.call(engine, state);
    engine._nextGenomeId = state.nextGenomeId;
    if (state.rngState !== null) engine.restoreRNGState(state.rngState);
    return engine;
  }

  /** @internal Shared RNG accessor used by the helper modules. */
  _getRNG(): RandomSource {
    if (!this._rng) {
      const custom = this.options.rng;
      this._rng =
        custom ??
        (() => {
          this._rngState = xorshift32(this._rngState);
          return stateToUnit(this._rngState);
        });
    }
    return this._rng;
  }

  /** @internal Create a genome with a fresh id (or the given one). */
  _createGenome(policy?: FeedforwardPolicy, color?: DisplayColor, id?: number): Genome {
    const rng = this._getRNG();
    const genomeId = id ?? this._nextGenomeId++;
    return new Genome(
      genomeId,
      policy ??
        new FeedforwardPolicy({ hiddenActivation: this.options.hiddenActivation, rng }),
      color ?? randomDisplayColor(rng)
    );
  }

  /**
   * Replace the population with `populationSize` random genomes (at least 2)
   * and start over from generation 1 with an empty archive and telemetry.
   *
   * @throws When `populationSize` is not finite; the engine is left as it was.
   */
  reset(populationSize: number = this.options.popSize): void {
    const size = clampPopulationSize(populationSize, this.logger);
    this.options = { ...this.options, popSize: size };
    this.population = Array.from({ length: size }, () => this._createGenome());
    this.generation = FIRST_GENERATION;
    this.champion = undefined;
    this.hallOfFame = [];
    this._telemetry = [];
  }

  /** Revive everyone for a new episode; policies are untouched. */
  resetRunState(): void {
    resetRunState.call(this);
  }

  /** Keep the best distance reached by live individual `index`. */
  tickAlive(index: number, distance: number): void {
    tickAlive.call(this, index, distance);
  }

  /** One point for live individual `index`. */
  addScore(index: number): void {
    addScore.call(this, index);
  }

  /**
   * One point for every live individual, the game's rule when the leading
   * bird passes an obstacle.
   *
   * @returns Number of individuals credited.
   */
  awardAlive(): number {
    return awardAlive.call(this);
  }

  /** Mark individual `index` dead (idempotent). */
  kill(index: number): void {
    kill.call(this, index);
  }

  /** Number of individuals still alive this episode. */
  get aliveCount(): number {
    return aliveCount.call(this);
  }

  /** True once every individual has been killed. */
  allDead(): boolean {
    return this.aliveCount === 0;
  }

  /**
   * Per-tick decision query in positional form.
   *
   * @param velY Vertical velocity; pass `undefined` when unknown.
   */
  shouldFlap(
    index: number,
    birdY: number,
    topY: number,
    botY: number,
    dist: number,
    velY: number | undefined,
    height: number
  ): boolean {
    return decide.call(this, index, { birdY, topY, botY, dist, velY, height });
  }

  /** Per-tick decision query taking an {@link Observation}. */
  decide(index: number, observation: Observation): boolean {
    return decide.call(this, index, observation);
  }

  /**
   * Advance to the next generation. Call only between episodes.
   *
   * @returns Summary of the generation that was just evaluated.
   */
  evolve(): GenerationSummary {
    return evolve.call(this);
  }

  /** Sort the population by descending fitness (stable). */
  sort(): void {
    sort.call(this);
  }

  /** Fittest genome this episode. */
  getFittest(): Genome {
    return getFittest.call(this);
  }

  /** Mean fitness this episode. */
  getAverage(): number {
    return getAverage.call(this);
  }

  /**
   * Policy and tint for each slot, in slot order, for the presentation layer.
   * The policies are the live instances: read them, do not mutate them.
   */
  currentPopulationSnapshot(): readonly PopulationMember[] {
    return this.population.map((genome) => ({
      policy: genome.policy,
      color: genome.color,
    }));
  }

  /** Buffered generation summaries, oldest first. */
  getTelemetry(): readonly GenerationSummary[] {
    return [...this._telemetry];
  }

  /** Drop buffered summaries. */
  clearTelemetry(): void {
    this._telemetry = [];
  }

  /** Buffered summaries as JSON Lines. */
  exportTelemetryJSONL(): string {
    return exportTelemetryJSONL.call(this);
  }

  /** Most recent `maxEntries` summaries as CSV. */
  exportTelemetryCSV(maxEntries = 500): string {
    return exportTelemetryCSV.call(this, maxEntries);
  }

  /**
   * Built-in RNG state, or `undefined` when a custom `rng` drives the engine.
   */
  snapshotRNGState(): number | undefined {
    return this.options.rng ? undefined : this._rngState;
  }

  /**
   * Restore a state from {@link snapshotRNGState}; later draws repeat the
   * sequence that followed the snapshot.
   *
   * @throws When `state` is not a non-zero unsigned 32-bit integer.
   */
  restoreRNGState(state: number): void {
    if (!Number.isInteger(state) || state <= 0 || state > 0xffffffff) {
      throw new Error(`RNG state must be a non-zero uint32, got ${state}.`);
    }
    this._rngState = state;
  }

  /** Pause-and-resume bundle (population, archive, options, RNG). */
  exportState(): EvolutionStateJSON {
    return exportState.call(this, this.snapshotRNGState(), this._nextGenomeId);
  }
}

export default EvolutionEngine;
