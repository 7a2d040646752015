import { z } from 'zod';
import { FeedforwardPolicy } from '../architecture/policy';
import { policySchema } from '../architecture/policy/policy.serialize';
import { makeDisplayColor } from '../utils/color';
import { parseOrThrow } from '../utils/validation';
import { FIRST_GENERATION } from './evolution.constants';
import {
  serializableOptions,
  serializableOptionsSchema,
} from './evolution.options';
import type { ArchiveEntry, EngineLike } from './evolution.types';

// ----------------------------------------------------------------------------------
// Export / Import helpers for the evolutionary state.
// A state bundle is plain JSON: it can be written to disk and fed back into
// `EvolutionEngine.importState()` to resume exactly where a run stopped.
// ----------------------------------------------------------------------------------

/** Current state bundle format version. */
export const STATE_FORMAT_VERSION = 1;

const colorSchema = z.object({
  hue: z.number().min(0).max(1),
  saturation: z.number().min(0).max(1),
  brightness: z.number().min(0).max(1),
});

const genomeSchema = z.object({
  id: z.int().min(1),
  policy: policySchema,
  color: colorSchema,
});

const archiveEntrySchema = z.object({
  genomeId: z.int().min(1),
  generation: z.int().min(FIRST_GENERATION),
  policy: policySchema,
  color: colorSchema,
  score: z.int().min(0),
  distance: z.number().min(0),
  fitness: z.number(),
});

/** Schema for {@link EvolutionStateJSON}. */
export const evolutionStateSchema = z
  .object({
    formatVersion: z.literal(STATE_FORMAT_VERSION),
    generation: z.int().min(FIRST_GENERATION),
    nextGenomeId: z.int().min(1),
    /** Built-in generator state; null when the run used a custom `rng`. */
    rngState: z.int().min(1).max(0xffffffff).nullable(),
    options: serializableOptionsSchema,
    population: z.array(genomeSchema),
    champion: archiveEntrySchema.nullable(),
    hallOfFame: z.array(archiveEntrySchema),
  })
  .refine((state) => state.population.length === state.options.popSize, {
    message: 'population length must equal options.popSize',
    path: ['population'],
  });

/** Full pause-and-resume bundle. */
export type EvolutionStateJSON = z.infer<typeof evolutionStateSchema>;
type ArchiveEntryJSON = z.infer<typeof archiveEntrySchema>;

const entryToJSON = (entry: ArchiveEntry): ArchiveEntryJSON => ({
  genomeId: entry.genomeId,
  generation: entry.generation,
  policy: entry.policy.toJSON(),
  color: {
    hue: entry.color.hue,
    saturation: entry.color.saturation,
    brightness: entry.color.brightness,
  },
  score: entry.score,
  distance: entry.distance,
  fitness: entry.fitness,
});

const entryFromJSON = (json: ArchiveEntryJSON): ArchiveEntry => ({
  ...json,
  policy: FeedforwardPolicy.fromJSON(json.policy),
  color: makeDisplayColor(json.color.hue, json.color.saturation, json.color.brightness),
});

/**
 * Validate an unknown value as a state bundle.
 *
 * @throws Error listing every schema violation.
 */
export function parseEvolutionState(json: unknown): EvolutionStateJSON {
  return parseOrThrow(evolutionStateSchema, json, 'evolution state');
}

/**
 * Snapshot population, archive, options and RNG state. Per-episode run state
 * (alive/score/distance) is not included: a resumed run starts a new episode.
 */
export function exportState(
  this: EngineLike,
  rngState: number | undefined,
  nextGenomeId: number
): EvolutionStateJSON {
  return {
    formatVersion: STATE_FORMAT_VERSION,
    generation: this.generation,
    nextGenomeId,
    rngState: rngState ?? null,
    options: serializableOptions(this.options),
    population: this.population.map((genome) => ({
      id: genome.id,
      policy: genome.policy.toJSON(),
      color: {
        hue: genome.color.hue,
        saturation: genome.color.saturation,
        brightness: genome.color.brightness,
      },
    })),
    champion: this.champion ? entryToJSON(this.champion) : null,
    hallOfFame: this.hallOfFame.map(entryToJSON),
  };
}

/**
 * Restore population and archive from a validated bundle into `this`.
 *
 * Ids are preserved. The hall-of-fame entry recorded from the same capture as
 * the champion is re-linked to the champion object.
 */
export function importStateInto(this: EngineLike, state: EvolutionStateJSON): void {
  this.generation = state.generation;
  this.population = state.population.map((genome) => {
    const color = makeDisplayColor(
      genome.color.hue,
      genome.color.saturation,
      genome.color.brightness
    );
    return this._createGenome(FeedforwardPolicy.fromJSON(genome.policy), color, genome.id);
  });
  const champion = state.champion ? entryFromJSON(state.champion) : undefined;
  this.champion = champion;
  this.hallOfFame = state.hallOfFame.map((entry) =>
    champion &&
    entry.genomeId === champion.genomeId &&
    entry.generation === champion.generation
      ? champion
      : entryFromJSON(entry)
  );
}
