import { z } from 'zod';
import { crossover } from '../methods/crossover';
import { mutation } from '../methods/mutation';
import { selection } from '../methods/selection';
import { defaultLogger, type EngineLogger } from '../utils/logger';
import { parseOrThrow } from '../utils/validation';
import { MIN_POPULATION } from './evolution.constants';
import type {
  EvolutionOptions,
  EvolutionOptionsInput,
} from './evolution.types';

/**
 * Engine configuration: defaults, presets, validation.
 *
 * Presets reproduce the two engines the game shipped with:
 *
 * - `SIMPLE`: logistic hidden layer, raw height ratios as inputs, averaging
 *   crossover between two random elites, a small fixed mutation, top 10%
 *   kept (minimum 2), no champion.
 * - `ADVANCED`: ReLU hidden layer, gap-relative inputs, uniform crossover with
 *   tournament selection, score-annealed mutation, top 20% kept, champion
 *   preserved in slot 0.
 * - `HALL_OF_FAME`: `ADVANCED` plus a retained pool of past top performers.
 */

const stageSchema = z.object({
  belowScore: z.number().optional(),
  rate: z.number().min(0).max(1),
  step: z.number().min(0),
});

const selectionSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('RANDOM_PAIR') }),
  z.object({ name: z.literal('TOURNAMENT'), size: z.int().min(1) }),
]);

const crossoverSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('UNIFORM') }),
  z.object({ name: z.literal('AVERAGE') }),
]);

const mutationSchema = z.discriminatedUnion('name', [
  z.object({
    name: z.literal('FIXED'),
    rate: z.number().min(0).max(1),
    step: z.number().min(0),
  }),
  z.object({
    name: z.literal('ANNEALED'),
    stages: z.array(stageSchema).min(1),
    minRate: z.number().min(0).max(1),
    minStep: z.number().min(0),
  }),
]);

/**
 * Schema of the serializable part of {@link EvolutionOptions} (everything
 * except the `rng` and `logger` hooks).
 */
export const serializableOptionsSchema = z.object({
  popSize: z.int().min(MIN_POPULATION),
  champion: z.boolean(),
  hallOfFame: z.union([
    z.literal(false),
    z.object({
      capacity: z.int().min(1),
      topK: z.int().min(1),
      inject: z.int().min(0),
    }),
  ]),
  selection: selectionSchema,
  crossover: crossoverSchema,
  mutation: mutationSchema,
  elite: z.object({
    fraction: z.number().min(0).max(1),
    minimum: z.int().min(1),
  }),
  hiddenActivation: z.enum(['logistic', 'relu']),
  inputEncoding: z.enum(['relative', 'raw']),
  clipLimit: z.number().positive(),
  decision: z.object({
    stochastic: z.boolean(),
    threshold: z.number().min(0).max(1),
  }),
  telemetry: z.object({
    enabled: z.boolean(),
    maxEntries: z.int().min(1),
  }),
  seed: z.number().optional(),
});

/** Options without the function-valued hooks. */
export type SerializableEvolutionOptions = z.infer<
  typeof serializableOptionsSchema
>;

export const presets = {
  SIMPLE: {
    champion: false,
    hallOfFame: false,
    selection: selection.RANDOM_PAIR,
    crossover: crossover.AVERAGE,
    mutation: mutation.FIXED,
    elite: { fraction: 0.1, minimum: 2 },
    hiddenActivation: 'logistic',
    inputEncoding: 'raw',
  },
  ADVANCED: {
    champion: true,
    hallOfFame: false,
    selection: selection.TOURNAMENT,
    crossover: crossover.UNIFORM,
    mutation: mutation.ANNEALED,
    elite: { fraction: 0.2, minimum: 2 },
    hiddenActivation: 'relu',
    inputEncoding: 'relative',
  },
  HALL_OF_FAME: {
    champion: true,
    hallOfFame: { capacity: 10, topK: 20, inject: 2 },
    selection: selection.TOURNAMENT,
    crossover: crossover.UNIFORM,
    mutation: mutation.ANNEALED,
    elite: { fraction: 0.2, minimum: 2 },
    hiddenActivation: 'relu',
    inputEncoding: 'relative',
  },
} satisfies Record<string, EvolutionOptionsInput>;

/** Defaults: the `ADVANCED` preset with 50 birds and a 0.5 flap threshold. */
export const DEFAULT_OPTIONS: EvolutionOptions = {
  ...presets.ADVANCED,
  popSize: 50,
  clipLimit: 6,
  decision: { stochastic: false, threshold: 0.5 },
  telemetry: { enabled: true, maxEntries: 500 },
};

/**
 * Floor a requested population size to an integer of at least 2, warning
 * through `logger` when the request was too small.
 *
 * @throws When `requested` is not a finite number.
 */
export function clampPopulationSize(
  requested: number,
  logger: EngineLogger = defaultLogger
): number {
  if (!Number.isFinite(requested)) {
    throw new Error(`Population size must be a finite number, got ${requested}.`);
  }
  const size = Math.floor(requested);
  if (size < MIN_POPULATION) {
    logger.warn(
      `Population size ${requested} is below ${MIN_POPULATION}; using ${MIN_POPULATION}.`
    );
    return MIN_POPULATION;
  }
  return size;
}

/**
 * Merge caller options over {@link DEFAULT_OPTIONS} and validate the result.
 *
 * @throws Error describing every out-of-range or malformed field.
 */
export function resolveOptions(
  input: EvolutionOptionsInput = {}
): EvolutionOptions {
  const logger = input.logger ?? defaultLogger;
  const merged = {
    ...DEFAULT_OPTIONS,
    ...input,
    decision: { ...DEFAULT_OPTIONS.decision, ...input.decision },
    elite: { ...DEFAULT_OPTIONS.elite, ...input.elite },
    telemetry: { ...DEFAULT_OPTIONS.telemetry, ...input.telemetry },
    popSize: clampPopulationSize(
      input.popSize ?? DEFAULT_OPTIONS.popSize,
      logger
    ),
  };
  const parsed = parseOrThrow(
    serializableOptionsSchema,
    merged,
    'evolution options'
  );
  return { ...parsed, rng: input.rng, logger: input.logger };
}

/**
 * Strip the function-valued hooks for persistence.
 */
export function serializableOptions(
  options: EvolutionOptions
): SerializableEvolutionOptions {
  const { rng: _rng, logger: _logger, ...rest } = options;
  return rest;
}
