import {
  hiddenActivations,
  OUTPUT_CLAMP,
  Activation,
  type HiddenActivationName,
} from '../methods/activation';
import type { CrossoverMethod } from '../methods/crossover';
import { randomRange, type RandomSource } from '../utils/rng';
import { recombine } from './policy/policy.genetic';
import { clipAll, mutate, DEFAULT_CLIP_LIMIT } from './policy/policy.mutate';
import {
  parsePolicyJSON,
  toJSONImpl,
  type PolicyJSON,
} from './policy/policy.serialize';

/** Number of observation inputs. */
export const INPUT_SIZE = 4;
/** Number of hidden units. */
export const HIDDEN_SIZE = 8;
/** Total scalar parameters: H×I input weights, H output weights, H hidden biases, 1 output bias. */
export const PARAMETER_COUNT = HIDDEN_SIZE * INPUT_SIZE + HIDDEN_SIZE * 2 + 1;

/**
 * The policy's complete persistent state.
 *
 * - `inputWeights[i][j]`: weight from input j to hidden unit i (8×4).
 * - `outputWeights[i]`: weight from hidden unit i to the output.
 * - `hiddenBias[i]`: bias of hidden unit i.
 * - `outputBias`: bias of the output unit.
 */
export interface NetworkParameters {
  inputWeights: number[][];
  outputWeights: number[];
  hiddenBias: number[];
  outputBias: number;
}

/** Construction options for {@link FeedforwardPolicy}. */
export interface PolicyOptions {
  /** `'random'` draws every parameter from U[-1, 1]; `'zero'` fills with 0. */
  init?: 'random' | 'zero';
  hiddenActivation?: HiddenActivationName;
  /** Source for `'random'` initialization. Defaults to `Math.random`. */
  rng?: RandomSource;
}

/**
 * Fixed-topology 4→8→1 feedforward network used as a flap controller.
 *
 * The network is a pure function of its parameters: `predict` keeps no state
 * between calls. Shape is fixed for the lifetime of the instance.
 *
 * @example
 * const policy = new FeedforwardPolicy({ hiddenActivation: 'relu', rng });
 * policy.predict([0.1, -0.3, 0.5, 0.2]); // flap probability in (0, 1)
 */
export class FeedforwardPolicy implements NetworkParameters {
  inputWeights: number[][];
  outputWeights: number[];
  hiddenBias: number[];
  outputBias: number;
  readonly hiddenActivation: HiddenActivationName;

  constructor(options: PolicyOptions = {}) {
    const init = options.init ?? 'random';
    const rng = options.rng ?? Math.random;
    this.hiddenActivation = options.hiddenActivation ?? 'logistic';
    const draw = init === 'random' ? () => randomRange(rng, -1, 1) : () => 0;
    this.inputWeights = Array.from({ length: HIDDEN_SIZE }, () =>
      Array.from({ length: INPUT_SIZE }, draw)
    );
    this.outputWeights = Array.from({ length: HIDDEN_SIZE }, draw);
    this.hiddenBias = Array.from({ length: HIDDEN_SIZE }, draw);
    this.outputBias = draw();
  }

  /**
   * Build a policy around explicit parameter values (copied, not aliased).
   *
   * @throws When any array has the wrong dimensions or a value is not finite.
   */
  static fromParameters(
    parameters: NetworkParameters,
    hiddenActivation: HiddenActivationName = 'logistic'
  ): FeedforwardPolicy {
    const policy = new FeedforwardPolicy({ init: 'zero', hiddenActivation });
    const { inputWeights, outputWeights, hiddenBias, outputBias } = parameters;
    if (
      inputWeights.length !== HIDDEN_SIZE ||
      inputWeights.some((row) => row.length !== INPUT_SIZE) ||
      outputWeights.length !== HIDDEN_SIZE ||
      hiddenBias.length !== HIDDEN_SIZE
    ) {
      throw new Error(
        `Policy parameters must describe a ${INPUT_SIZE}-${HIDDEN_SIZE}-1 network.`
      );
    }
    policy.inputWeights = inputWeights.map((row) => [...row]);
    policy.outputWeights = [...outputWeights];
    policy.hiddenBias = [...hiddenBias];
    policy.outputBias = outputBias;
    if (!policy.toArray().every(Number.isFinite)) {
      throw new Error('Policy parameters must be finite numbers.');
    }
    return policy;
  }

  /**
   * Rebuild a policy from flattened values in {@link FeedforwardPolicy.toArray} order.
   *
   * @throws When `values.length !== PARAMETER_COUNT`.
   */
  static fromArray(
    values: readonly number[],
    hiddenActivation: HiddenActivationName = 'logistic'
  ): FeedforwardPolicy {
    if (values.length !== PARAMETER_COUNT) {
      throw new Error(
        `Expected ${PARAMETER_COUNT} policy parameters, received ${values.length}.`
      );
    }
    const policy = new FeedforwardPolicy({ init: 'zero', hiddenActivation });
    policy.assign(values);
    return policy;
  }

  /**
   * Combine two parents into a new child.
   *
   * @param limit Parameter bound applied after uniform crossover.
   * @throws When the parents use different hidden activations.
   */
  static crossover(
    a: FeedforwardPolicy,
    b: FeedforwardPolicy,
    method: CrossoverMethod,
    rng: RandomSource,
    limit: number = DEFAULT_CLIP_LIMIT
  ): FeedforwardPolicy {
    if (a.hiddenActivation !== b.hiddenActivation) {
      throw new Error(
        'Parent policies must share the same hidden activation for crossover.'
      );
    }
    const child = new FeedforwardPolicy({
      init: 'zero',
      hiddenActivation: a.hiddenActivation,
    });
    recombine(child, a, b, method, rng);
    if (method.name === 'UNIFORM') child.clipAll(limit);
    return child;
  }

  /**
   * Validate and rehydrate a serialized policy.
   *
   * @throws When `json` does not match {@link PolicyJSON}.
   */
  static fromJSON(json: unknown): FeedforwardPolicy {
    const parsed = parsePolicyJSON(json);
    return FeedforwardPolicy.fromParameters(parsed, parsed.hiddenActivation);
  }

  /** Number of scalar parameters (always {@link PARAMETER_COUNT}). */
  get parameterCount(): number {
    return PARAMETER_COUNT;
  }

  /**
   * Forward pass.
   *
   * @param inputs Exactly four observation values.
   * @returns Flap probability strictly inside (0, 1).
   * @throws When `inputs.length !== 4`; this is a caller bug, not a runtime condition.
   */
  predict(inputs: readonly number[]): number {
    if (inputs.length !== INPUT_SIZE) {
      throw new Error(
        `Policy expects ${INPUT_SIZE} inputs, received ${inputs.length}.`
      );
    }
    const squash = hiddenActivations[this.hiddenActivation];
    let out = this.outputBias;
    for (let i = 0; i < HIDDEN_SIZE; i++) {
      let sum = this.hiddenBias[i];
      const row = this.inputWeights[i];
      for (let j = 0; j < INPUT_SIZE; j++) sum += inputs[j] * row[j];
      out += squash(sum) * this.outputWeights[i];
    }
    return Activation.clampedLogistic(out, OUTPUT_CLAMP[this.hiddenActivation]);
  }

  /** Deep copy sharing no arrays with the original. */
  copy(): FeedforwardPolicy {
    return FeedforwardPolicy.fromArray(this.toArray(), this.hiddenActivation);
  }

  /**
   * Perturb parameters in place, then clip.
   *
   * @param rate Per-parameter mutation probability.
   * @param step Half-width of the uniform perturbation.
   */
  mutate(
    rate: number,
    step: number,
    rng: RandomSource,
    limit: number = DEFAULT_CLIP_LIMIT
  ): void {
    mutate.call(this, rate, step, rng, limit);
  }

  /** Clamp every parameter into `[-limit, limit]`. */
  clipAll(limit: number = DEFAULT_CLIP_LIMIT): void {
    clipAll.call(this, limit);
  }

  /**
   * Flatten parameters: input weights row by row, hidden biases, output
   * weights, output bias.
   */
  toArray(): number[] {
    return [
      ...this.inputWeights.flat(),
      ...this.hiddenBias,
      ...this.outputWeights,
      this.outputBias,
    ];
  }

  /**
   * Overwrite every parameter from flattened values (same order as {@link toArray}).
   */
  assign(values: readonly number[]): void {
    let cursor = 0;
    const next = () => values[cursor++];
    this.inputWeights = Array.from({ length: HIDDEN_SIZE }, () =>
      Array.from({ length: INPUT_SIZE }, next)
    );
    this.hiddenBias = Array.from({ length: HIDDEN_SIZE }, next);
    this.outputWeights = Array.from({ length: HIDDEN_SIZE }, next);
    this.outputBias = next();
  }

  /** Parameter-wise equality (same activation, identical values). */
  equals(other: FeedforwardPolicy): boolean {
    if (this.hiddenActivation !== other.hiddenActivation) return false;
    const mine = this.toArray();
    const theirs = other.toArray();
    return mine.every((value, index) => value === theirs[index]);
  }

  /** Versioned plain-object form. */
  toJSON(): PolicyJSON {
    return toJSONImpl.call(this);
  }
}

export default FeedforwardPolicy;
