/**
 * Activation functions available to the fixed 4→8→1 flap policy.
 *
 * The hidden layer uses either the logistic sigmoid or the rectified linear
 * unit, selected per engine; the single output unit is always logistic so the
 * network answers with a flap probability in (0, 1).
 *
 * All methods are static and can be called directly, e.g. `Activation.relu(x)`.
 *
 * @see {@link https://en.wikipedia.org/wiki/Activation_function}
 * @see {@link https://en.wikipedia.org/wiki/Rectifier_(neural_networks)}
 */
export class Activation {
  /**
   * Logistic (Sigmoid) activation function: 1 / (1 + e^-x).
   * Outputs values between 0 and 1.
   */
  static logistic(x: number): number {
    return 1 / (1 + Math.exp(-x));
  }

  /**
   * Logistic activation with the pre-activation clamped into `[-limit, limit]`.
   *
   * Keeps `Math.exp` far away from overflow so the result is always a finite
   * value strictly inside (0, 1). For |x| below the limit the result equals
   * {@link Activation.logistic}.
   *
   * @param limit Half-width of the clamp window. Must stay below ~36: past that
   *   1 + e^-x rounds to 1 in double precision and the output would reach 1.
   */
  static clampedLogistic(x: number, limit: number): number {
    const z = Math.max(-limit, Math.min(limit, x));
    return 1 / (1 + Math.exp(-z));
  }

  /**
   * Rectified Linear Unit (ReLU) activation function: max(0, x).
   */
  static relu(x: number): number {
    return x > 0 ? x : 0;
  }
}

/** Names accepted for the hidden layer activation. */
export type HiddenActivationName = 'logistic' | 'relu';

/**
 * Lookup from hidden activation name to implementation.
 */
export const hiddenActivations: Readonly<
  Record<HiddenActivationName, (x: number) => number>
> = {
  logistic: Activation.logistic,
  relu: Activation.relu,
};

/**
 * Output pre-activation clamp used with each hidden activation. ReLU hidden
 * units are unbounded, so their output sum gets the wider window.
 */
export const OUTPUT_CLAMP: Readonly<Record<HiddenActivationName, number>> = {
  logistic: 20,
  relu: 30,
};

export default Activation;
