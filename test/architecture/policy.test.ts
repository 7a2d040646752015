import {
  FeedforwardPolicy,
  HIDDEN_SIZE,
  INPUT_SIZE,
  PARAMETER_COUNT,
} from '../../src/architecture/policy';
import { crossover } from '../../src/methods/crossover';
import { constantPolicy, logit, seeded } from '../utils/test-helpers';

/** Policy whose every parameter equals `value`. */
const filledPolicy = (value: number, hiddenActivation: 'logistic' | 'relu' = 'relu') =>
  FeedforwardPolicy.fromArray(new Array<number>(PARAMETER_COUNT).fill(value), hiddenActivation);

describe('FeedforwardPolicy', () => {
  describe('shape', () => {
    it('declares 49 parameters for the 4-8-1 layout', () => {
      // Assert
      expect([INPUT_SIZE, HIDDEN_SIZE, PARAMETER_COUNT]).toEqual([4, 8, 49]);
    });
    it('initializes every parameter inside [-1, 1]', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ rng: seeded('init') });
      // Act
      const values = policy.toArray();
      // Assert
      expect(values.every((v) => v >= -1 && v <= 1)).toBe(true);
    });
    it('fills with zeros on zero init', () => {
      // Act
      const policy = new FeedforwardPolicy({ init: 'zero' });
      // Assert
      expect(policy.toArray()).toEqual(new Array<number>(PARAMETER_COUNT).fill(0));
    });
    it('defaults the hidden activation to logistic', () => {
      // Assert
      expect(new FeedforwardPolicy({ init: 'zero' }).hiddenActivation).toBe('logistic');
    });
  });

  describe('predict()', () => {
    it('answers 0.5 for an all-zero network', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ init: 'zero', hiddenActivation: 'relu' });
      // Act
      const output = policy.predict([0.3, -0.2, 0.9, 0.1]);
      // Assert
      expect(output).toBe(0.5);
    });
    it('answers the logistic of the output bias when all weights are zero', () => {
      // Arrange
      const policy = constantPolicy(logit(0.6));
      // Act
      const output = policy.predict([5, 5, 5, 5]);
      // Assert
      expect(output).toBeCloseTo(0.6, 12);
    });
    it('matches a hand-computed forward pass', () => {
      // Arrange: only hidden unit 0 is wired, to input 0.
      const policy = new FeedforwardPolicy({ init: 'zero', hiddenActivation: 'relu' });
      policy.inputWeights[0][0] = 2;
      policy.hiddenBias[0] = -1;
      policy.outputWeights[0] = 0.5;
      policy.outputBias = 0.25;
      // Act: hidden = relu(2 * 1.5 - 1) = 2, out = 0.25 + 2 * 0.5 = 1.25
      const output = policy.predict([1.5, 0, 0, 0]);
      // Assert
      expect(output).toBeCloseTo(1 / (1 + Math.exp(-1.25)), 12);
    });
    it('applies the logistic hidden activation', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ init: 'zero', hiddenActivation: 'logistic' });
      policy.outputWeights[0] = 2;
      // Act: hidden unit 0 = logistic(0) = 0.5, out = 1
      const output = policy.predict([0, 0, 0, 0]);
      // Assert
      expect(output).toBeCloseTo(1 / (1 + Math.exp(-1)), 12);
    });
    it('rejects the wrong number of inputs', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ init: 'zero' });
      // Act
      const run = () => policy.predict([1, 2, 3]);
      // Assert
      expect(run).toThrow('Policy expects 4 inputs, received 3.');
    });
    it('stays inside (0, 1) for saturating weights and inputs', () => {
      // Arrange
      const high = filledPolicy(6);
      const low = filledPolicy(6);
      low.outputWeights = low.outputWeights.map(() => -6);
      const inputs = [1e6, 1e6, 1e6, 1e6];
      // Act
      const outputs = [high.predict(inputs), low.predict(inputs)];
      // Assert
      expect(outputs.every((o) => o > 0 && o < 1)).toBe(true);
    });
    it('stays inside (0, 1) for random policies and inputs', () => {
      // Arrange
      const rng = seeded('predict');
      let inside = true;
      // Act
      for (let i = 0; i < 200; i++) {
        const policy = new FeedforwardPolicy({
          rng,
          hiddenActivation: i % 2 ? 'relu' : 'logistic',
        });
        const inputs = Array.from({ length: 4 }, () => (rng() - 0.5) * 2000);
        const output = policy.predict(inputs);
        if (!(output > 0 && output < 1)) inside = false;
      }
      // Assert
      expect(inside).toBe(true);
    });
    it('is a pure function of the parameters', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ rng: seeded('pure') });
      const inputs = [0.1, -0.4, 0.7, 0.2];
      // Act
      const first = policy.predict(inputs);
      const second = policy.predict(inputs);
      // Assert
      expect(second).toBe(first);
    });
  });

  describe('copy()', () => {
    it('equals the original', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ rng: seeded('copy') });
      // Act
      const clone = policy.copy();
      // Assert
      expect(clone.equals(policy)).toBe(true);
    });
    it('shares no state with the original', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ rng: seeded('copy') });
      const before = policy.toArray();
      const clone = policy.copy();
      // Act
      clone.mutate(1, 1, seeded('m'));
      clone.inputWeights[0][0] = 99;
      // Assert
      expect(policy.toArray()).toEqual(before);
    });
    it('keeps the hidden activation', () => {
      // Act
      const clone = filledPolicy(0.5, 'relu').copy();
      // Assert
      expect(clone.hiddenActivation).toBe('relu');
    });
  });

  describe('mutate()', () => {
    it('leaves the policy unchanged at rate 0', () => {
      // Arrange
      const policy = new FeedforwardPolicy({ rng: seeded('rate0') });
      const before = policy.copy();
      // Act
      policy.mutate(0, 0.5, seeded('draws'));
      // Assert
      expect(policy.equals(before)).toBe(true);
    });
    it('leaves out-of-bound values alone when nothing is selected', () => {
      // Arrange
      const policy = filledPolicy(9);
      // Act
      policy.mutate(0, 0.5, seeded('draws'), 6);
      // Assert
      expect(policy.outputBias).toBe(9);
    });
    it('keeps every parameter within the clip bound at rate 1', () => {
      // Arrange
      const policy = filledPolicy(5.9);
      // Act
      policy.mutate(1, 1, seeded('rate1'), 6);
      // Assert
      expect(policy.toArray().every((v) => Math.abs(v) <= 6)).toBe(true);
    });
    it('moves every parameter by at most step at rate 1', () => {
      // Arrange
      const policy = filledPolicy(0);
      // Act
      policy.mutate(1, 0.25, seeded('step'));
      // Assert
      expect(policy.toArray().every((v) => Math.abs(v) <= 0.25)).toBe(true);
    });
    it('adds the scaled draw to a selected parameter', () => {
      // Arrange: every draw is 0.75, so each parameter is selected and moves by +0.5
      const policy = filledPolicy(1);
      // Act
      policy.mutate(1, 1, () => 0.75);
      // Assert
      expect(policy.toArray()).toEqual(new Array<number>(PARAMETER_COUNT).fill(1.5));
    });
  });

  describe('clipAll()', () => {
    it('clamps every group into the bound', () => {
      // Arrange
      const policy = filledPolicy(-8);
      policy.outputBias = 7;
      // Act
      policy.clipAll(6);
      // Assert
      expect([policy.inputWeights[3][2], policy.hiddenBias[7], policy.outputWeights[0], policy.outputBias]).toEqual([-6, -6, -6, 6]);
    });
    it('rejects a negative bound', () => {
      // Arrange
      const policy = filledPolicy(1);
      // Act
      const run = () => policy.clipAll(-1);
      // Assert
      expect(run).toThrow('Clip limit must be a finite non-negative number, got -1.');
    });
  });

  describe('crossover()', () => {
    it('reproduces a parent crossed with itself (uniform)', () => {
      // Arrange
      const parent = new FeedforwardPolicy({ rng: seeded('self'), hiddenActivation: 'relu' });
      // Act
      const child = FeedforwardPolicy.crossover(parent, parent, crossover.UNIFORM, seeded('x'));
      // Assert
      expect(child.equals(parent)).toBe(true);
    });
    it('reproduces a parent crossed with itself (average)', () => {
      // Arrange
      const parent = new FeedforwardPolicy({ rng: seeded('self') });
      // Act
      const child = FeedforwardPolicy.crossover(parent, parent, crossover.AVERAGE, seeded('x'));
      // Assert
      expect(child.equals(parent)).toBe(true);
    });
    it('takes each parameter from one of the parents (uniform)', () => {
      // Arrange
      const a = filledPolicy(1);
      const b = filledPolicy(-1);
      // Act
      const child = FeedforwardPolicy.crossover(a, b, crossover.UNIFORM, seeded('mix'));
      // Assert
      expect(child.toArray().every((v) => v === 1 || v === -1)).toBe(true);
    });
    it('takes the first parent on low coin draws', () => {
      // Arrange
      const a = filledPolicy(1);
      const b = filledPolicy(-1);
      // Act
      const child = FeedforwardPolicy.crossover(a, b, crossover.UNIFORM, () => 0.1);
      // Assert
      expect(child.equals(a)).toBe(true);
    });
    it('clips the uniform child into the bound', () => {
      // Arrange
      const a = filledPolicy(10);
      // Act
      const child = FeedforwardPolicy.crossover(a, a, crossover.UNIFORM, seeded('clip'), 6);
      // Assert
      expect(child.equals(filledPolicy(6))).toBe(true);
    });
    it('averages the parents parameter-wise', () => {
      // Arrange
      const a = filledPolicy(3);
      const b = filledPolicy(-1);
      // Act
      const child = FeedforwardPolicy.crossover(a, b, crossover.AVERAGE, seeded('avg'));
      // Assert
      expect(child.equals(filledPolicy(1))).toBe(true);
    });
    it('refuses parents with different hidden activations', () => {
      // Arrange
      const a = filledPolicy(1, 'relu');
      const b = filledPolicy(1, 'logistic');
      // Act
      const run = () => FeedforwardPolicy.crossover(a, b, crossover.AVERAGE, seeded('x'));
      // Assert
      expect(run).toThrow('Parent policies must share the same hidden activation for crossover.');
    });
  });

  describe('flattening', () => {
    it('orders input weights, hidden biases, output weights, output bias', () => {
      // Arrange
      const values = Array.from({ length: PARAMETER_COUNT }, (_, i) => i);
      // Act
      const policy = FeedforwardPolicy.fromArray(values);
      // Assert
      expect([
        policy.inputWeights[0],
        policy.inputWeights[7][3],
        policy.hiddenBias[0],
        policy.outputWeights[0],
        policy.outputBias,
      ]).toEqual([[0, 1, 2, 3], 31, 32, 40, 48]);
    });
    it('round-trips through toArray', () => {
      // Arrange
      const values = Array.from({ length: PARAMETER_COUNT }, (_, i) => i / 10);
      // Act
      const flat = FeedforwardPolicy.fromArray(values).toArray();
      // Assert
      expect(flat).toEqual(values);
    });
    it('rejects the wrong parameter count', () => {
      // Act
      const run = () => FeedforwardPolicy.fromArray([1, 2, 3]);
      // Assert
      expect(run).toThrow('Expected 49 policy parameters, received 3.');
    });
  });

  describe('fromParameters()', () => {
    const zero = () => new FeedforwardPolicy({ init: 'zero' });

    it('copies the arrays it is given', () => {
      // Arrange
      const source = zero();
      // Act
      const policy = FeedforwardPolicy.fromParameters(source);
      source.hiddenBias[0] = 4;
      // Assert
      expect(policy.hiddenBias[0]).toBe(0);
    });
    it('rejects a wrong-sized hidden layer', () => {
      // Arrange
      const source = zero();
      source.hiddenBias = [0, 0, 0];
      // Act
      const run = () => FeedforwardPolicy.fromParameters(source);
      // Assert
      expect(run).toThrow('Policy parameters must describe a 4-8-1 network.');
    });
    it('rejects non-finite values', () => {
      // Arrange
      const source = zero();
      source.outputBias = Number.NaN;
      // Act
      const run = () => FeedforwardPolicy.fromParameters(source);
      // Assert
      expect(run).toThrow('Policy parameters must be finite numbers.');
    });
  });

  describe('equals()', () => {
    it('distinguishes a single changed parameter', () => {
      // Arrange
      const a = filledPolicy(1);
      const b = filledPolicy(1);
      b.outputWeights[4] = 1.0001;
      // Assert
      expect(a.equals(b)).toBe(false);
    });
    it('distinguishes hidden activations', () => {
      // Assert
      expect(filledPolicy(1, 'relu').equals(filledPolicy(1, 'logistic'))).toBe(false);
    });
  });
});
