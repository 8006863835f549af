/**
 * Layer - one fully connected layer of the perceptron
 *
 * Weights are an `outputs × (inputs + 1)` matrix with the bias in the last
 * column. `compute` caches the input and activated output of the call; the
 * next backward call consumes that cache, so a forward/backward pair on one
 * example behaves as a single transaction. Not re-entrant.
 */

import { Matrix, Vector } from '@perceptron/linalg';
import { getActivation } from './activations.js';
import { LayerStateError, ShapeMismatchError } from '../errors.js';
import {
  ACTIVATION_NAMES,
  DEFAULT_ACTIVATION,
  DEFAULT_INITIALIZATION,
  DEFAULT_LEARNING_RATE,
  INITIALIZATION_SCHEMES,
} from './types.js';
import type { Activation, LayerConfig, RandomSource, ResolvedLayerConfig } from './types.js';

interface ForwardState {
  input: Vector;
  output: Vector;
}

export class Layer {
  readonly config: Readonly<ResolvedLayerConfig>;
  private readonly activation: Activation;
  private weights: Matrix;
  private forward: ForwardState | null = null;

  constructor(config: LayerConfig, random: RandomSource = Math.random) {
    this.config = Object.freeze(resolveLayerConfig(config));
    this.activation = getActivation(this.config.activation);
    this.weights = initializeWeights(this.config, random);
  }

  /**
   * Rebuild a layer from persisted weights
   */
  static fromWeights(config: LayerConfig, weights: readonly (readonly number[])[]): Layer {
    const layer = new Layer(config);
    layer.setWeights(weights);
    return layer;
  }

  get weightCount(): number {
    return this.config.outputs * (this.config.inputs + 1);
  }

  compute(input: Vector): Vector {
    const { inputs, outputs } = this.config;
    if (input.size !== inputs) {
      throw new ShapeMismatchError(
        `Layer expects ${inputs} inputs, got ${input.size}`,
        inputs,
        input.size
      );
    }

    const activated = new Array<number>(outputs);
    for (let j = 0; j < outputs; j++) {
      let sum = this.weights.get(j, inputs);
      for (let i = 0; i < inputs; i++) {
        sum += this.weights.get(j, i) * input.get(i);
      }
      activated[j] = this.activation.fn(sum);
    }

    const output = Vector.from(activated);
    this.forward = { input, output };
    return output;
  }

  /**
   * Backward step for the output layer. `error` is target − prediction.
   */
  computeOutputBackward(error: Vector): Vector {
    return this.backward(error, 'computeOutputBackward');
  }

  /**
   * Backward step for a hidden layer, fed the signal returned by the layer above
   */
  computeHiddenBackward(upstream: Vector): Vector {
    return this.backward(upstream, 'computeHiddenBackward');
  }

  getWeights(): number[][] {
    return this.weights.toArray();
  }

  setWeights(weights: readonly (readonly number[])[]): void {
    const { inputs, outputs } = this.config;
    if (weights.length !== outputs) {
      throw new ShapeMismatchError(
        `Expected ${outputs} weight rows, got ${weights.length}`,
        outputs,
        weights.length
      );
    }
    weights.forEach((row, r) => {
      if (row.length !== inputs + 1) {
        throw new ShapeMismatchError(
          `Weight row ${r} has ${row.length} values, expected ${inputs + 1}`,
          inputs + 1,
          row.length
        );
      }
    });

    this.weights = Matrix.from(weights);
    this.forward = null;
  }

  private backward(signal: Vector, operation: string): Vector {
    const state = this.forward;
    if (!state) {
      throw new LayerStateError(`${operation} called without a preceding compute`);
    }

    const { inputs, outputs, learningRate } = this.config;
    if (signal.size !== outputs) {
      throw new ShapeMismatchError(
        `${operation} expects a signal of size ${outputs}, got ${signal.size}`,
        outputs,
        signal.size
      );
    }
    this.forward = null;

    const deltas = signal.hadamard(state.output.map((a) => this.activation.derivative(a)));

    // Propagate through the weights as they were during the forward pass
    const propagated = new Array<number>(inputs).fill(0);
    for (let j = 0; j < outputs; j++) {
      const delta = deltas.get(j);
      for (let i = 0; i < inputs; i++) {
        propagated[i] += this.weights.get(j, i) * delta;
      }
    }

    for (let j = 0; j < outputs; j++) {
      const step = learningRate * deltas.get(j);
      for (let i = 0; i < inputs; i++) {
        this.weights.set(j, i, this.weights.get(j, i) + step * state.input.get(i));
      }
      this.weights.set(j, inputs, this.weights.get(j, inputs) + step);
    }

    return Vector.from(propagated);
  }
}

export function resolveLayerConfig(config: LayerConfig): ResolvedLayerConfig {
  const resolved: ResolvedLayerConfig = {
    inputs: config.inputs,
    outputs: config.outputs,
    activation: config.activation ?? DEFAULT_ACTIVATION,
    learningRate: config.learningRate ?? DEFAULT_LEARNING_RATE,
    initialization: config.initialization ?? DEFAULT_INITIALIZATION,
  };

  if (!Number.isInteger(resolved.inputs) || resolved.inputs <= 0) {
    throw new RangeError(`Layer inputs must be a positive integer, got ${resolved.inputs}`);
  }
  if (!Number.isInteger(resolved.outputs) || resolved.outputs <= 0) {
    throw new RangeError(`Layer outputs must be a positive integer, got ${resolved.outputs}`);
  }
  if (!(resolved.learningRate > 0 && resolved.learningRate <= 1)) {
    throw new RangeError(`Learning rate must be between 0 and 1, got ${resolved.learningRate}`);
  }
  if (!ACTIVATION_NAMES.includes(resolved.activation)) {
    throw new RangeError(`Unknown activation function: ${resolved.activation}`);
  }
  if (!INITIALIZATION_SCHEMES.includes(resolved.initialization)) {
    throw new RangeError(`Unknown initialization scheme: ${resolved.initialization}`);
  }

  return resolved;
}

function initializeWeights(config: ResolvedLayerConfig, random: RandomSource): Matrix {
  const { inputs, outputs } = config;

  if (config.initialization === 'uniform') {
    return Matrix.generate(outputs, inputs + 1, () => random() * 2 - 1);
  }

  // Xavier for the connection weights, zero bias
  const scale = Math.sqrt(2 / (inputs + outputs));
  return Matrix.generate(outputs, inputs + 1, (_, col) =>
    col === inputs ? 0 : (random() - 0.5) * 2 * scale
  );
}
