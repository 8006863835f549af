/**
 * Perceptron - multi-layer feed-forward network trained by backpropagation
 *
 * Training is online: every example's backward pass updates all layer
 * weights before the next example is fed forward. Epochs repeat until the
 * epoch cost (mean half-squared error) is at or below the threshold. Without
 * `maxEpochs` an unreachable threshold never returns.
 *
 * Single-threaded and synchronous; one call at a time per instance.
 */

import { Vector } from '@perceptron/linalg';
import { Layer } from '../layer/Layer.js';
import type { LayerConfig, RandomSource } from '../layer/types.js';
import { ShapeMismatchError } from '../errors.js';
import { readModelFile, writeModelFile } from '../model/codec.js';
import { MODEL_VERSION } from '../model/schema.js';
import type { PersistedModel } from '../model/schema.js';
import { Logger } from '../utils/logger.js';
import { DEFAULT_THRESHOLD } from './types.js';
import type {
  PerceptronOptions,
  TrainingData,
  TrainingExample,
  TrainingResult,
  TrainingStatus,
  TrainOptions,
  VectorLike,
} from './types.js';

interface PreparedExample {
  input: Vector;
  target: Vector;
}

// Weight source for the constructor; `create` swaps in its own for one call
let constructionRandom: RandomSource = Math.random;

export class Perceptron {
  private layers: Layer[];
  private logger: Logger = Logger.silent();
  private _lastError = 0;
  private _lastLearningTime = 0;

  /**
   * Layer configs exclude the raw input, which is not a computational layer
   */
  constructor(...configs: LayerConfig[]) {
    this.layers = buildLayers(configs, constructionRandom);
  }

  static create(configs: readonly LayerConfig[], options: PerceptronOptions = {}): Perceptron {
    const previous = constructionRandom;
    constructionRandom = options.random ?? previous;
    let network: Perceptron;
    try {
      network = new Perceptron(...configs);
    } finally {
      constructionRandom = previous;
    }

    if (options.logger) {
      network.logger = options.logger;
    }
    return network;
  }

  /**
   * Build a network from a decoded model or a model file
   */
  static fromModel(source: PersistedModel | string, options: PerceptronOptions = {}): Perceptron {
    const model = typeof source === 'string' ? readModelFile(source) : source;
    const network = Perceptron.create(
      model.parameters.map(({ config }) => config),
      options
    );
    network.applyModel(model);
    return network;
  }

  /** Cost of the final epoch of the last training run */
  get lastError(): number {
    return this._lastError;
  }

  /** Wall-clock duration of the last training run in ms */
  get lastLearningTime(): number {
    return this._lastLearningTime;
  }

  get inputSize(): number {
    return this.layers[0].config.inputs;
  }

  get outputSize(): number {
    return this.layers[this.layers.length - 1].config.outputs;
  }

  get layerCount(): number {
    return this.layers.length;
  }

  getLayers(): readonly Layer[] {
    return this.layers;
  }

  predict(input: VectorLike): Vector {
    const vector = toVector(input);
    if (vector.size !== this.inputSize) {
      throw new ShapeMismatchError(
        `Expected input of size ${this.inputSize}, got ${vector.size}`,
        this.inputSize,
        vector.size
      );
    }

    let output = vector;
    for (const layer of this.layers) {
      output = layer.compute(output);
    }
    return output;
  }

  trainBackProp(
    trainingSet: readonly TrainingExample[],
    threshold: number = DEFAULT_THRESHOLD,
    options: TrainOptions = {}
  ): TrainingResult {
    if (!(threshold > 0)) {
      throw new RangeError(`Threshold must be positive, got ${threshold}`);
    }
    const { maxEpochs, onEpochEnd } = options;
    if (maxEpochs !== undefined && (!Number.isInteger(maxEpochs) || maxEpochs < 1)) {
      throw new RangeError(`maxEpochs must be a positive integer, got ${maxEpochs}`);
    }
    const examples = this.prepareExamples(trainingSet);

    const startTime = Date.now();
    const outputIndex = this.layers.length - 1;
    const mses = new Array<number>(examples.length);
    let cost = Number.POSITIVE_INFINITY;
    let epoch = 0;

    this.logger.info('Training started', {
      examples: examples.length,
      threshold,
      maxEpochs,
    });

    do {
      const epochStart = Date.now();

      for (let i = 0; i < examples.length; i++) {
        const { input, target } = examples[i];
        const errors = target.subtract(this.predict(input));
        mses[i] = Perceptron.getMSE(errors);

        let signal = this.layers[outputIndex].computeOutputBackward(errors);
        for (let j = outputIndex - 1; j >= 0; j--) {
          signal = this.layers[j].computeHiddenBackward(signal);
        }
      }

      epoch++;
      cost = Perceptron.getCost(Vector.from(mses));
      this.logger.debug('Epoch completed', { epoch, cost });
      onEpochEnd?.({ epoch, cost, epochTimeMs: Date.now() - epochStart });
    } while (
      cost > threshold &&
      Number.isFinite(cost) &&
      (maxEpochs === undefined || epoch < maxEpochs)
    );

    const elapsedMs = Date.now() - startTime;
    this._lastError = cost;
    this._lastLearningTime = elapsedMs;

    const status = trainingStatus(cost, threshold);
    const result: TrainingResult = { status, epochs: epoch, error: cost, elapsedMs };
    if (status === 'converged') {
      this.logger.info('Training converged', result);
    } else {
      this.logger.warn(`Training stopped without converging: ${status}`, result);
    }

    return result;
  }

  /**
   * Replace all layers and statistics from a model file. On failure the
   * current state is left untouched.
   */
  loadModel(filePath: string): void {
    const model = readModelFile(filePath);
    this.applyModel(model);
    this.logger.info('Model loaded', { path: filePath, layers: model.parameters.length });
  }

  /**
   * Save into `directory`; returns the generated file name, not the full path
   */
  saveModel(directory: string): string {
    const filename = writeModelFile(directory, this.toModel());
    this.logger.info('Model saved', { directory, filename });
    return filename;
  }

  toModel(): PersistedModel {
    return {
      version: MODEL_VERSION,
      lastError: this._lastError,
      lastLearningTime: this._lastLearningTime,
      parameters: this.layers.map((layer) => ({
        config: { ...layer.config },
        weights: layer.getWeights(),
      })),
    };
  }

  /**
   * Half squared error of one example: 0.5 × (E · E)
   */
  static getMSE(errors: Vector): number {
    return errors.dot(errors) * 0.5;
  }

  /**
   * Mean of the per-example errors of an epoch
   */
  static getCost(mses: Vector): number {
    if (mses.size === 0) {
      throw new RangeError('Cannot compute the cost of an empty epoch');
    }
    return mses.dot(Vector.ones(mses.size)) / mses.size;
  }

  // ==========================================================================
  // Private Helper Methods
  // ==========================================================================

  private applyModel(model: PersistedModel): void {
    const layers = model.parameters.map(({ config, weights }) => Layer.fromWeights(config, weights));
    assertChain(layers.map((layer) => layer.config));

    this.layers = layers;
    this._lastError = model.lastError;
    this._lastLearningTime = model.lastLearningTime;
  }

  private prepareExamples(trainingSet: readonly TrainingExample[]): PreparedExample[] {
    if (trainingSet.length === 0) {
      throw new RangeError('Training set must contain at least one example');
    }

    return trainingSet.map((example, i) => {
      const input = toVector(example.input);
      const target = toVector(example.target);
      if (input.size !== this.inputSize) {
        throw new ShapeMismatchError(
          `Example ${i}: expected input of size ${this.inputSize}, got ${input.size}`,
          this.inputSize,
          input.size
        );
      }
      if (target.size !== this.outputSize) {
        throw new ShapeMismatchError(
          `Example ${i}: expected target of size ${this.outputSize}, got ${target.size}`,
          this.outputSize,
          target.size
        );
      }
      return { input, target };
    });
  }
}

/**
 * Pair column-wise inputs and outputs into training examples
 */
export function toTrainingSet(data: TrainingData): TrainingExample[] {
  if (data.inputs.length !== data.outputs.length) {
    throw new ShapeMismatchError(
      `Got ${data.inputs.length} inputs but ${data.outputs.length} outputs`,
      data.inputs.length,
      data.outputs.length
    );
  }
  return data.inputs.map((input, i) => ({ input, target: data.outputs[i] }));
}

function buildLayers(configs: readonly LayerConfig[], random: RandomSource): Layer[] {
  assertChain(configs);
  return configs.map((config) => new Layer(config, random));
}

function assertChain(configs: readonly LayerConfig[]): void {
  if (configs.length === 0) {
    throw new ShapeMismatchError('A perceptron needs at least one layer', 1, 0);
  }
  for (let i = 1; i < configs.length; i++) {
    const expected = configs[i - 1].outputs;
    if (configs[i].inputs !== expected) {
      throw new ShapeMismatchError(
        `Layer ${i} takes ${configs[i].inputs} inputs but layer ${i - 1} produces ${expected}`,
        expected,
        configs[i].inputs
      );
    }
  }
}

function trainingStatus(cost: number, threshold: number): TrainingStatus {
  if (!Number.isFinite(cost)) {
    return 'diverged';
  }
  return cost <= threshold ? 'converged' : 'exhausted';
}

function toVector(value: VectorLike): Vector {
  return value instanceof Vector ? value : Vector.from(value);
}
