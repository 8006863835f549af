/**
 * Perceptron Types
 */

import type { Vector } from '@perceptron/linalg';
import type { RandomSource } from '../layer/types.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_THRESHOLD = 0.001;

export type VectorLike = Vector | readonly number[];

export interface TrainingExample {
  input: VectorLike;
  target: VectorLike;
}

/**
 * Column-wise training data, paired into examples by `toTrainingSet`
 */
export interface TrainingData {
  inputs: number[][];
  outputs: number[][];
}

/**
 * - converged: epoch cost reached the threshold
 * - exhausted: `maxEpochs` ran out first
 * - diverged: epoch cost stopped being a finite number
 */
export type TrainingStatus = 'converged' | 'exhausted' | 'diverged';

export interface TrainingResult {
  status: TrainingStatus;
  /** Epochs completed */
  epochs: number;
  /** Cost of the final epoch */
  error: number;
  /** Wall-clock duration of the whole run in ms */
  elapsedMs: number;
}

export interface EpochResult {
  epoch: number;
  cost: number;
  epochTimeMs: number;
}

export interface TrainOptions {
  /** Stop after this many epochs even if the threshold was not reached */
  maxEpochs?: number;
  onEpochEnd?: (result: EpochResult) => void;
}

export interface PerceptronOptions {
  /** Random source for weight initialization */
  random?: RandomSource;
  logger?: Logger;
}
