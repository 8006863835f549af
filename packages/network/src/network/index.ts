/**
 * Network module exports
 */

export { Perceptron, toTrainingSet } from './Perceptron.js';
export { DEFAULT_THRESHOLD } from './types.js';

export type {
  VectorLike,
  TrainingExample,
  TrainingData,
  TrainingStatus,
  TrainingResult,
  EpochResult,
  TrainOptions,
  PerceptronOptions,
} from './types.js';
