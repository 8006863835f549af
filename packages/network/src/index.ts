/**
 * @perceptron/network
 *
 * Multi-layer feed-forward network trained by backpropagation.
 *
 * This package provides:
 * - Fully connected layers with sigmoid, tanh, relu or linear activation
 * - Online backpropagation until the epoch cost reaches a threshold
 * - Strictly validated JSON model files
 * - YAML network configuration
 *
 * @example
 * ```typescript
 * import { Perceptron } from '@perceptron/network';
 *
 * const network = new Perceptron(
 *   { inputs: 2, outputs: 4, activation: 'sigmoid', learningRate: 0.5 },
 *   { inputs: 4, outputs: 1, activation: 'sigmoid', learningRate: 0.5 },
 * );
 *
 * const result = network.trainBackProp(
 *   [
 *     { input: [0, 0], target: [0] },
 *     { input: [0, 1], target: [1] },
 *     { input: [1, 0], target: [1] },
 *     { input: [1, 1], target: [0] },
 *   ],
 *   0.001,
 *   { maxEpochs: 50_000 },
 * );
 *
 * if (result.status === 'converged') {
 *   const filename = network.saveModel('./models');
 * }
 * ```
 */

// =============================================================================
// Network
// =============================================================================

export { Perceptron, toTrainingSet, DEFAULT_THRESHOLD } from './network/index.js';

export type {
  VectorLike,
  TrainingExample,
  TrainingData,
  TrainingStatus,
  TrainingResult,
  EpochResult,
  TrainOptions,
  PerceptronOptions,
} from './network/index.js';

// =============================================================================
// Layers
// =============================================================================

export {
  Layer,
  resolveLayerConfig,
  ACTIVATIONS,
  getActivation,
  ACTIVATION_NAMES,
  INITIALIZATION_SCHEMES,
  DEFAULT_ACTIVATION,
  DEFAULT_LEARNING_RATE,
  DEFAULT_INITIALIZATION,
} from './layer/index.js';

export type {
  ActivationName,
  InitializationScheme,
  LayerConfig,
  ResolvedLayerConfig,
  Activation,
  RandomSource,
} from './layer/index.js';

// =============================================================================
// Model Persistence
// =============================================================================

export {
  encodeModel,
  decodeModel,
  parseModel,
  readModelFile,
  writeModelFile,
  MODEL_VERSION,
  LayerConfigSchema,
  PersistedModelSchema,
  parseTimeSpan,
  ModelFormatError,
  ModelIOError,
} from './model/index.js';

export type { PersistedModel, LayerParameters, FormatIssue } from './model/index.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  NetworkConfigLoader,
  loadNetworkConfig,
  createPerceptron,
  NetworkConfigSchema,
  DEFAULT_SEARCH_PATHS,
  ConfigLoadError,
  ConfigValidationError,
} from './config/index.js';

export type { NetworkConfig, NetworkConfigLoaderOptions } from './config/index.js';

// =============================================================================
// Errors & Logging
// =============================================================================

export { ShapeMismatchError, LayerStateError } from './errors.js';
export { Logger, LOG_LEVELS } from './utils/logger.js';
export type { LogLevel, LoggerOptions } from './utils/logger.js';

// Re-export the vector primitive used across the public API
export { Vector, Matrix, DimensionError } from '@perceptron/linalg';
