/**
 * Layer module exports
 */

export { Layer, resolveLayerConfig } from './Layer.js';
export { ACTIVATIONS, getActivation } from './activations.js';
export {
  ACTIVATION_NAMES,
  INITIALIZATION_SCHEMES,
  DEFAULT_ACTIVATION,
  DEFAULT_LEARNING_RATE,
  DEFAULT_INITIALIZATION,
} from './types.js';

export type {
  ActivationName,
  InitializationScheme,
  LayerConfig,
  ResolvedLayerConfig,
  Activation,
  RandomSource,
} from './types.js';
