/**
 * Layer Types
 */

export const ACTIVATION_NAMES = ['sigmoid', 'tanh', 'relu', 'linear'] as const;
export const INITIALIZATION_SCHEMES = ['xavier', 'uniform'] as const;

export type ActivationName = (typeof ACTIVATION_NAMES)[number];
export type InitializationScheme = (typeof INITIALIZATION_SCHEMES)[number];

export const DEFAULT_ACTIVATION: ActivationName = 'sigmoid';
export const DEFAULT_LEARNING_RATE = 0.1;
export const DEFAULT_INITIALIZATION: InitializationScheme = 'xavier';

export interface LayerConfig {
  /** Size of the input vector */
  inputs: number;
  /** Number of units (size of the output vector) */
  outputs: number;
  /** Activation function, defaults to sigmoid */
  activation?: ActivationName;
  /** Weight update step size, in (0, 1] */
  learningRate?: number;
  /** Random initialization scheme for the weights */
  initialization?: InitializationScheme;
}

export type ResolvedLayerConfig = Required<LayerConfig>;

export interface Activation {
  fn: (z: number) => number;
  /** Derivative expressed on the activated output, not the pre-activation */
  derivative: (a: number) => number;
}

export type RandomSource = () => number;
