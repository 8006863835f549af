import type { Activation, ActivationName } from './types.js';

const sigmoid: Activation = {
  fn: (z) => 1 / (1 + Math.exp(-Math.max(-500, Math.min(500, z)))),
  derivative: (a) => a * (1 - a),
};

const tanh: Activation = {
  fn: (z) => Math.tanh(z),
  derivative: (a) => 1 - a * a,
};

const relu: Activation = {
  fn: (z) => Math.max(0, z),
  derivative: (a) => (a > 0 ? 1 : 0),
};

const linear: Activation = {
  fn: (z) => z,
  derivative: () => 1,
};

export const ACTIVATIONS: Readonly<Record<ActivationName, Activation>> = {
  sigmoid,
  tanh,
  relu,
  linear,
};

export function getActivation(name: ActivationName): Activation {
  const activation = ACTIVATIONS[name];
  if (!activation) {
    throw new RangeError(`Unknown activation function: ${name}`);
  }
  return activation;
}
