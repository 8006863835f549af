/**
 * Network Error Classes
 *
 * Errors raised by layers and the perceptron during inference and training.
 */

export class ShapeMismatchError extends Error {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(message);
    this.name = 'ShapeMismatchError';
    Object.setPrototypeOf(this, ShapeMismatchError.prototype);
  }
}

/**
 * Raised when a backward pass runs without a cached forward pass
 */
export class LayerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayerStateError';
    Object.setPrototypeOf(this, LayerStateError.prototype);
  }
}
