/**
 * @perceptron/linalg
 *
 * Vector and matrix value types used by the perceptron engine.
 *
 * @example
 * ```typescript
 * import { Vector } from '@perceptron/linalg';
 *
 * const error = Vector.of(1, 0.5).subtract(Vector.of(0.25, 0.5));
 * const halfSquared = error.dot(error) * 0.5;
 * ```
 */

export { Vector } from './Vector.js';
export { Matrix } from './Matrix.js';
export { DimensionError } from './errors.js';
