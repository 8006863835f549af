/**
 * Linear algebra errors
 */

export class DimensionError extends Error {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(message);
    this.name = 'DimensionError';
    Object.setPrototypeOf(this, DimensionError.prototype);
  }
}
