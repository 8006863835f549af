/**
 * Vector - fixed-size float64 sequence with value semantics
 *
 * Every operation returns a new Vector; constructors copy their input, so a
 * vector handed to a caller can never alias another vector's storage.
 */

import { DimensionError } from './errors.js';

export class Vector implements Iterable<number> {
  private readonly data: Float64Array;

  private constructor(data: Float64Array) {
    this.data = data;
  }

  static from(values: ArrayLike<number>): Vector {
    return new Vector(Float64Array.from(values));
  }

  static of(...values: number[]): Vector {
    return new Vector(Float64Array.from(values));
  }

  static zero(size: number): Vector {
    Vector.assertSize(size);
    return new Vector(new Float64Array(size));
  }

  /**
   * All-ones vector, used to sum a vector through a dot product
   */
  static ones(size: number): Vector {
    Vector.assertSize(size);
    return new Vector(new Float64Array(size).fill(1));
  }

  get size(): number {
    return this.data.length;
  }

  get(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
      throw new RangeError(`Index ${index} out of range for vector of size ${this.data.length}`);
    }
    return this.data[index];
  }

  add(other: Vector): Vector {
    this.assertSameSize(other, 'add');
    const out = new Float64Array(this.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = this.data[i] + other.data[i];
    }
    return new Vector(out);
  }

  subtract(other: Vector): Vector {
    this.assertSameSize(other, 'subtract');
    const out = new Float64Array(this.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = this.data[i] - other.data[i];
    }
    return new Vector(out);
  }

  /**
   * Element-wise product
   */
  hadamard(other: Vector): Vector {
    this.assertSameSize(other, 'hadamard');
    const out = new Float64Array(this.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = this.data[i] * other.data[i];
    }
    return new Vector(out);
  }

  dot(other: Vector): number {
    this.assertSameSize(other, 'dot');
    let sum = 0;
    for (let i = 0; i < this.data.length; i++) {
      sum += this.data[i] * other.data[i];
    }
    return sum;
  }

  scale(factor: number): Vector {
    const out = new Float64Array(this.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = this.data[i] * factor;
    }
    return new Vector(out);
  }

  map(fn: (value: number, index: number) => number): Vector {
    const out = new Float64Array(this.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = fn(this.data[i], i);
    }
    return new Vector(out);
  }

  sum(): number {
    let total = 0;
    for (let i = 0; i < this.data.length; i++) {
      total += this.data[i];
    }
    return total;
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  [Symbol.iterator](): Iterator<number> {
    return this.data[Symbol.iterator]();
  }

  private assertSameSize(other: Vector, operation: string): void {
    if (other.data.length !== this.data.length) {
      throw new DimensionError(
        `Cannot ${operation} vectors of size ${this.data.length} and ${other.data.length}`,
        this.data.length,
        other.data.length
      );
    }
  }

  private static assertSize(size: number): void {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Vector size must be a non-negative integer, got ${size}`);
    }
  }
}
