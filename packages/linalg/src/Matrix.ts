/**
 * Matrix - row-major float64 grid
 */

import { DimensionError } from './errors.js';
import { Vector } from './Vector.js';

export class Matrix {
  private readonly data: Float64Array;

  private constructor(
    readonly rows: number,
    readonly cols: number,
    data?: Float64Array
  ) {
    this.data = data ?? new Float64Array(rows * cols);
  }

  static zeros(rows: number, cols: number): Matrix {
    Matrix.assertShape(rows, cols);
    return new Matrix(rows, cols);
  }

  static generate(rows: number, cols: number, fn: (row: number, col: number) => number): Matrix {
    Matrix.assertShape(rows, cols);
    const matrix = new Matrix(rows, cols);
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        matrix.data[r * cols + c] = fn(r, c);
      }
    }
    return matrix;
  }

  /**
   * Build from nested rows; rejects empty and ragged input
   */
  static from(values: readonly (readonly number[])[]): Matrix {
    if (values.length === 0 || values[0].length === 0) {
      throw new DimensionError('Matrix must have at least one row and one column', 1, 0);
    }

    const cols = values[0].length;
    const matrix = new Matrix(values.length, cols);
    for (let r = 0; r < values.length; r++) {
      const row = values[r];
      if (row.length !== cols) {
        throw new DimensionError(`Row ${r} has ${row.length} columns, expected ${cols}`, cols, row.length);
      }
      matrix.data.set(row, r * cols);
    }
    return matrix;
  }

  get(row: number, col: number): number {
    return this.data[this.offset(row, col)];
  }

  set(row: number, col: number, value: number): void {
    this.data[this.offset(row, col)] = value;
  }

  row(row: number): Vector {
    const start = this.offset(row, 0);
    return Vector.from(this.data.subarray(start, start + this.cols));
  }

  toArray(): number[][] {
    const out: number[][] = [];
    for (let r = 0; r < this.rows; r++) {
      out.push(Array.from(this.data.subarray(r * this.cols, (r + 1) * this.cols)));
    }
    return out;
  }

  clone(): Matrix {
    return new Matrix(this.rows, this.cols, Float64Array.from(this.data));
  }

  private offset(row: number, col: number): number {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) {
      throw new RangeError(`Index (${row}, ${col}) out of range for ${this.rows}x${this.cols} matrix`);
    }
    return row * this.cols + col;
  }

  private static assertShape(rows: number, cols: number): void {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new RangeError(`Matrix shape must be positive integers, got ${rows}x${cols}`);
    }
  }
}
