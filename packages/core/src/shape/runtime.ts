/**
 * Runtime matrix shape
 *
 * A `(rows, cols)` pair fixed at construction, with the derived size and
 * row-major index arithmetic the engines share.
 */

import { checkIndex, InvalidArgumentError } from '../errors';

/**
 * Maximum number of cells in a matrix
 */
export const MAX_MATRIX_SIZE = Number.MAX_SAFE_INTEGER;

export class MatrixShape {
  readonly rows: number;
  readonly cols: number;
  private readonly _size: number;

  constructor(rows: number, cols: number) {
    this.rows = rows;
    this.cols = cols;
    this._size = rows * cols;

    // Validate shape at construction
    this.validate();
  }

  /**
   * Total number of cells
   */
  get size(): number {
    return this._size;
  }

  get isSquare(): boolean {
    return this.rows === this.cols;
  }

  get isEmpty(): boolean {
    return this._size === 0;
  }

  equals(other: MatrixShape): boolean {
    return this.rows === other.rows && this.cols === other.cols;
  }

  /**
   * Shape with rows and columns swapped
   */
  transpose(): MatrixShape {
    return new MatrixShape(this.cols, this.rows);
  }

  /**
   * Row-major linear index of (row, col)
   */
  ravel(row: number, col: number): number {
    checkIndex(row, this.rows, 'Row index');
    checkIndex(col, this.cols, 'Column index');
    return row * this.cols + col;
  }

  /**
   * (row, col) of a row-major linear index
   */
  unravel(index: number): [number, number] {
    checkIndex(index, this._size, 'Linear index');
    return [Math.floor(index / this.cols), index % this.cols];
  }

  toString(): string {
    return `Shape[${this.rows.toString()}, ${this.cols.toString()}]`;
  }

  private validate(): void {
    for (const [name, dim] of [
      ['rows', this.rows],
      ['cols', this.cols],
    ] as const) {
      if (!Number.isInteger(dim) || dim < 0) {
        throw new InvalidArgumentError(
          `Invalid dimension ${String(dim)} for ${name}: dimensions must be non-negative integers`,
          { [name]: dim },
        );
      }
    }

    if (this._size > MAX_MATRIX_SIZE) {
      throw new InvalidArgumentError(
        `Matrix size ${this._size.toString()} exceeds maximum safe size of ${MAX_MATRIX_SIZE.toString()}. ` +
          `Shape: [${this.rows.toString()}, ${this.cols.toString()}]`,
      );
    }
  }

  static of(rows: number, cols: number): MatrixShape {
    return new MatrixShape(rows, cols);
  }
}

/**
 * Format a shape as "[rows, cols]" for error messages
 */
export function formatShape(shape: { rows: number; cols: number }): string {
  return `[${shape.rows.toString()}, ${shape.cols.toString()}]`;
}
