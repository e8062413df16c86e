/**
 * Matrix: a fixed-shape two-dimensional grid
 *
 * A Matrix owns rectangular row storage, its shape, its element type and the
 * array factory that allocates every matrix derived from it. Transforms
 * always return a new Matrix; only `set*`, `update*`, `fill*`, `replaceIf`,
 * `reverseH`, `reverseV` and `flatOp` change the receiver.
 *
 * Ownership differs between the two line accessors: `row(i)` hands out the
 * live row array, while `column(j)` returns a copy.
 */

import type { ArrayFactory, ElementType, Storage } from '../element/types';
import { denseArrayFactory, rectangularDims } from '../element/factory';
import {
  checkArgument,
  checkFromToIndex,
  checkIndex,
  checkShape,
  NonSquareMatrixError,
} from '../errors';
import { regionOf, runCells } from '../parallel/scheduler';
import type { IndexedSequence } from '../sequence/lazy-sequence';
import { Position } from '../shape/position';
import { formatShape, MatrixShape } from '../shape/runtime';
import { toColumnOrientedTable, toRowOrientedTable } from './table';
import type { Table } from './table';
import * as transform from './transform';
import * as traversal from './traversal';
import type { DiagonalKind, FillValue, GridSource, Neighbor } from './types';
import { flatOperate, sameShape, zipGrids, zipGrids3 } from './zip';

export type CellFunction<T, R> = (value: T, row: number, col: number) => R;
export type CellAction<T> = (value: T, row: number, col: number) => void;
export type CellPredicate<T> = (value: T, row: number, col: number) => boolean;
export type Grid<T> = readonly (readonly T[])[];

const ABSENT: Neighbor<never> = { present: false };

export class Matrix<T> implements GridSource<T> {
  readonly shape: MatrixShape;
  readonly elementType: ElementType<T>;
  readonly arrayFactory: ArrayFactory;
  private readonly data: Storage<T>;

  /**
   * Wrap rectangular storage without copying it
   *
   * @throws {ShapeError} when the rows differ in length
   */
  constructor(data: Storage<T>, elementType: ElementType<T>, arrayFactory: ArrayFactory = denseArrayFactory) {
    const [rows, cols] = rectangularDims(data);
    this.shape = new MatrixShape(rows, cols);
    this.data = data;
    this.elementType = elementType;
    this.arrayFactory = arrayFactory;
  }

  get rows(): number {
    return this.shape.rows;
  }

  get cols(): number {
    return this.shape.cols;
  }

  get size(): number {
    return this.shape.size;
  }

  isEmpty(): boolean {
    return this.shape.isEmpty;
  }

  isSquare(): boolean {
    return this.shape.isSquare;
  }

  /**
   * The live backing storage
   */
  array(): Storage<T> {
    return this.data;
  }

  private derive(storage: Storage<T>): Matrix<T> {
    return new Matrix(storage, this.elementType, this.arrayFactory);
  }

  private deriveAs<R>(storage: Storage<R>, elementType: ElementType<R>): Matrix<R> {
    return new Matrix(storage, elementType, this.arrayFactory);
  }

  // =============================================================================
  // Cell access
  // =============================================================================

  get(row: number, col: number): T {
    this.checkCell(row, col);
    return this.data[row][col];
  }

  set(row: number, col: number, value: T): void {
    this.checkCell(row, col);
    this.data[row][col] = value;
  }

  getAt(position: Position): T {
    return this.get(position.row, position.col);
  }

  setAt(position: Position, value: T): void {
    this.set(position.row, position.col, value);
  }

  private checkCell(row: number, col: number): void {
    checkIndex(row, this.rows, 'Row index');
    checkIndex(col, this.cols, 'Column index');
  }

  upOf(row: number, col: number): Neighbor<T> {
    this.checkCell(row, col);
    return row > 0 ? { present: true, value: this.data[row - 1][col] } : ABSENT;
  }

  downOf(row: number, col: number): Neighbor<T> {
    this.checkCell(row, col);
    return row < this.rows - 1 ? { present: true, value: this.data[row + 1][col] } : ABSENT;
  }

  leftOf(row: number, col: number): Neighbor<T> {
    this.checkCell(row, col);
    return col > 0 ? { present: true, value: this.data[row][col - 1] } : ABSENT;
  }

  rightOf(row: number, col: number): Neighbor<T> {
    this.checkCell(row, col);
    return col < this.cols - 1 ? { present: true, value: this.data[row][col + 1] } : ABSENT;
  }

  private pointOrNull(row: number, col: number): Position | null {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols ? Position.of(row, col) : null;
  }

  /**
   * Neighbours in the order up, right, down, left; `null` for each one
   * outside the grid
   */
  adjacent4Points(row: number, col: number): (Position | null)[] {
    return [
      this.pointOrNull(row - 1, col),
      this.pointOrNull(row, col + 1),
      this.pointOrNull(row + 1, col),
      this.pointOrNull(row, col - 1),
    ];
  }

  /**
   * Neighbours clockwise from the upper left: left-up, up, right-up, right,
   * right-down, down, left-down, left
   */
  adjacent8Points(row: number, col: number): (Position | null)[] {
    return [
      this.pointOrNull(row - 1, col - 1),
      this.pointOrNull(row - 1, col),
      this.pointOrNull(row - 1, col + 1),
      this.pointOrNull(row, col + 1),
      this.pointOrNull(row + 1, col + 1),
      this.pointOrNull(row + 1, col),
      this.pointOrNull(row + 1, col - 1),
      this.pointOrNull(row, col - 1),
    ];
  }

  // =============================================================================
  // Rows and columns
  // =============================================================================

  /**
   * The live row array; writes through it change the matrix
   */
  row(row: number): T[] {
    checkIndex(row, this.rows, 'Row index');
    return this.data[row];
  }

  /**
   * A copy of the column
   */
  column(col: number): T[] {
    checkIndex(col, this.cols, 'Column index');
    return this.data.map((r) => r[col]);
  }

  setRow(row: number, values: readonly T[]): void {
    checkIndex(row, this.rows, 'Row index');
    checkShape(
      values.length === this.cols,
      `Row length ${values.length.toString()} does not match column count ${this.cols.toString()}`,
      { expected: this.cols, actual: values.length },
    );
    const target = this.data[row];
    for (let j = 0; j < this.cols; j++) {
      target[j] = values[j];
    }
  }

  setColumn(col: number, values: readonly T[]): void {
    checkIndex(col, this.cols, 'Column index');
    checkShape(
      values.length === this.rows,
      `Column length ${values.length.toString()} does not match row count ${this.rows.toString()}`,
      { expected: this.rows, actual: values.length },
    );
    for (let i = 0; i < this.rows; i++) {
      this.data[i][col] = values[i];
    }
  }

  updateRow(row: number, f: (value: T, col: number) => T): void {
    checkIndex(row, this.rows, 'Row index');
    const target = this.data[row];
    for (let j = 0; j < this.cols; j++) {
      target[j] = f(target[j], j);
    }
  }

  updateColumn(col: number, f: (value: T, row: number) => T): void {
    checkIndex(col, this.cols, 'Column index');
    for (let i = 0; i < this.rows; i++) {
      this.data[i][col] = f(this.data[i][col], i);
    }
  }

  // =============================================================================
  // Diagonals
  // =============================================================================

  private checkSquare(operation: string): void {
    if (!this.shape.isSquare) {
      throw new NonSquareMatrixError(operation, this.rows, this.cols);
    }
  }

  private diagonalCol(kind: DiagonalKind, index: number): number {
    return kind === 'LU2RD' ? index : this.cols - 1 - index;
  }

  private getDiagonal(kind: DiagonalKind): T[] {
    this.checkSquare(`read the ${kind} diagonal`);
    return this.data.map((r, i) => r[this.diagonalCol(kind, i)]);
  }

  private setDiagonal(kind: DiagonalKind, values: readonly T[]): void {
    this.checkSquare(`set the ${kind} diagonal`);
    checkShape(
      values.length >= this.rows,
      `Diagonal needs ${this.rows.toString()} values, got ${values.length.toString()}`,
      { expected: this.rows, actual: values.length },
    );
    for (let i = 0; i < this.rows; i++) {
      this.data[i][this.diagonalCol(kind, i)] = values[i];
    }
  }

  private updateDiagonal(kind: DiagonalKind, f: (value: T, index: number) => T): void {
    this.checkSquare(`update the ${kind} diagonal`);
    for (let i = 0; i < this.rows; i++) {
      const j = this.diagonalCol(kind, i);
      this.data[i][j] = f(this.data[i][j], i);
    }
  }

  /**
   * Main diagonal, upper left to lower right
   *
   * @throws {NonSquareMatrixError} when rows !== cols
   */
  getLU2RD(): T[] {
    return this.getDiagonal('LU2RD');
  }

  /**
   * Overwrite the main diagonal from the first `rows` values
   */
  setLU2RD(values: readonly T[]): void {
    this.setDiagonal('LU2RD', values);
  }

  updateLU2RD(f: (value: T, index: number) => T): void {
    this.updateDiagonal('LU2RD', f);
  }

  /**
   * Anti-diagonal, upper right to lower left
   */
  getRU2LD(): T[] {
    return this.getDiagonal('RU2LD');
  }

  setRU2LD(values: readonly T[]): void {
    this.setDiagonal('RU2LD', values);
  }

  updateRU2LD(f: (value: T, index: number) => T): void {
    this.updateDiagonal('RU2LD', f);
  }

  // =============================================================================
  // Bulk mutation
  // =============================================================================

  /**
   * Replace every cell with `f(value, row, col)`; partitioned for large grids
   */
  updateAll(f: CellFunction<T, T>): void {
    const a = this.data;
    runCells(regionOf(this.rows, this.cols), (i, j) => {
      a[i][j] = f(a[i][j], i, j);
    });
  }

  replaceIf(predicate: CellPredicate<T>, newValue: T): void {
    const a = this.data;
    runCells(regionOf(this.rows, this.cols), (i, j) => {
      if (predicate(a[i][j], i, j)) {
        a[i][j] = newValue;
      }
    });
  }

  fill(value: T): void {
    for (const r of this.data) {
      r.fill(value);
    }
  }

  /**
   * Copy `grid` into this matrix with its upper left at (fromRow, fromCol).
   * Only the overlap is written; the rest of `grid` is ignored.
   *
   * @example
   * m.fillFrom(1, 1, [[7, 7], [7, 7]]);
   */
  fillFrom(...args: [grid: Grid<T>] | [fromRow: number, fromCol: number, grid: Grid<T>]): void {
    const [fromRow, fromCol, grid]: [number, number, Grid<T>] = args.length === 1 ? [0, 0, args[0]] : args;
    checkFromToIndex(fromRow, this.rows, this.rows);
    checkFromToIndex(fromCol, this.cols, this.cols);

    const rowCount = Math.min(this.rows - fromRow, grid.length);
    for (let i = 0; i < rowCount; i++) {
      const source = grid[i];
      const target = this.data[fromRow + i];
      for (let j = 0, width = Math.min(this.cols - fromCol, source.length); j < width; j++) {
        target[fromCol + j] = source[j];
      }
    }
  }

  /**
   * Visit every cell, or every cell of [fromRow, toRow) x [fromCol, toCol).
   * Large regions are partitioned, so `action` must not rely on visit order.
   */
  forEach(action: CellAction<T>): void;
  forEach(fromRow: number, toRow: number, fromCol: number, toCol: number, action: CellAction<T>): void;
  forEach(
    ...args:
      | [action: CellAction<T>]
      | [fromRow: number, toRow: number, fromCol: number, toCol: number, action: CellAction<T>]
  ): void {
    const [fromRow, toRow, fromCol, toCol, action]: [number, number, number, number, CellAction<T>] =
      args.length === 1 ? [0, this.rows, 0, this.cols, args[0]] : args;
    checkFromToIndex(fromRow, toRow, this.rows);
    checkFromToIndex(fromCol, toCol, this.cols);

    const a = this.data;
    runCells({ fromRow, toRow, fromCol, toCol }, (i, j) => {
      action(a[i][j], i, j);
    });
  }

  /**
   * Flatten row-major, let `op` rearrange or rewrite the flat array in place,
   * then write it back into this matrix
   *
   * @example
   * m.flatOp((flat) => flat.sort((x, y) => x - y));
   */
  flatOp(op: (flat: T[]) => void): void {
    flatOperate(this.data, this.cols, op);
  }

  // =============================================================================
  // Element-wise
  // =============================================================================

  map(f: CellFunction<T, T>): Matrix<T>;
  map<R>(f: CellFunction<T, R>, elementType: ElementType<R>): Matrix<R>;
  map<R>(...args: [f: CellFunction<T, T>] | [f: CellFunction<T, R>, elementType: ElementType<R>]): Matrix<T> | Matrix<R> {
    return args.length === 1 ? this.mapTo(args[0], this.elementType) : this.mapTo(args[0], args[1]);
  }

  private mapTo<R>(f: CellFunction<T, R>, elementType: ElementType<R>): Matrix<R> {
    const a = this.data;
    const out = this.arrayFactory.alloc(elementType, this.rows, this.cols);
    runCells(regionOf(this.rows, this.cols), (i, j) => {
      out[i][j] = f(a[i][j], i, j);
    });
    return this.deriveAs(out, elementType);
  }

  /**
   * Combine with a same-shape matrix cell by cell
   *
   * @throws {ShapeError} when the shapes differ
   */
  zipWith<B>(b: Matrix<B>, f: (a: T, b: B) => T): Matrix<T>;
  zipWith<B, R>(b: Matrix<B>, f: (a: T, b: B) => R, elementType: ElementType<R>): Matrix<R>;
  zipWith<B, R>(
    b: Matrix<B>,
    ...rest: [f: (a: T, b: B) => T] | [f: (a: T, b: B) => R, elementType: ElementType<R>]
  ): Matrix<T> | Matrix<R> {
    if (rest.length === 1) {
      return this.derive(zipGrids(this, b, rest[0], this.elementType));
    }
    return this.deriveAs(zipGrids(this, b, rest[0], rest[1]), rest[1]);
  }

  zipWith3<B, C>(b: Matrix<B>, c: Matrix<C>, f: (a: T, b: B, c: C) => T): Matrix<T>;
  zipWith3<B, C, R>(
    b: Matrix<B>,
    c: Matrix<C>,
    f: (a: T, b: B, c: C) => R,
    elementType: ElementType<R>,
  ): Matrix<R>;
  zipWith3<B, C, R>(
    b: Matrix<B>,
    c: Matrix<C>,
    ...rest: [f: (a: T, b: B, c: C) => T] | [f: (a: T, b: B, c: C) => R, elementType: ElementType<R>]
  ): Matrix<T> | Matrix<R> {
    if (rest.length === 1) {
      return this.derive(zipGrids3(this, b, c, rest[0], this.elementType));
    }
    return this.deriveAs(zipGrids3(this, b, c, rest[0], rest[1]), rest[1]);
  }

  // =============================================================================
  // Transforms
  // =============================================================================

  transpose(): Matrix<T> {
    return this.derive(transform.transpose(this));
  }

  rotate90(): Matrix<T> {
    return this.derive(transform.rotate90(this));
  }

  rotate180(): Matrix<T> {
    return this.derive(transform.rotate180(this));
  }

  rotate270(): Matrix<T> {
    return this.derive(transform.rotate270(this));
  }

  /**
   * Mirrored copy, left to right
   */
  flipH(): Matrix<T> {
    return this.derive(transform.flipH(this));
  }

  /**
   * Mirrored copy, top to bottom
   */
  flipV(): Matrix<T> {
    return this.derive(transform.flipV(this));
  }

  /**
   * Mirror this matrix left to right in place
   */
  reverseH(): void {
    transform.reverseRowsInPlace(this.data);
  }

  /**
   * Mirror this matrix top to bottom in place
   */
  reverseV(): void {
    transform.reverseColumnsInPlace(this.data, this.cols);
  }

  /**
   * Refill a new shape in row-major order. With one argument the column
   * count is given and the row count is `ceil(size / newCols)`.
   */
  reshape(...args: [newCols: number] | [newRows: number, newCols: number]): Matrix<T> {
    if (args.length === 2) {
      return this.derive(transform.reshape(this, args[0], args[1]));
    }
    const [newCols] = args;
    checkArgument(
      Number.isInteger(newCols) && newCols > 0,
      `'newCols' must be a positive integer, got ${String(newCols)}`,
      { newCols },
    );
    return this.derive(transform.reshape(this, Math.ceil(this.size / newCols), newCols));
  }

  /**
   * Resize from the origin, `extend(newRows, newCols[, defaultValue])`, or
   * grow by margins, `extend(up, down, left, right[, defaultValue])`. The
   * argument count selects the form. New cells take `defaultValue` when
   * given and the element type's zero otherwise.
   */
  extend(
    ...args:
      | [newRows: number, newCols: number]
      | [newRows: number, newCols: number, defaultValue: T]
      | [up: number, down: number, left: number, right: number]
      | [up: number, down: number, left: number, right: number, defaultValue: T]
  ): Matrix<T> {
    switch (args.length) {
      case 2:
        return this.derive(transform.extendTo(this, args[0], args[1]));
      case 3:
        return this.derive(transform.extendTo(this, args[0], args[1], { value: args[2] }));
      case 4:
        return this.extendEdges(args[0], args[1], args[2], args[3]);
      case 5:
        return this.extendEdges(args[0], args[1], args[2], args[3], { value: args[4] });
    }
  }

  private extendEdges(up: number, down: number, left: number, right: number, fill?: FillValue<T>): Matrix<T> {
    if (up === 0 && down === 0 && left === 0 && right === 0) {
      return this.copy();
    }
    return this.derive(transform.extendEdges(this, up, down, left, right, fill));
  }

  /**
   * Blow every cell up into a rowRepeats x colRepeats block
   */
  repelem(rowRepeats: number, colRepeats: number): Matrix<T> {
    return this.derive(transform.repelem(this, rowRepeats, colRepeats));
  }

  /**
   * Tile the whole matrix rowRepeats x colRepeats times
   */
  repmat(rowRepeats: number, colRepeats: number): Matrix<T> {
    return this.derive(transform.repmat(this, rowRepeats, colRepeats));
  }

  /**
   * Independent copy of the whole matrix, of rows [fromRow, toRow), or of
   * the region [fromRow, toRow) x [fromCol, toCol)
   */
  copy(
    ...args: [] | [fromRow: number, toRow: number] | [fromRow: number, toRow: number, fromCol: number, toCol: number]
  ): Matrix<T> {
    switch (args.length) {
      case 0:
        return this.derive(transform.copyAll(this));
      case 2:
        return this.derive(transform.copyRegion(this, args[0], args[1], 0, this.cols));
      case 4:
        return this.derive(transform.copyRegion(this, args[0], args[1], args[2], args[3]));
    }
  }

  /**
   * Row-major copy of every element
   */
  flatten(): T[] {
    return transform.flatten(this);
  }

  vstack(other: Matrix<T>): Matrix<T> {
    return this.derive(transform.vstack(this, other));
  }

  hstack(other: Matrix<T>): Matrix<T> {
    return this.derive(transform.hstack(this, other));
  }

  // =============================================================================
  // Traversal
  // =============================================================================

  /**
   * Row-major values of all rows, of one row, or of rows [fromRow, toRow)
   */
  streamH(...args: [] | [row: number] | [fromRow: number, toRow: number]): IndexedSequence<T> {
    const [from, to] = this.rowRange(args);
    return traversal.streamH(this, from, to);
  }

  /**
   * Column-major values of all columns, of one column, or of columns
   * [fromCol, toCol)
   */
  streamV(...args: [] | [col: number] | [fromCol: number, toCol: number]): IndexedSequence<T> {
    const [from, to] = this.colRange(args);
    return traversal.streamV(this, from, to);
  }

  streamLU2RD(): IndexedSequence<T> {
    return traversal.streamDiagonal(this, 'LU2RD');
  }

  streamRU2LD(): IndexedSequence<T> {
    return traversal.streamDiagonal(this, 'RU2LD');
  }

  /**
   * One lazy sequence per row
   */
  streamR(...args: [] | [fromRow: number, toRow: number]): IndexedSequence<IndexedSequence<T>> {
    return args.length === 0 ? traversal.streamRows(this) : traversal.streamRows(this, args[0], args[1]);
  }

  /**
   * One lazy sequence per column
   */
  streamC(...args: [] | [fromCol: number, toCol: number]): IndexedSequence<IndexedSequence<T>> {
    return args.length === 0 ? traversal.streamColumns(this) : traversal.streamColumns(this, args[0], args[1]);
  }

  pointsH(...args: [] | [row: number] | [fromRow: number, toRow: number]): IndexedSequence<Position> {
    const [from, to] = this.rowRange(args);
    return traversal.pointsH(this, from, to);
  }

  pointsV(...args: [] | [col: number] | [fromCol: number, toCol: number]): IndexedSequence<Position> {
    const [from, to] = this.colRange(args);
    return traversal.pointsV(this, from, to);
  }

  pointsLU2RD(): IndexedSequence<Position> {
    return traversal.pointsDiagonal(this, 'LU2RD');
  }

  pointsRU2LD(): IndexedSequence<Position> {
    return traversal.pointsDiagonal(this, 'RU2LD');
  }

  pointsR(...args: [] | [fromRow: number, toRow: number]): IndexedSequence<IndexedSequence<Position>> {
    return args.length === 0 ? traversal.pointsRows(this) : traversal.pointsRows(this, args[0], args[1]);
  }

  pointsC(...args: [] | [fromCol: number, toCol: number]): IndexedSequence<IndexedSequence<Position>> {
    return args.length === 0 ? traversal.pointsColumns(this) : traversal.pointsColumns(this, args[0], args[1]);
  }

  private rowRange(args: [] | [number] | [number, number]): [number, number] {
    switch (args.length) {
      case 0:
        return [0, this.rows];
      case 1:
        checkIndex(args[0], this.rows, 'Row index');
        return [args[0], args[0] + 1];
      case 2:
        return args;
    }
  }

  private colRange(args: [] | [number] | [number, number]): [number, number] {
    switch (args.length) {
      case 0:
        return [0, this.cols];
      case 1:
        checkIndex(args[0], this.cols, 'Column index');
        return [args[0], args[0] + 1];
      case 2:
        return args;
    }
  }

  // =============================================================================
  // Conversion and comparison
  // =============================================================================

  /**
   * Table whose columns are this matrix's columns, named by `columnNames`
   *
   * @throws {ShapeError} unless there is exactly one name per column
   */
  toRowOrientedTable(columnNames: readonly string[]): Table<T> {
    return toRowOrientedTable(this.data, this.cols, columnNames);
  }

  /**
   * Table whose columns are this matrix's rows, named by `rowNames`
   *
   * @throws {ShapeError} unless there is exactly one name per row
   */
  toColumnOrientedTable(rowNames: readonly string[]): Table<T> {
    return toColumnOrientedTable(this.data, rowNames);
  }

  /**
   * Deep copy of the storage as plain nested arrays
   */
  toArray(): T[][] {
    return this.data.map((r) => r.slice());
  }

  isSameShape(other: GridSource<unknown>): boolean {
    return sameShape(this, other);
  }

  /**
   * Same shape and every pair of cells identical (NaN equals NaN)
   */
  equals(other: Matrix<unknown>): boolean {
    if (!this.isSameShape(other)) {
      return false;
    }
    const b = other.array();
    for (let i = 0; i < this.rows; i++) {
      const x = this.data[i];
      const y = b[i];
      for (let j = 0; j < this.cols; j++) {
        if (!Object.is(x[j], y[j]) && x[j] !== y[j]) {
          return false;
        }
      }
    }
    return true;
  }

  toString(): string {
    return `Matrix(shape=${formatShape(this.shape)}, elementType=${this.elementType.name})`;
  }
}
