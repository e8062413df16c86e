/**
 * Lazy traversals
 *
 * Each function returns a fresh sequence reading the live storage at pull
 * time. Element k of a traversal is computed directly from k, so `skip` and
 * `remainingCount` are constant time for every order.
 */

import { checkFromToIndex, NonSquareMatrixError } from '../errors';
import { IndexedSequence } from '../sequence/lazy-sequence';
import { Position } from '../shape/position';
import type { DiagonalKind, GridSource } from './types';

// =============================================================================
// Values
// =============================================================================

/**
 * Row-major over rows [fromRow, toRow)
 */
export function streamH<T>(src: GridSource<T>, fromRow = 0, toRow = src.rows): IndexedSequence<T> {
  checkFromToIndex(fromRow, toRow, src.rows);
  const a = src.array();
  const cols = src.cols;
  return new IndexedSequence((toRow - fromRow) * cols, (k) => a[fromRow + Math.floor(k / cols)][k % cols]);
}

/**
 * Column-major over columns [fromCol, toCol)
 */
export function streamV<T>(src: GridSource<T>, fromCol = 0, toCol = src.cols): IndexedSequence<T> {
  checkFromToIndex(fromCol, toCol, src.cols);
  const a = src.array();
  const rows = src.rows;
  return new IndexedSequence((toCol - fromCol) * rows, (k) => a[k % rows][fromCol + Math.floor(k / rows)]);
}

export function streamDiagonal<T>(src: GridSource<T>, kind: DiagonalKind): IndexedSequence<T> {
  checkSquare(src, kind);
  const a = src.array();
  const last = src.cols - 1;
  return kind === 'LU2RD'
    ? new IndexedSequence(src.rows, (k) => a[k][k])
    : new IndexedSequence(src.rows, (k) => a[k][last - k]);
}

/**
 * One inner sequence per row in [fromRow, toRow); each inner sequence is
 * created when it is pulled
 */
export function streamRows<T>(
  src: GridSource<T>,
  fromRow = 0,
  toRow = src.rows,
): IndexedSequence<IndexedSequence<T>> {
  checkFromToIndex(fromRow, toRow, src.rows);
  return new IndexedSequence(toRow - fromRow, (k) => streamH(src, fromRow + k, fromRow + k + 1));
}

export function streamColumns<T>(
  src: GridSource<T>,
  fromCol = 0,
  toCol = src.cols,
): IndexedSequence<IndexedSequence<T>> {
  checkFromToIndex(fromCol, toCol, src.cols);
  return new IndexedSequence(toCol - fromCol, (k) => streamV(src, fromCol + k, fromCol + k + 1));
}

// =============================================================================
// Positions
// =============================================================================

export function pointsH(src: GridSource<unknown>, fromRow = 0, toRow = src.rows): IndexedSequence<Position> {
  checkFromToIndex(fromRow, toRow, src.rows);
  const cols = src.cols;
  return new IndexedSequence((toRow - fromRow) * cols, (k) => Position.of(fromRow + Math.floor(k / cols), k % cols));
}

export function pointsV(src: GridSource<unknown>, fromCol = 0, toCol = src.cols): IndexedSequence<Position> {
  checkFromToIndex(fromCol, toCol, src.cols);
  const rows = src.rows;
  return new IndexedSequence((toCol - fromCol) * rows, (k) => Position.of(k % rows, fromCol + Math.floor(k / rows)));
}

export function pointsDiagonal(src: GridSource<unknown>, kind: DiagonalKind): IndexedSequence<Position> {
  checkSquare(src, kind);
  const last = src.cols - 1;
  return kind === 'LU2RD'
    ? new IndexedSequence(src.rows, (k) => Position.of(k, k))
    : new IndexedSequence(src.rows, (k) => Position.of(k, last - k));
}

export function pointsRows(
  src: GridSource<unknown>,
  fromRow = 0,
  toRow = src.rows,
): IndexedSequence<IndexedSequence<Position>> {
  checkFromToIndex(fromRow, toRow, src.rows);
  return new IndexedSequence(toRow - fromRow, (k) => pointsH(src, fromRow + k, fromRow + k + 1));
}

export function pointsColumns(
  src: GridSource<unknown>,
  fromCol = 0,
  toCol = src.cols,
): IndexedSequence<IndexedSequence<Position>> {
  checkFromToIndex(fromCol, toCol, src.cols);
  return new IndexedSequence(toCol - fromCol, (k) => pointsV(src, fromCol + k, fromCol + k + 1));
}

function checkSquare(src: GridSource<unknown>, kind: DiagonalKind): void {
  if (src.rows !== src.cols) {
    throw new NonSquareMatrixError(`traverse the ${kind} diagonal`, src.rows, src.cols);
  }
}
