/**
 * Structural transforms
 *
 * Pure index remappings: every function reads a grid and returns freshly
 * allocated storage, except the `*InPlace` functions, which mutate the
 * storage they are given. Index mappings are given in terms of the input
 * grid `in` of shape (rows, cols) and the output grid `out`.
 */

import type { Storage } from '../element/types';
import { checkFromToIndex, checkNonNegative, checkArgument, checkShape } from '../errors';
import type { FillValue, GridSource } from './types';

function alloc<T>(src: GridSource<T>, rows: number, cols: number): Storage<T> {
  return src.arrayFactory.alloc(src.elementType, rows, cols);
}

/**
 * Fresh copy of the whole grid
 */
export function copyAll<T>(src: GridSource<T>): Storage<T> {
  const a = src.array();
  const c = alloc(src, src.rows, src.cols);
  for (let i = 0; i < src.rows; i++) {
    copyInto(a[i], 0, c[i], 0, src.cols);
  }
  return c;
}

function copyInto<T>(from: readonly T[], fromIndex: number, to: T[], toIndex: number, length: number): void {
  for (let k = 0; k < length; k++) {
    to[toIndex + k] = from[fromIndex + k];
  }
}

/**
 * Half-open sub-grid [fromRow, toRow) x [fromCol, toCol)
 */
export function copyRegion<T>(
  src: GridSource<T>,
  fromRow: number,
  toRow: number,
  fromCol: number,
  toCol: number,
): Storage<T> {
  checkFromToIndex(fromRow, toRow, src.rows);
  checkFromToIndex(fromCol, toCol, src.cols);

  const a = src.array();
  const c = alloc(src, toRow - fromRow, toCol - fromCol);
  for (let i = fromRow; i < toRow; i++) {
    copyInto(a[i], fromCol, c[i - fromRow], 0, toCol - fromCol);
  }
  return c;
}

/**
 * out[i][j] = in[j][i], shape (cols, rows)
 */
export function transpose<T>(src: GridSource<T>): Storage<T> {
  const { rows, cols } = src;
  const a = src.array();
  const c = alloc(src, cols, rows);

  for (let i = 0; i < cols; i++) {
    const out = c[i];
    for (let j = 0; j < rows; j++) {
      out[j] = a[j][i];
    }
  }
  return c;
}

/**
 * Clockwise quarter turn: out[i][j] = in[rows - 1 - j][i], shape (cols, rows)
 */
export function rotate90<T>(src: GridSource<T>): Storage<T> {
  const { rows, cols } = src;
  const a = src.array();
  const c = alloc(src, cols, rows);

  for (let i = 0; i < cols; i++) {
    const out = c[i];
    for (let j = 0; j < rows; j++) {
      out[j] = a[rows - 1 - j][i];
    }
  }
  return c;
}

/**
 * Half turn: out[i][j] = in[rows - 1 - i][cols - 1 - j]
 */
export function rotate180<T>(src: GridSource<T>): Storage<T> {
  const { rows, cols } = src;
  const a = src.array();
  const c = alloc(src, rows, cols);

  for (let i = 0; i < rows; i++) {
    copyInto(a[rows - 1 - i], 0, c[i], 0, cols);
    c[i].reverse();
  }
  return c;
}

/**
 * Three clockwise quarter turns: out[i][j] = in[j][cols - 1 - i], shape (cols, rows)
 */
export function rotate270<T>(src: GridSource<T>): Storage<T> {
  const { rows, cols } = src;
  const a = src.array();
  const c = alloc(src, cols, rows);

  for (let i = 0; i < cols; i++) {
    const out = c[i];
    for (let j = 0; j < rows; j++) {
      out[j] = a[j][cols - 1 - i];
    }
  }
  return c;
}

/**
 * Mirror left-right by reversing every row in place
 */
export function reverseRowsInPlace<T>(storage: Storage<T>): void {
  for (const row of storage) {
    row.reverse();
  }
}

/**
 * Mirror top-bottom in place, swapping down each column from both ends inward
 */
export function reverseColumnsInPlace<T>(storage: Storage<T>, cols: number): void {
  const rows = storage.length;
  for (let j = 0; j < cols; j++) {
    for (let lo = 0, hi = rows - 1; lo < hi; lo++, hi--) {
      const tmp = storage[lo][j];
      storage[lo][j] = storage[hi][j];
      storage[hi][j] = tmp;
    }
  }
}

export function flipH<T>(src: GridSource<T>): Storage<T> {
  const c = copyAll(src);
  reverseRowsInPlace(c);
  return c;
}

export function flipV<T>(src: GridSource<T>): Storage<T> {
  const c = copyAll(src);
  reverseColumnsInPlace(c, src.cols);
  return c;
}

/**
 * Number of output rows that receive at least one source element
 */
function filledRowCount(count: number, newRows: number, newCols: number): number {
  return Math.min(newRows, Math.ceil(count / newCols));
}

/**
 * Row-major refill from a single source row (direct slice copies)
 */
export function reshapeFromSingleRow<T>(
  row: readonly T[],
  target: Storage<T>,
  newRows: number,
  newCols: number,
): void {
  const count = row.length;
  for (let i = 0, len = filledRowCount(count, newRows, newCols); i < len; i++) {
    copyInto(row, i * newCols, target[i], 0, Math.min(newCols, count - i * newCols));
  }
}

/**
 * Row-major refill from any number of source rows (per-cell index mapping)
 */
export function reshapeFromRows<T>(
  a: Storage<T>,
  cols: number,
  target: Storage<T>,
  newRows: number,
  newCols: number,
): void {
  const count = a.length * cols;
  let cnt = 0;
  for (let i = 0, len = filledRowCount(count, newRows, newCols); i < len; i++) {
    const out = target[i];
    for (let j = 0, width = Math.min(newCols, count - i * newCols); j < width; j++, cnt++) {
      out[j] = a[Math.floor(cnt / cols)][cnt % cols];
    }
  }
}

/**
 * Flatten row-major and refill a newRows x newCols grid row-major. Cells
 * past the source element count keep the zero value; source elements past
 * the new size are dropped.
 */
export function reshape<T>(src: GridSource<T>, newRows: number, newCols: number): Storage<T> {
  checkNonNegative(newRows, 'newRows');
  checkNonNegative(newCols, 'newCols');

  const c = alloc(src, newRows, newCols);
  if (newRows === 0 || newCols === 0 || src.rows * src.cols === 0) {
    return c;
  }

  const a = src.array();
  if (src.rows === 1) {
    reshapeFromSingleRow(a[0], c, newRows, newCols);
  } else {
    reshapeFromRows(a, src.cols, c, newRows, newCols);
  }
  return c;
}

/**
 * Resize from the origin. Shrinking in both dimensions is a sub-copy;
 * otherwise the overlap is copied and, when a fill is given, every cell
 * outside the original footprint receives it.
 */
export function extendTo<T>(
  src: GridSource<T>,
  newRows: number,
  newCols: number,
  fill?: FillValue<T>,
): Storage<T> {
  checkNonNegative(newRows, 'newRows');
  checkNonNegative(newCols, 'newCols');

  const { rows, cols } = src;
  if (newRows <= rows && newCols <= cols) {
    return copyRegion(src, 0, newRows, 0, newCols);
  }

  const a = src.array();
  const c = alloc(src, newRows, newCols);
  const overlap = Math.min(cols, newCols);

  for (let i = 0; i < newRows; i++) {
    if (i < rows) {
      copyInto(a[i], 0, c[i], 0, overlap);
      if (fill && cols < newCols) {
        c[i].fill(fill.value, cols, newCols);
      }
    } else if (fill) {
      c[i].fill(fill.value);
    }
  }
  return c;
}

/**
 * Grow by margins: the original sits at offset (up, left) in a grid of
 * (rows + up + down) x (cols + left + right); margins receive the fill
 */
export function extendEdges<T>(
  src: GridSource<T>,
  up: number,
  down: number,
  left: number,
  right: number,
  fill?: FillValue<T>,
): Storage<T> {
  checkNonNegative(up, 'up');
  checkNonNegative(down, 'down');
  checkNonNegative(left, 'left');
  checkNonNegative(right, 'right');

  const { rows, cols } = src;
  const a = src.array();
  const newRows = up + rows + down;
  const newCols = left + cols + right;
  const c = alloc(src, newRows, newCols);

  for (let i = 0; i < newRows; i++) {
    const out = c[i];
    if (i >= up && i < up + rows) {
      copyInto(a[i - up], 0, out, left, cols);
      if (fill) {
        out.fill(fill.value, 0, left);
        out.fill(fill.value, left + cols, newCols);
      }
    } else if (fill) {
      out.fill(fill.value);
    }
  }
  return c;
}

/**
 * Expand every cell into a rowRepeats x colRepeats block of its value
 */
export function repelem<T>(src: GridSource<T>, rowRepeats: number, colRepeats: number): Storage<T> {
  checkRepeats(rowRepeats, colRepeats);

  const { rows, cols } = src;
  const a = src.array();
  const c = alloc(src, rows * rowRepeats, cols * colRepeats);

  for (let i = 0; i < rows; i++) {
    const first = c[i * rowRepeats];
    for (let j = 0; j < cols; j++) {
      first.fill(a[i][j], j * colRepeats, (j + 1) * colRepeats);
    }
    for (let k = 1; k < rowRepeats; k++) {
      copyInto(first, 0, c[i * rowRepeats + k], 0, first.length);
    }
  }
  return c;
}

/**
 * Tile the whole grid rowRepeats times down and colRepeats times across
 */
export function repmat<T>(src: GridSource<T>, rowRepeats: number, colRepeats: number): Storage<T> {
  checkRepeats(rowRepeats, colRepeats);

  const { rows, cols } = src;
  const a = src.array();
  const c = alloc(src, rows * rowRepeats, cols * colRepeats);

  for (let i = 0; i < rows; i++) {
    for (let k = 0; k < colRepeats; k++) {
      copyInto(a[i], 0, c[i], k * cols, cols);
    }
  }
  for (let k = 1; k < rowRepeats; k++) {
    for (let i = 0; i < rows; i++) {
      copyInto(c[i], 0, c[k * rows + i], 0, cols * colRepeats);
    }
  }
  return c;
}

function checkRepeats(rowRepeats: number, colRepeats: number): void {
  checkArgument(
    Number.isInteger(rowRepeats) && Number.isInteger(colRepeats) && rowRepeats > 0 && colRepeats > 0,
    `rowRepeats=${String(rowRepeats)} and colRepeats=${String(colRepeats)} must be positive integers`,
    { rowRepeats, colRepeats },
  );
}

/**
 * Row-major linearization into a new array
 */
export function flatten<T>(src: GridSource<T>): T[] {
  const { rows, cols } = src;
  const a = src.array();
  const flat = new Array<T>(rows * cols);
  for (let i = 0; i < rows; i++) {
    copyInto(a[i], 0, flat, i * cols, cols);
  }
  return flat;
}

/**
 * Rows of `top` followed by rows of `bottom`; column counts must match
 */
export function vstack<T>(top: GridSource<T>, bottom: GridSource<T>): Storage<T> {
  checkShape(top.cols === bottom.cols, 'Cannot stack vertically: column counts differ', {
    cols: top.cols,
    otherCols: bottom.cols,
  });

  const c = alloc(top, top.rows + bottom.rows, top.cols);
  const a = top.array();
  const b = bottom.array();
  for (let i = 0; i < top.rows; i++) {
    copyInto(a[i], 0, c[i], 0, top.cols);
  }
  for (let i = 0; i < bottom.rows; i++) {
    copyInto(b[i], 0, c[top.rows + i], 0, bottom.cols);
  }
  return c;
}

/**
 * Each row of `left` followed by the same row of `right`; row counts must match
 */
export function hstack<T>(left: GridSource<T>, right: GridSource<T>): Storage<T> {
  checkShape(left.rows === right.rows, 'Cannot stack horizontally: row counts differ', {
    rows: left.rows,
    otherRows: right.rows,
  });

  const c = alloc(left, left.rows, left.cols + right.cols);
  const a = left.array();
  const b = right.array();
  for (let i = 0; i < left.rows; i++) {
    copyInto(a[i], 0, c[i], 0, left.cols);
    copyInto(b[i], 0, c[i], left.cols, right.cols);
  }
  return c;
}
