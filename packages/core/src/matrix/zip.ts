/**
 * Element-wise combination of same-shape grids
 *
 * Every combination checks shapes first and fails with a ShapeError rather
 * than truncating. Output cells are computed through the cell scheduler, so
 * large grids are partitioned into disjoint bands; the inputs are only read.
 */

import type { ElementType, Storage } from '../element/types';
import { checkArgument, ShapeError } from '../errors';
import { regionOf, runCells } from '../parallel/scheduler';
import { formatShape } from '../shape/runtime';
import type { GridSource } from './types';

export function sameShape(a: GridSource<unknown>, b: GridSource<unknown>): boolean {
  return a.rows === b.rows && a.cols === b.cols;
}

export function checkSameShape(...grids: GridSource<unknown>[]): void {
  const [first, ...rest] = grids;
  for (const other of rest) {
    if (!sameShape(first, other)) {
      throw new ShapeError(
        `Shape mismatch: ${formatShape(first)} vs ${formatShape(other)}`,
        { expected: formatShape(first), actual: formatShape(other) },
      );
    }
  }
}

/**
 * out[i][j] = f(a[i][j], b[i][j])
 */
export function zipGrids<A, B, R>(
  a: GridSource<A>,
  b: GridSource<B>,
  f: (a: A, b: B) => R,
  elementType: ElementType<R>,
): Storage<R> {
  checkSameShape(a, b);

  const x = a.array();
  const y = b.array();
  const out = a.arrayFactory.alloc(elementType, a.rows, a.cols);

  runCells(regionOf(a.rows, a.cols), (i, j) => {
    out[i][j] = f(x[i][j], y[i][j]);
  });
  return out;
}

/**
 * out[i][j] = f(a[i][j], b[i][j], c[i][j])
 */
export function zipGrids3<A, B, C, R>(
  a: GridSource<A>,
  b: GridSource<B>,
  c: GridSource<C>,
  f: (a: A, b: B, c: C) => R,
  elementType: ElementType<R>,
): Storage<R> {
  checkSameShape(a, b, c);

  const x = a.array();
  const y = b.array();
  const z = c.array();
  const out = a.arrayFactory.alloc(elementType, a.rows, a.cols);

  runCells(regionOf(a.rows, a.cols), (i, j) => {
    out[i][j] = f(x[i][j], y[i][j], z[i][j]);
  });
  return out;
}

/**
 * Left fold of N grids with a binary reducer: a single grid yields a copy,
 * two grids are the same as `zipGrids(a, b, reducer)`
 */
export function foldGrids<T>(grids: readonly GridSource<T>[], reducer: (acc: T, value: T) => T): Storage<T> {
  checkArgument(grids.length > 0, 'At least one matrix is required');
  checkSameShape(...grids);

  const [first, ...rest] = grids;
  const x = first.array();
  const inputs = rest.map((g) => g.array());
  const out = first.arrayFactory.alloc(first.elementType, first.rows, first.cols);

  runCells(regionOf(first.rows, first.cols), (i, j) => {
    let acc = x[i][j];
    for (const input of inputs) {
      acc = reducer(acc, input[i][j]);
    }
    out[i][j] = acc;
  });
  return out;
}

/**
 * out[i][j] = f([g0[i][j], g1[i][j], ...]); `f` receives a fresh array per cell
 */
export function zipGridsN<T, R>(
  grids: readonly GridSource<T>[],
  f: (values: T[]) => R,
  elementType: ElementType<R>,
): Storage<R> {
  checkArgument(grids.length > 0, 'At least one matrix is required');
  checkSameShape(...grids);

  const first = grids[0];
  const inputs = grids.map((g) => g.array());
  const out = first.arrayFactory.alloc(elementType, first.rows, first.cols);

  runCells(regionOf(first.rows, first.cols), (i, j) => {
    out[i][j] = f(inputs.map((input) => input[i][j]));
  });
  return out;
}

/**
 * Hand the row-major flattening of `storage` to `op`, then write every
 * value back, so whatever `op` did to the flat array shows in the grid
 */
export function flatOperate<T>(storage: Storage<T>, cols: number, op: (flat: T[]) => void): void {
  const size = storage.length * cols;
  const flat = new Array<T>(size);
  for (let k = 0; k < size; k++) {
    flat[k] = storage[Math.floor(k / cols)][k % cols];
  }

  op(flat);

  if (flat.length !== size) {
    throw new ShapeError(
      `Flat operation changed the element count from ${size.toString()} to ${flat.length.toString()}`,
      { expected: size, actual: flat.length },
    );
  }
  for (let k = 0; k < flat.length; k++) {
    storage[Math.floor(k / cols)][k % cols] = flat[k];
  }
}
