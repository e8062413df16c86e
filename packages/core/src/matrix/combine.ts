/**
 * Combining several matrices
 */

import type { ElementType } from '../element/types';
import { checkArgument } from '../errors';
import { Matrix } from './matrix';
import type { GridSource } from './types';
import { foldGrids, sameShape, zipGridsN } from './zip';

/**
 * `a.zipWith(b, f[, elementType])` as a function
 */
export function zip<A, B>(a: Matrix<A>, b: Matrix<B>, f: (a: A, b: B) => A): Matrix<A>;
export function zip<A, B, R>(a: Matrix<A>, b: Matrix<B>, f: (a: A, b: B) => R, elementType: ElementType<R>): Matrix<R>;
export function zip<A, B, R>(
  a: Matrix<A>,
  b: Matrix<B>,
  ...rest: [f: (a: A, b: B) => A] | [f: (a: A, b: B) => R, elementType: ElementType<R>]
): Matrix<A> | Matrix<R> {
  return rest.length === 1 ? a.zipWith(b, rest[0]) : a.zipWith(b, rest[0], rest[1]);
}

export function zip3<A, B, C>(a: Matrix<A>, b: Matrix<B>, c: Matrix<C>, f: (a: A, b: B, c: C) => A): Matrix<A>;
export function zip3<A, B, C, R>(
  a: Matrix<A>,
  b: Matrix<B>,
  c: Matrix<C>,
  f: (a: A, b: B, c: C) => R,
  elementType: ElementType<R>,
): Matrix<R>;
export function zip3<A, B, C, R>(
  a: Matrix<A>,
  b: Matrix<B>,
  c: Matrix<C>,
  ...rest: [f: (a: A, b: B, c: C) => A] | [f: (a: A, b: B, c: C) => R, elementType: ElementType<R>]
): Matrix<A> | Matrix<R> {
  return rest.length === 1 ? a.zipWith3(b, c, rest[0]) : a.zipWith3(b, c, rest[0], rest[1]);
}

/**
 * Fold same-shape matrices cell by cell with a binary reducer. One matrix
 * yields a copy of it.
 *
 * @example
 * const total = zipAll([a, b, c], (x, y) => x + y);
 */
export function zipAll<T>(matrices: readonly Matrix<T>[], reducer: (acc: T, value: T) => T): Matrix<T> {
  checkArgument(matrices.length > 0, 'At least one matrix is required');
  const first = matrices[0];
  return new Matrix(foldGrids(matrices, reducer), first.elementType, first.arrayFactory);
}

/**
 * Combine same-shape matrices cell by cell; `f` receives the cell's values
 * in matrix order
 */
export function zipAllWith<T, R>(
  matrices: readonly Matrix<T>[],
  f: (values: T[]) => R,
  elementType: ElementType<R>,
): Matrix<R> {
  checkArgument(matrices.length > 0, 'At least one matrix is required');
  return new Matrix(zipGridsN(matrices, f, elementType), elementType, matrices[0].arrayFactory);
}

/**
 * True when every argument has the same shape (vacuously for fewer than two)
 */
export function isSameShape(...matrices: GridSource<unknown>[]): boolean {
  return matrices.every((m) => sameShape(matrices[0], m));
}
