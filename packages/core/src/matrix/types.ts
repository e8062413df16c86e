/**
 * Types shared by the matrix engines
 */

import type { ArrayFactory, ElementType, Storage } from '../element/types';

/**
 * Read side of a matrix the engines work from. `array()` is the live
 * storage; engines never write to it unless the operation is in place.
 */
export interface GridSource<T> {
  readonly rows: number;
  readonly cols: number;
  readonly elementType: ElementType<T>;
  readonly arrayFactory: ArrayFactory;
  array(): Storage<T>;
}

/**
 * An explicitly supplied fill value. Absent means "leave the zero value",
 * which stays distinguishable from a fill of `undefined`.
 */
export interface FillValue<T> {
  readonly value: T;
}

export type DiagonalKind = 'LU2RD' | 'RU2LD';

/**
 * Result of a neighbour lookup
 */
export type Neighbor<T> = { readonly present: true; readonly value: T } | { readonly present: false };

/**
 * Options accepted by the construction functions
 */
export interface MatrixOptions<T> {
  elementType: ElementType<T>;
  arrayFactory?: ArrayFactory;
}
