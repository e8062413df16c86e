/**
 * Type tests for the Matrix API
 *
 * These tests check at compile time that element types flow through
 * construction, mapping, combination and traversal.
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import { nullable, stringType } from '../element/constants';
import type { ElementOf, ElementType } from '../element/types';
import type { IndexedSequence } from '../sequence/lazy-sequence';
import type { Position } from '../shape/position';
import { zip, zipAll, zipAllWith } from './combine';
import { diagonalFrom, fromRectangular, full, repeatSingleRow, zeros } from './creation';
import type { Matrix } from './matrix';
import type { Neighbor } from './types';

declare const numbers: Matrix<number>;
declare const strings: Matrix<string>;

// =============================================================================
// Construction
// =============================================================================

describe('construction types', () => {
  it('should default to number matrices', () => {
    expectTypeOf(fromRectangular([[1, 2]])).toEqualTypeOf<Matrix<number>>();
    expectTypeOf(zeros(2, 2)).toEqualTypeOf<Matrix<number>>();
    expectTypeOf(diagonalFrom([1, 2], null)).toEqualTypeOf<Matrix<number>>();
  });

  it('should infer built-in element types', () => {
    expectTypeOf(fromRectangular([['a', 'b']])).toEqualTypeOf<Matrix<string>>();
    expectTypeOf(fromRectangular([[true]])).toEqualTypeOf<Matrix<boolean>>();
    expectTypeOf(repeatSingleRow('x', 3)).toEqualTypeOf<Matrix<string>>();
    expectTypeOf(full(1, 1, 1n)).toEqualTypeOf<Matrix<bigint>>();
    expectTypeOf(diagonalFrom(['a'], null)).toEqualTypeOf<Matrix<string>>();
  });

  it('should follow the element type option', () => {
    expectTypeOf(fromRectangular([['a']], { elementType: stringType })).toEqualTypeOf<Matrix<string>>();
    expectTypeOf(zeros(1, 1, { elementType: nullable(stringType) })).toEqualTypeOf<Matrix<string | null>>();
    expectTypeOf(full(1, 1, 'x', { elementType: stringType })).toEqualTypeOf<Matrix<string>>();
  });

  it('should extract element types', () => {
    expectTypeOf<ElementOf<typeof stringType>>().toEqualTypeOf<string>();
    expectTypeOf<ElementOf<ElementType<bigint>>>().toEqualTypeOf<bigint>();
  });
});

// =============================================================================
// Element-wise operations
// =============================================================================

describe('element-wise types', () => {
  it('should keep the element type when mapping without a new one', () => {
    expectTypeOf(numbers.map((v) => v + 1)).toEqualTypeOf<Matrix<number>>();
    expectTypeOf(numbers.map((v) => String(v), stringType)).toEqualTypeOf<Matrix<string>>();
  });

  it('should type zip results', () => {
    expectTypeOf(numbers.zipWith(strings, (n, s) => n + s.length)).toEqualTypeOf<Matrix<number>>();
    expectTypeOf(numbers.zipWith(strings, (n, s) => s + String(n), stringType)).toEqualTypeOf<Matrix<string>>();
    expectTypeOf(zip(strings, numbers, (s) => s)).toEqualTypeOf<Matrix<string>>();
    expectTypeOf(zipAll([numbers, numbers], (x, y) => x + y)).toEqualTypeOf<Matrix<number>>();
    expectTypeOf(zipAllWith([numbers], (values) => values.join(','), stringType)).toEqualTypeOf<Matrix<string>>();
  });
});

// =============================================================================
// Access and traversal
// =============================================================================

describe('access types', () => {
  it('should type rows, columns and neighbours', () => {
    expectTypeOf(strings.row(0)).toEqualTypeOf<string[]>();
    expectTypeOf(strings.column(0)).toEqualTypeOf<string[]>();
    expectTypeOf(strings.upOf(1, 1)).toEqualTypeOf<Neighbor<string>>();
    expectTypeOf(strings.adjacent4Points(0, 0)).toEqualTypeOf<(Position | null)[]>();
  });

  it('should type traversals', () => {
    expectTypeOf(strings.streamH()).toEqualTypeOf<IndexedSequence<string>>();
    expectTypeOf(strings.streamR()).toEqualTypeOf<IndexedSequence<IndexedSequence<string>>>();
    expectTypeOf(strings.pointsV(0)).toEqualTypeOf<IndexedSequence<Position>>();
  });

  it('should narrow neighbours on presence', () => {
    const neighbor = numbers.leftOf(0, 1);
    if (neighbor.present) {
      expectTypeOf(neighbor.value).toEqualTypeOf<number>();
    }
  });
});
