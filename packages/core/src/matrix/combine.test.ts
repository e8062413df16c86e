/**
 * Tests for element-wise combination
 */

import { describe, it, expect } from 'vitest';
import { booleanType, numberType, stringType } from '../element/constants';
import { InvalidArgumentError, ShapeError } from '../errors';
import { isSameShape, zip, zip3, zipAll, zipAllWith } from './combine';
import { fromRectangular } from './creation';
import type { Matrix } from './matrix';

const a = (): Matrix<number> =>
  fromRectangular([
    [1, 2],
    [3, 4],
  ]);
const b = (): Matrix<number> =>
  fromRectangular([
    [10, 20],
    [30, 40],
  ]);
const c = (): Matrix<number> =>
  fromRectangular([
    [100, 200],
    [300, 400],
  ]);

describe('zipWith', () => {
  it('should combine cell by cell', () => {
    expect(a().zipWith(b(), (x, y) => x + y).toArray()).toEqual([
      [11, 22],
      [33, 44],
    ]);
  });

  it('should produce another element type', () => {
    const labelled = a().zipWith(b(), (x, y) => `${x.toString()}/${y.toString()}`, stringType);
    expect(labelled.elementType).toBe(stringType);
    expect(labelled.toArray()).toEqual([
      ['1/10', '2/20'],
      ['3/30', '4/40'],
    ]);
  });

  it('should refuse different shapes instead of truncating', () => {
    expect(() => a().zipWith(fromRectangular([[1, 2, 3]]), (x, y) => x + y)).toThrow(ShapeError);
    expect(() => a().zipWith(fromRectangular([[1, 2, 3]]), (x, y) => x + y)).toThrow(
      'Shape mismatch: [2, 2] vs [1, 3]',
    );
  });

  it('should leave the inputs alone', () => {
    const x = a();
    const y = b();
    x.zipWith(y, (p, q) => p * q);
    expect(x.toArray()).toEqual(a().toArray());
    expect(y.toArray()).toEqual(b().toArray());
  });

  it('should combine three matrices', () => {
    expect(a().zipWith3(b(), c(), (x, y, z) => x + y + z).toArray()).toEqual([
      [111, 222],
      [333, 444],
    ]);
    expect(() => a().zipWith3(b(), fromRectangular([[1]]), (x) => x)).toThrow(ShapeError);
  });
});

describe('module-level combination', () => {
  it('should zip two and three matrices', () => {
    expect(zip(a(), b(), (x, y) => y - x).toArray()).toEqual([
      [9, 18],
      [27, 36],
    ]);
    expect(zip(a(), b(), (x, y) => x < y, booleanType).get(0, 0)).toBe(true);
    expect(zip3(a(), b(), c(), (x, y, z) => z - y - x, numberType).toArray()).toEqual([
      [89, 178],
      [267, 356],
    ]);
  });

  it('should fold any number of matrices', () => {
    expect(zipAll([a(), b(), c()], (acc, v) => acc + v).toArray()).toEqual([
      [111, 222],
      [333, 444],
    ]);
  });

  it('should copy a single matrix', () => {
    const only = a();
    const result = zipAll([only], (acc, v) => acc + v);
    expect(result.equals(only)).toBe(true);
    expect(result.array()).not.toBe(only.array());
  });

  it('should hand all cell values to an N-ary function', () => {
    const result = zipAllWith([a(), b(), c()], (values) => values.join('+'), stringType);
    expect(result.toArray()).toEqual([
      ['1+10+100', '2+20+200'],
      ['3+30+300', '4+40+400'],
    ]);
  });

  it('should require at least one matrix of one shape', () => {
    expect(() => zipAll([], (acc: number, v: number) => acc + v)).toThrow(InvalidArgumentError);
    expect(() => zipAllWith([], () => 0, numberType)).toThrow('At least one matrix is required');
    expect(() => zipAll([a(), fromRectangular([[1, 2]])], (acc, v) => acc + v)).toThrow(ShapeError);
  });

  it('should compare shapes of any number of matrices', () => {
    expect(isSameShape(a(), b(), c())).toBe(true);
    expect(isSameShape(a(), fromRectangular([[1, 2]]))).toBe(false);
    expect(isSameShape()).toBe(true);
  });
});
