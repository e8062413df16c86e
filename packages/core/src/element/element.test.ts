/**
 * Tests for element types and storage allocation
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, ShapeError } from '../errors';
import {
  bigintType,
  booleanType,
  builtinTypeOf,
  elementType,
  nullable,
  numberType,
  stringType,
} from './constants';
import { allocFilled, denseArrayFactory, rectangularDims } from './factory';

describe('element types', () => {
  it('should provide zero values for the built-ins', () => {
    expect(numberType.zero).toBe(0);
    expect(stringType.zero).toBe('');
    expect(booleanType.zero).toBe(false);
    expect(bigintType.zero).toBe(0n);
  });

  it('should recognise values of the built-ins', () => {
    expect(numberType.isValidValue(1.5)).toBe(true);
    expect(numberType.isValidValue('1.5')).toBe(false);
    expect(stringType.isValidValue('a')).toBe(true);
    expect(booleanType.isValidValue(0)).toBe(false);
    expect(bigintType.isValidValue(3n)).toBe(true);
  });

  it('should freeze the built-ins', () => {
    expect(Object.isFrozen(numberType)).toBe(true);
  });

  it('should build custom element types', () => {
    const point = elementType('point', { x: 0, y: 0 }, (value): value is { x: number; y: number } =>
      typeof value === 'object' && value !== null && 'x' in value && 'y' in value,
    );
    expect(point.name).toBe('point');
    expect(point.zero).toEqual({ x: 0, y: 0 });
    expect(point.isValidValue({ x: 1, y: 2 })).toBe(true);
    expect(point.isValidValue(7)).toBe(false);

    const anything = elementType<unknown>('anything', undefined);
    expect(anything.isValidValue(Symbol('s'))).toBe(true);
  });

  it('should widen with null', () => {
    const maybeString = nullable(stringType);
    expect(maybeString.name).toBe('string | null');
    expect(maybeString.zero).toBeNull();
    expect(maybeString.isValidValue(null)).toBe(true);
    expect(maybeString.isValidValue('a')).toBe(true);
    expect(maybeString.isValidValue(1)).toBe(false);
  });

  it('should pick built-ins from sample values', () => {
    expect(builtinTypeOf(1)).toBe(numberType);
    expect(builtinTypeOf('a')).toBe(stringType);
    expect(builtinTypeOf(true)).toBe(booleanType);
    expect(builtinTypeOf(1n)).toBe(bigintType);
    expect(builtinTypeOf({})).toBeUndefined();
  });
});

describe('denseArrayFactory', () => {
  it('should allocate zero-filled independent rows', () => {
    const storage = denseArrayFactory.alloc(numberType, 2, 3);
    expect(storage).toEqual([
      [0, 0, 0],
      [0, 0, 0],
    ]);
    storage[0][0] = 9;
    expect(storage[1][0]).toBe(0);
  });

  it('should use the element type zero', () => {
    expect(denseArrayFactory.alloc(nullable(stringType), 1, 2)).toEqual([[null, null]]);
  });

  it('should allow empty dimensions', () => {
    expect(denseArrayFactory.alloc(numberType, 0, 3)).toEqual([]);
    expect(denseArrayFactory.alloc(numberType, 2, 0)).toEqual([[], []]);
  });

  it('should reject negative dimensions', () => {
    expect(() => denseArrayFactory.alloc(numberType, -1, 2)).toThrow(InvalidArgumentError);
  });

  it('should fill with a given value', () => {
    expect(allocFilled(denseArrayFactory, stringType, 2, 2, 'x')).toEqual([
      ['x', 'x'],
      ['x', 'x'],
    ]);
  });
});

describe('rectangularDims', () => {
  it('should measure rectangular data', () => {
    expect(rectangularDims([])).toEqual([0, 0]);
    expect(rectangularDims([[], []])).toEqual([2, 0]);
    expect(rectangularDims([[1, 2, 3]])).toEqual([1, 3]);
  });

  it('should reject ragged data', () => {
    expect(() => rectangularDims([[1, 2], [3]])).toThrow(ShapeError);
    expect(() => rectangularDims([[1, 2], [3]])).toThrow('Row 1 has 1 elements, expected 2');
  });
});
