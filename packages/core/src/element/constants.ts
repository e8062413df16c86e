/**
 * Built-in element types
 */

import type { ElementType } from './types';

export const numberType: ElementType<number> = Object.freeze({
  name: 'number',
  zero: 0,
  isValidValue: (value: unknown): value is number => typeof value === 'number',
});

export const stringType: ElementType<string> = Object.freeze({
  name: 'string',
  zero: '',
  isValidValue: (value: unknown): value is string => typeof value === 'string',
});

export const booleanType: ElementType<boolean> = Object.freeze({
  name: 'boolean',
  zero: false,
  isValidValue: (value: unknown): value is boolean => typeof value === 'boolean',
});

export const bigintType: ElementType<bigint> = Object.freeze({
  name: 'bigint',
  zero: 0n,
  isValidValue: (value: unknown): value is bigint => typeof value === 'bigint',
});

/**
 * Define an element type for any other `T`
 *
 * Without a guard every value is accepted; `isValidValue` is then only as
 * strong as the compile-time `T`.
 *
 * @example
 * const point = elementType<{ x: number; y: number }>('point', { x: 0, y: 0 });
 */
export function elementType<T>(
  name: string,
  zero: T,
  guard?: (value: unknown) => value is T,
): ElementType<T> {
  return Object.freeze({
    name,
    zero,
    isValidValue: (value: unknown): value is T => (guard ? guard(value) : true),
  });
}

/**
 * Widen an element type with `null`, which becomes the zero value
 *
 * @example
 * const cells = zeros(2, 2, { elementType: nullable(stringType) }); // all null
 */
export function nullable<T>(inner: ElementType<T>): ElementType<T | null> {
  return Object.freeze({
    name: `${inner.name} | null`,
    zero: null,
    isValidValue: (value: unknown): value is T | null => value === null || inner.isValidValue(value),
  });
}

/**
 * Pick the built-in element type for a sample value
 */
export function builtinTypeOf(
  value: unknown,
): ElementType<number> | ElementType<string> | ElementType<boolean> | ElementType<bigint> | undefined {
  switch (typeof value) {
    case 'number':
      return numberType;
    case 'string':
      return stringType;
    case 'boolean':
      return booleanType;
    case 'bigint':
      return bigintType;
    default:
      return undefined;
  }
}
