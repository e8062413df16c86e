/**
 * Storage allocation
 */

import { checkNonNegative, ShapeError } from '../errors';
import type { ArrayFactory, ElementType, Storage } from './types';

/**
 * Allocates plain nested arrays, each cell set to the element type's zero
 */
export const denseArrayFactory: ArrayFactory = {
  alloc<T>(elementType: ElementType<T>, rows: number, cols: number): Storage<T> {
    checkNonNegative(rows, 'rows');
    checkNonNegative(cols, 'cols');

    const storage: Storage<T> = new Array<T[]>(rows);
    for (let i = 0; i < rows; i++) {
      storage[i] = new Array<T>(cols).fill(elementType.zero);
    }
    return storage;
  },
};

/**
 * Allocate storage and fill every cell with `value`
 */
export function allocFilled<T>(
  factory: ArrayFactory,
  elementType: ElementType<T>,
  rows: number,
  cols: number,
  value: T,
): Storage<T> {
  const storage = factory.alloc(elementType, rows, cols);
  for (const row of storage) {
    row.fill(value);
  }
  return storage;
}

/**
 * Check that `data` is rectangular and return its [rows, cols]
 *
 * An empty outer array is 0 x 0; `[[], []]` is 2 x 0.
 */
export function rectangularDims(data: readonly (readonly unknown[])[]): [number, number] {
  const rows = data.length;
  const cols = rows === 0 ? 0 : data[0].length;

  for (let i = 1; i < rows; i++) {
    if (data[i].length !== cols) {
      throw new ShapeError(
        `Row ${i.toString()} has ${data[i].length.toString()} elements, expected ${cols.toString()}`,
        { row: i, expected: cols, actual: data[i].length },
      );
    }
  }

  return [rows, cols];
}
