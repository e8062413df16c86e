/**
 * Execution configurations the conformance generators run under
 */

import type { ArrayFactory, ElementType, ParallelMode, PartitionExecutor, Storage } from '@gridmat/core';
import {
  Matrix,
  checkNonNegative,
  configure,
  denseArrayFactory,
  numberType,
  resetSettings,
} from '@gridmat/core';

export interface ExecutionConfig {
  readonly name: string;
  readonly parallelMode: ParallelMode;
  readonly arrayFactory: ArrayFactory;
  readonly maxPartitions?: number;
  readonly executor?: PartitionExecutor;
}

/**
 * The subset of a test framework the generators call
 */
export interface TestFramework {
  describe: (name: string, fn: () => void) => void;
  it: (name: string, fn: () => void) => void;
  expect: (actual: unknown) => {
    toBe: (expected: unknown) => void;
    toEqual: (expected: unknown) => void;
    toThrow: (error?: string | RegExp) => void;
  };
}

/**
 * Run `fn` with the configuration's settings in effect
 */
export function runIn<R>(config: ExecutionConfig, fn: () => R): R {
  configure({
    parallelMode: config.parallelMode,
    ...(config.maxPartitions === undefined ? {} : { maxPartitions: config.maxPartitions }),
    ...(config.executor === undefined ? {} : { executor: config.executor }),
  });
  try {
    return fn();
  } finally {
    resetSettings();
  }
}

/**
 * rows x cols matrix holding `seed + row * cols + col` in each cell
 */
export function sequentialMatrix(config: ExecutionConfig, rows: number, cols: number, seed = 1): Matrix<number> {
  const storage = config.arrayFactory.alloc(numberType, rows, cols);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      storage[i][j] = seed + i * cols + j;
    }
  }
  return new Matrix(storage, numberType, config.arrayFactory);
}

/**
 * Plain nested-array reference built cell by cell
 */
export function referenceGrid<T>(rows: number, cols: number, at: (row: number, col: number) => T): T[][] {
  return Array.from({ length: rows }, (_, i) => Array.from({ length: cols }, (_, j) => at(i, j)));
}

/**
 * Runs the bands last to first, so results cannot depend on band order
 */
export const reversedExecutor: PartitionExecutor = (tasks) => {
  for (let k = tasks.length - 1; k >= 0; k--) {
    tasks[k].run();
  }
};

/**
 * Allocates each row with Array.from instead of Array#fill
 */
export const rowByRowArrayFactory: ArrayFactory = {
  alloc<T>(elementType: ElementType<T>, rows: number, cols: number): Storage<T> {
    checkNonNegative(rows, 'rows');
    checkNonNegative(cols, 'cols');
    return Array.from({ length: rows }, () => Array.from({ length: cols }, () => elementType.zero));
  },
};

export const executionConfigs: readonly ExecutionConfig[] = [
  { name: 'sequential', parallelMode: 'no', arrayFactory: denseArrayFactory },
  { name: 'partitioned', parallelMode: 'yes', arrayFactory: denseArrayFactory, maxPartitions: 4 },
  {
    name: 'partitioned, reversed bands',
    parallelMode: 'yes',
    arrayFactory: denseArrayFactory,
    maxPartitions: 7,
    executor: reversedExecutor,
  },
  { name: 'threshold, row-by-row factory', parallelMode: 'default', arrayFactory: rowByRowArrayFactory },
];
