/**
 * Matrix construction
 *
 * Every function takes an optional `MatrixOptions`. Without an element type
 * it is taken from the first value: numbers, strings, booleans and bigints
 * map to the built-in types, an empty input gives a `Matrix<number>`, and
 * every other element type has to be named.
 */

import { bigintType, booleanType, numberType, stringType } from '../element/constants';
import { allocFilled, denseArrayFactory, rectangularDims } from '../element/factory';
import type { ArrayFactory, ElementType, Storage } from '../element/types';
import { checkShape, InvalidArgumentError } from '../errors';
import { Matrix } from './matrix';
import type { MatrixOptions } from './types';

type CreationOptions<T> = Partial<MatrixOptions<T>>;
type FactoryOptions = { arrayFactory?: ArrayFactory };
type BuiltinMatrix = Matrix<number> | Matrix<string> | Matrix<boolean> | Matrix<bigint>;

const NO_SAMPLE = Symbol('no sample');

/**
 * Build with the built-in element type of `sample`; `NO_SAMPLE` means numbers
 */
function withInferredType(sample: unknown, build: <T>(elementType: ElementType<T>) => Matrix<T>): BuiltinMatrix {
  if (sample === NO_SAMPLE) {
    return build(numberType);
  }
  switch (typeof sample) {
    case 'number':
      return build(numberType);
    case 'string':
      return build(stringType);
    case 'boolean':
      return build(booleanType);
    case 'bigint':
      return build(bigintType);
    default:
      throw new InvalidArgumentError(
        `Cannot infer an element type from ${String(sample)}; pass options.elementType`,
        { sample },
      );
  }
}

function isGrid(data: unknown): data is unknown[][] {
  return Array.isArray(data) && data.every((row) => Array.isArray(row));
}

function firstCell(data: readonly (readonly unknown[])[]): unknown {
  const row = data.find((r) => r.length > 0);
  return row === undefined ? NO_SAMPLE : row[0];
}

function assertGridOf<T>(data: unknown[][], elementType: ElementType<T>): asserts data is T[][] {
  data.forEach((row, i) => {
    row.forEach((value, j) => {
      if (!elementType.isValidValue(value)) {
        throw new InvalidArgumentError(
          `Element at (${i.toString()}, ${j.toString()}) is not a valid ${elementType.name}: ${String(value)}`,
          { row: i, col: j },
        );
      }
    });
  });
}

function assertListOf<T>(values: readonly unknown[], elementType: ElementType<T>): asserts values is readonly T[] {
  values.forEach((value, k) => {
    if (!elementType.isValidValue(value)) {
      throw new InvalidArgumentError(
        `Diagonal value ${k.toString()} is not a valid ${elementType.name}: ${String(value)}`,
        { index: k },
      );
    }
  });
}

/**
 * Wrap rectangular nested arrays as a matrix without copying them
 *
 * @throws {ShapeError} when the rows differ in length
 * @throws {InvalidArgumentError} when a value does not belong to the element type
 *
 * @example
 * const m = fromRectangular([[1, 2], [3, 4]]);
 * const s = fromRectangular([['a', 'b']]);
 */
export function fromRectangular(data: number[][], options?: CreationOptions<number>): Matrix<number>;
export function fromRectangular(data: string[][], options?: CreationOptions<string>): Matrix<string>;
export function fromRectangular(data: boolean[][], options?: CreationOptions<boolean>): Matrix<boolean>;
export function fromRectangular(data: bigint[][], options?: CreationOptions<bigint>): Matrix<bigint>;
export function fromRectangular<T>(data: T[][], options: MatrixOptions<T>): Matrix<T>;
export function fromRectangular<T>(data: unknown, options?: CreationOptions<T>): Matrix<T> | BuiltinMatrix {
  if (!isGrid(data)) {
    throw new InvalidArgumentError('Matrix data must be an array of row arrays');
  }
  rectangularDims(data);

  const grid: unknown[][] = data;
  const factory = options?.arrayFactory ?? denseArrayFactory;
  const build = <E>(elementType: ElementType<E>): Matrix<E> => {
    assertGridOf(grid, elementType);
    return new Matrix(grid, elementType, factory);
  };

  const elementType = options?.elementType;
  return elementType !== undefined ? build(elementType) : withInferredType(firstCell(grid), build);
}

/**
 * A 1 x length matrix holding `value` in every cell
 */
export function repeatSingleRow(value: number, length: number, options?: CreationOptions<number>): Matrix<number>;
export function repeatSingleRow(value: string, length: number, options?: CreationOptions<string>): Matrix<string>;
export function repeatSingleRow(value: boolean, length: number, options?: CreationOptions<boolean>): Matrix<boolean>;
export function repeatSingleRow(value: bigint, length: number, options?: CreationOptions<bigint>): Matrix<bigint>;
export function repeatSingleRow<T>(value: T, length: number, options: MatrixOptions<T>): Matrix<T>;
export function repeatSingleRow<T>(
  value: T,
  length: number,
  options?: CreationOptions<T>,
): Matrix<T> | BuiltinMatrix {
  return filled(1, length, value, options);
}

/**
 * A rows x cols matrix holding `value` in every cell
 */
export function full(rows: number, cols: number, value: number, options?: CreationOptions<number>): Matrix<number>;
export function full(rows: number, cols: number, value: string, options?: CreationOptions<string>): Matrix<string>;
export function full(rows: number, cols: number, value: boolean, options?: CreationOptions<boolean>): Matrix<boolean>;
export function full(rows: number, cols: number, value: bigint, options?: CreationOptions<bigint>): Matrix<bigint>;
export function full<T>(rows: number, cols: number, value: T, options: MatrixOptions<T>): Matrix<T>;
export function full<T>(
  rows: number,
  cols: number,
  value: T,
  options?: CreationOptions<T>,
): Matrix<T> | BuiltinMatrix {
  return filled(rows, cols, value, options);
}

function filled<T>(rows: number, cols: number, value: T, options?: CreationOptions<T>): Matrix<T> | BuiltinMatrix {
  const factory = options?.arrayFactory ?? denseArrayFactory;
  const elementType = options?.elementType;

  if (elementType !== undefined) {
    return new Matrix(allocFilled(factory, elementType, rows, cols, value), elementType, factory);
  }
  const sample: unknown = value;
  return withInferredType(sample, (inferred) => {
    if (!inferred.isValidValue(sample)) {
      throw new InvalidArgumentError(`Fill value is not a valid ${inferred.name}: ${String(sample)}`);
    }
    return new Matrix(allocFilled(factory, inferred, rows, cols, sample), inferred, factory);
  });
}

/**
 * A rows x cols matrix of the element type's zero value (numbers by default)
 */
export function zeros(rows: number, cols: number, options?: FactoryOptions): Matrix<number>;
export function zeros<T>(rows: number, cols: number, options: MatrixOptions<T>): Matrix<T>;
export function zeros<T>(rows: number, cols: number, options?: CreationOptions<T>): Matrix<T> | Matrix<number> {
  const factory = options?.arrayFactory ?? denseArrayFactory;
  const elementType = options?.elementType;

  if (elementType !== undefined) {
    return new Matrix(factory.alloc(elementType, rows, cols), elementType, factory);
  }
  return new Matrix(factory.alloc(numberType, rows, cols), numberType, factory);
}

function buildDiagonals<T>(
  main: readonly T[],
  anti: readonly T[],
  elementType: ElementType<T>,
  factory: ArrayFactory,
): Storage<T> {
  const n = Math.max(main.length, anti.length);
  const storage = factory.alloc(elementType, n, n);

  // main is written last so it owns the centre cell of an odd-sized grid
  anti.forEach((value, i) => {
    storage[i][n - 1 - i] = value;
  });
  main.forEach((value, i) => {
    storage[i][i] = value;
  });
  return storage;
}

function diagonalMatrix<T>(
  main: readonly T[] | null,
  anti: readonly T[] | null,
  options?: CreationOptions<T>,
): Matrix<T> | BuiltinMatrix {
  if (main === null && anti === null) {
    throw new InvalidArgumentError('At least one of the main and anti diagonals must be given');
  }
  const mainValues: readonly unknown[] = main ?? [];
  const antiValues: readonly unknown[] = anti ?? [];
  if (mainValues.length > 0 && antiValues.length > 0) {
    checkShape(
      mainValues.length === antiValues.length,
      `Diagonal lengths differ: main has ${mainValues.length.toString()}, anti has ${antiValues.length.toString()}`,
      { main: mainValues.length, anti: antiValues.length },
    );
  }

  const factory = options?.arrayFactory ?? denseArrayFactory;
  const build = <E>(elementType: ElementType<E>): Matrix<E> => {
    assertListOf(mainValues, elementType);
    assertListOf(antiValues, elementType);
    return new Matrix(buildDiagonals(mainValues, antiValues, elementType, factory), elementType, factory);
  };

  const elementType = options?.elementType;
  if (elementType !== undefined) {
    return build(elementType);
  }
  const first = mainValues.length > 0 ? mainValues : antiValues;
  return withInferredType(first.length > 0 ? first[0] : NO_SAMPLE, build);
}

/**
 * A square matrix with `main` on the main diagonal and `anti` on the
 * anti-diagonal. A null or empty diagonal is left out, and the size comes
 * from the other one. Every other cell holds the zero value.
 *
 * @throws {InvalidArgumentError} when both diagonals are null
 * @throws {ShapeError} when both are non-empty with different lengths
 *
 * @example
 * diagonalFrom([1, 2, 3], [7, 8, 9]); // [[1, 0, 7], [0, 2, 0], [9, 0, 3]]
 */
export function diagonalFrom(
  main: readonly number[] | null,
  anti: readonly number[] | null,
  options?: CreationOptions<number>,
): Matrix<number>;
export function diagonalFrom(
  main: readonly string[] | null,
  anti: readonly string[] | null,
  options?: CreationOptions<string>,
): Matrix<string>;
export function diagonalFrom(
  main: readonly boolean[] | null,
  anti: readonly boolean[] | null,
  options?: CreationOptions<boolean>,
): Matrix<boolean>;
export function diagonalFrom(
  main: readonly bigint[] | null,
  anti: readonly bigint[] | null,
  options?: CreationOptions<bigint>,
): Matrix<bigint>;
export function diagonalFrom<T>(
  main: readonly T[] | null,
  anti: readonly T[] | null,
  options: MatrixOptions<T>,
): Matrix<T>;
export function diagonalFrom<T>(
  main: readonly T[] | null,
  anti: readonly T[] | null,
  options?: CreationOptions<T>,
): Matrix<T> | BuiltinMatrix {
  return diagonalMatrix(main, anti, options);
}

export function diagonalLU2RD(values: readonly number[], options?: CreationOptions<number>): Matrix<number>;
export function diagonalLU2RD(values: readonly string[], options?: CreationOptions<string>): Matrix<string>;
export function diagonalLU2RD(values: readonly boolean[], options?: CreationOptions<boolean>): Matrix<boolean>;
export function diagonalLU2RD(values: readonly bigint[], options?: CreationOptions<bigint>): Matrix<bigint>;
export function diagonalLU2RD<T>(values: readonly T[], options: MatrixOptions<T>): Matrix<T>;
export function diagonalLU2RD<T>(values: readonly T[], options?: CreationOptions<T>): Matrix<T> | BuiltinMatrix {
  return diagonalMatrix(values, null, options);
}

export function diagonalRU2LD(values: readonly number[], options?: CreationOptions<number>): Matrix<number>;
export function diagonalRU2LD(values: readonly string[], options?: CreationOptions<string>): Matrix<string>;
export function diagonalRU2LD(values: readonly boolean[], options?: CreationOptions<boolean>): Matrix<boolean>;
export function diagonalRU2LD(values: readonly bigint[], options?: CreationOptions<bigint>): Matrix<bigint>;
export function diagonalRU2LD<T>(values: readonly T[], options: MatrixOptions<T>): Matrix<T>;
export function diagonalRU2LD<T>(values: readonly T[], options?: CreationOptions<T>): Matrix<T> | BuiltinMatrix {
  return diagonalMatrix(null, values, options);
}
