/**
 * Error handling for matrix operations
 *
 * Every failure is raised synchronously at the call that detects it. The
 * category tells callers what kind of mistake they made:
 * - argument: bad input that can be corrected and retried (shapes, lengths, counts)
 * - state: the matrix does not satisfy a structural precondition (e.g. not square)
 * - bounds: an index or range outside the matrix
 */

export type MatrixErrorCategory = 'argument' | 'state' | 'bounds';

/**
 * Base matrix error class with error categories and context
 */
export class MatrixError extends Error {
  public readonly code: string;
  public readonly category: MatrixErrorCategory;

  constructor(
    message: string,
    code: string,
    category: MatrixErrorCategory,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MatrixError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name}: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${String(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * Invalid argument (negative counts, missing element type, empty input lists)
 */
export class InvalidArgumentError extends MatrixError {
  constructor(message: string, context?: Record<string, unknown>, code = 'INVALID_ARGUMENT') {
    super(message, code, 'argument', context);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Shape violation: non-rectangular data, mismatched operand shapes,
 * wrong-length row/column/diagonal arrays
 */
export class ShapeError extends InvalidArgumentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, 'SHAPE_MISMATCH');
    this.name = 'ShapeError';
  }
}

/**
 * Configuration value that cannot be applied
 */
export class ConfigurationError extends InvalidArgumentError {
  constructor(setting: string, value: unknown, expected: string) {
    super(
      `Invalid value for setting '${setting}': ${String(value)} (expected ${expected})`,
      { setting, value },
      'INVALID_CONFIGURATION',
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * The matrix is in a state the operation cannot work with
 */
export class IllegalStateError extends MatrixError {
  constructor(message: string, context?: Record<string, unknown>, code = 'ILLEGAL_STATE') {
    super(message, code, 'state', context);
    this.name = 'IllegalStateError';
  }
}

/**
 * Diagonal operations on a matrix whose row and column counts differ
 */
export class NonSquareMatrixError extends IllegalStateError {
  constructor(operation: string, rows: number, cols: number) {
    super(
      `Cannot ${operation} on a non-square matrix (rows=${rows.toString()}, cols=${cols.toString()})`,
      { operation, rows, cols },
      'NOT_SQUARE',
    );
    this.name = 'NonSquareMatrixError';
  }
}

/**
 * Pulling from an exhausted lazy sequence
 */
export class NoSuchElementError extends IllegalStateError {
  constructor(message = 'No more elements in sequence') {
    super(message, undefined, 'NO_SUCH_ELEMENT');
    this.name = 'NoSuchElementError';
  }
}

/**
 * Index or range outside [0, dimension)
 */
export class IndexOutOfBoundsError extends MatrixError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INDEX_OUT_OF_BOUNDS', 'bounds', context);
    this.name = 'IndexOutOfBoundsError';
  }
}

// =============================================================================
// Precondition helpers
// =============================================================================

export function checkArgument(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new InvalidArgumentError(message, context);
  }
}

export function checkShape(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new ShapeError(message, context);
  }
}

export function checkNonNegative(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(
      `'${name}' must be a non-negative integer, got ${String(value)}`,
      { [name]: value },
    );
  }
}

/**
 * Check that `index` lies in [0, length)
 */
export function checkIndex(index: number, length: number, what = 'index'): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new IndexOutOfBoundsError(
      `${what} ${String(index)} out of bounds for length ${length.toString()}`,
      { index, length },
    );
  }
}

/**
 * Check the half-open range [from, to) against [0, length]
 */
export function checkFromToIndex(from: number, to: number, length: number): void {
  if (
    !Number.isInteger(from) ||
    !Number.isInteger(to) ||
    from < 0 ||
    from > to ||
    to > length
  ) {
    throw new IndexOutOfBoundsError(
      `Range [${String(from)}, ${String(to)}) out of bounds for length ${length.toString()}`,
      { from, to, length },
    );
  }
}
