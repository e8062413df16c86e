/**
 * Named-column tables built from a grid
 */

import type { Storage } from '../element/types';
import { checkArgument, checkIndex, checkShape, InvalidArgumentError } from '../errors';

export type TableRow<T> = Readonly<Record<string, T>>;

/**
 * Column-oriented table of copied values. Every column has `rowCount`
 * entries and a unique name.
 */
export class Table<T> {
  readonly columnNames: readonly string[];
  private readonly columns: ReadonlyMap<string, readonly T[]>;
  private readonly _rowCount: number;

  constructor(columnNames: readonly string[], columns: readonly (readonly T[])[]) {
    checkShape(columnNames.length === columns.length, 'Every column needs exactly one name', {
      names: columnNames.length,
      columns: columns.length,
    });
    const unique = new Set(columnNames);
    checkArgument(unique.size === columnNames.length, `Column names must be unique: ${columnNames.join(', ')}`);

    const rowCount = columns.length === 0 ? 0 : columns[0].length;
    columns.forEach((column, k) => {
      checkShape(column.length === rowCount, `Column '${columnNames[k]}' has ${column.length.toString()} values, expected ${rowCount.toString()}`);
    });

    this.columnNames = Object.freeze([...columnNames]);
    this.columns = new Map(columnNames.map((name, k) => [name, Object.freeze([...columns[k]])]));
    this._rowCount = rowCount;
  }

  get rowCount(): number {
    return this._rowCount;
  }

  get columnCount(): number {
    return this.columnNames.length;
  }

  column(name: string): readonly T[] {
    const column = this.columns.get(name);
    if (column === undefined) {
      throw new InvalidArgumentError(`No column named '${name}'`, { name });
    }
    return column;
  }

  get(rowIndex: number, name: string): T {
    const column = this.column(name);
    checkIndex(rowIndex, this._rowCount, 'Row index');
    return column[rowIndex];
  }

  row(rowIndex: number): TableRow<T> {
    checkIndex(rowIndex, this._rowCount, 'Row index');
    // own data properties, so a column named '__proto__' stays a key
    return Object.fromEntries(Array.from(this.columns, ([name, column]): [string, T] => [name, column[rowIndex]]));
  }

  rows(): TableRow<T>[] {
    return Array.from({ length: this._rowCount }, (_, i) => this.row(i));
  }
}

/**
 * Matrix column k becomes table column `columnNames[k]`
 */
export function toRowOrientedTable<T>(storage: Storage<T>, cols: number, columnNames: readonly string[]): Table<T> {
  checkShape(
    columnNames.length === cols,
    `Expected ${cols.toString()} column names, got ${columnNames.length.toString()}`,
    { expected: cols, actual: columnNames.length },
  );
  const columns = columnNames.map((_, j) => storage.map((row) => row[j]));
  return new Table(columnNames, columns);
}

/**
 * Matrix row i becomes table column `rowNames[i]`
 */
export function toColumnOrientedTable<T>(storage: Storage<T>, rowNames: readonly string[]): Table<T> {
  checkShape(
    rowNames.length === storage.length,
    `Expected ${storage.length.toString()} row names, got ${rowNames.length.toString()}`,
    { expected: storage.length, actual: rowNames.length },
  );
  return new Table(rowNames, storage);
}
