/**
 * Lazy, skip-capable sequences
 *
 * Every traversal of a matrix is a run of positions [cursor, end) mapped to
 * elements by an index function, so skipping and counting never touch the
 * skipped elements. Sequences are pull-driven and synchronous; abandoning
 * one needs no cleanup.
 */

import { InvalidArgumentError, NoSuchElementError } from '../errors';

/**
 * A finite, forward-only sequence that can skip ahead and report how many
 * elements remain without producing them
 */
export interface LazySequence<T> extends IterableIterator<T> {
  hasNext(): boolean;
  /**
   * Next element; throws NoSuchElementError when exhausted
   */
  nextValue(): T;
  /**
   * Advance past `n` elements without producing them. Skipping past the end
   * exhausts the sequence.
   */
  skip(n: number): this;
  remainingCount(): number;
  /**
   * Drain the remaining elements into an array
   */
  toArray(): T[];
}

/**
 * Sequence over positions [start, end) of an index function
 */
export class IndexedSequence<T> implements LazySequence<T> {
  private cursor: number;
  private readonly end: number;
  private readonly at: (index: number) => T;

  constructor(end: number, at: (index: number) => T, start = 0) {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
      throw new InvalidArgumentError(
        `Invalid sequence range [${String(start)}, ${String(end)})`,
        { start, end },
      );
    }
    this.cursor = start;
    this.end = end;
    this.at = at;
  }

  hasNext(): boolean {
    return this.cursor < this.end;
  }

  nextValue(): T {
    if (this.cursor >= this.end) {
      throw new NoSuchElementError();
    }
    return this.at(this.cursor++);
  }

  next(): IteratorResult<T> {
    if (this.cursor >= this.end) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.at(this.cursor++) };
  }

  skip(n: number): this {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError(`Skip count must be a non-negative integer, got ${String(n)}`);
    }
    this.cursor = n >= this.end - this.cursor ? this.end : this.cursor + n;
    return this;
  }

  remainingCount(): number {
    return this.end - this.cursor;
  }

  toArray(): T[] {
    const result = new Array<T>(this.end - this.cursor);
    for (let k = 0; this.cursor < this.end; k++) {
      result[k] = this.at(this.cursor++);
    }
    return result;
  }

  /**
   * Lazily map the remaining elements. The result is a new sequence; this
   * one is left where it is.
   */
  map<R>(fn: (value: T) => R): IndexedSequence<R> {
    const at = this.at;
    return new IndexedSequence(this.end, (index) => fn(at(index)), this.cursor);
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/**
 * Sequence over the elements of an array (read through at pull time)
 */
export function sequenceOf<T>(values: readonly T[]): IndexedSequence<T> {
  return new IndexedSequence(values.length, (index) => values[index]);
}

export function emptySequence<T>(): IndexedSequence<T> {
  return new IndexedSequence<T>(0, () => {
    throw new NoSuchElementError();
  });
}
