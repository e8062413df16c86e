/**
 * Tests for skip-capable lazy sequences
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, NoSuchElementError } from '../errors';
import { IndexedSequence, emptySequence, sequenceOf } from './lazy-sequence';

describe('IndexedSequence', () => {
  it('should produce elements in index order', () => {
    const seq = new IndexedSequence(4, (k) => k * 10);
    expect(seq.hasNext()).toBe(true);
    expect(seq.nextValue()).toBe(0);
    expect(seq.nextValue()).toBe(10);
    expect(seq.remainingCount()).toBe(2);
    expect(seq.toArray()).toEqual([20, 30]);
    expect(seq.hasNext()).toBe(false);
  });

  it('should start at an offset', () => {
    expect(new IndexedSequence(5, (k) => k, 2).toArray()).toEqual([2, 3, 4]);
  });

  it('should throw when pulled past the end', () => {
    const seq = new IndexedSequence(1, () => 'only');
    seq.nextValue();
    expect(() => seq.nextValue()).toThrow(NoSuchElementError);
  });

  it('should work with the iteration protocol', () => {
    const seq = new IndexedSequence(3, (k) => k + 1);
    expect([...seq]).toEqual([1, 2, 3]);
    expect(seq.next()).toEqual({ done: true, value: undefined });
  });

  it('should skip without producing the skipped elements', () => {
    const produced: number[] = [];
    const seq = new IndexedSequence(10, (k) => {
      produced.push(k);
      return k;
    });

    seq.skip(7);
    expect(seq.remainingCount()).toBe(3);
    expect(seq.toArray()).toEqual([7, 8, 9]);
    expect(produced).toEqual([7, 8, 9]);
  });

  it('should agree with direct indexing after any skip', () => {
    const values = ['a', 'b', 'c', 'd', 'e'];
    for (let n = 0; n <= values.length; n++) {
      const seq = sequenceOf(values).skip(n);
      expect(seq.remainingCount()).toBe(values.length - n);
      expect(seq.toArray()).toEqual(values.slice(n));
    }
  });

  it('should exhaust when skipping past the end', () => {
    const seq = sequenceOf([1, 2, 3]).skip(100);
    expect(seq.hasNext()).toBe(false);
    expect(seq.remainingCount()).toBe(0);
  });

  it('should reject invalid skip counts', () => {
    const seq = sequenceOf([1, 2, 3]);
    expect(() => seq.skip(-1)).toThrow(InvalidArgumentError);
    expect(() => seq.skip(0.5)).toThrow(InvalidArgumentError);
    expect(seq.remainingCount()).toBe(3);
  });

  it('should reject invalid ranges', () => {
    expect(() => new IndexedSequence(2, (k) => k, 3)).toThrow(InvalidArgumentError);
    expect(() => new IndexedSequence(-1, (k) => k)).toThrow('Invalid sequence range [0, -1)');
  });

  it('should map lazily from the current position', () => {
    const seq = sequenceOf([1, 2, 3, 4]);
    seq.nextValue();
    const doubled = seq.map((v) => v * 2);
    expect(doubled.remainingCount()).toBe(3);
    expect(doubled.toArray()).toEqual([4, 6, 8]);
    expect(seq.remainingCount()).toBe(3);
  });

  it('should read the source at pull time', () => {
    const values = [1, 2];
    const seq = sequenceOf(values);
    values[1] = 20;
    expect(seq.toArray()).toEqual([1, 20]);
  });
});

describe('emptySequence', () => {
  it('should have nothing to give', () => {
    const seq = emptySequence<string>();
    expect(seq.hasNext()).toBe(false);
    expect(seq.remainingCount()).toBe(0);
    expect(seq.toArray()).toEqual([]);
    expect(() => seq.nextValue()).toThrow(NoSuchElementError);
  });
});
