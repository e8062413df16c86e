/**
 * Tests for lazy traversals over matrices
 */

import { describe, it, expect } from 'vitest';
import { IndexOutOfBoundsError, NonSquareMatrixError } from '../errors';
import type { LazySequence } from '../sequence/lazy-sequence';
import type { Position } from '../shape/position';
import { fromRectangular, zeros } from './creation';
import type { Matrix } from './matrix';

function grid(): Matrix<number> {
  return fromRectangular([
    [1, 2, 3],
    [4, 5, 6],
  ]);
}

function square(): Matrix<number> {
  return fromRectangular([
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ]);
}

function labels(seq: LazySequence<Position>): string[] {
  return seq.toArray().map((p) => p.toString());
}

describe('traversal', () => {
  describe('streamH', () => {
    it('should equal the row-major flattening', () => {
      const m = grid();
      expect(m.streamH().toArray()).toEqual(m.flatten());
    });

    it('should stream one row or a row range', () => {
      expect(grid().streamH(1).toArray()).toEqual([4, 5, 6]);
      expect(grid().streamH(0, 1).toArray()).toEqual([1, 2, 3]);
      expect(grid().streamH(1, 1).toArray()).toEqual([]);
    });

    it('should reject rows outside the matrix', () => {
      expect(() => grid().streamH(2)).toThrow(IndexOutOfBoundsError);
      expect(() => grid().streamH(1, 3)).toThrow('Range [1, 3) out of bounds for length 2');
    });
  });

  describe('streamV', () => {
    it('should stream column-major', () => {
      expect(grid().streamV().toArray()).toEqual([1, 4, 2, 5, 3, 6]);
    });

    it('should stream one column or a column range', () => {
      expect(grid().streamV(2).toArray()).toEqual([3, 6]);
      expect(grid().streamV(1, 3).toArray()).toEqual([2, 5, 3, 6]);
    });

    it('should reject columns outside the matrix', () => {
      expect(() => grid().streamV(3)).toThrow('Column index 3 out of bounds for length 3');
    });
  });

  describe('diagonals', () => {
    it('should stream both diagonals of a square matrix', () => {
      expect(square().streamLU2RD().toArray()).toEqual([1, 5, 9]);
      expect(square().streamRU2LD().toArray()).toEqual([3, 5, 7]);
    });

    it('should refuse non-square matrices', () => {
      expect(() => grid().streamLU2RD()).toThrow(NonSquareMatrixError);
      expect(() => grid().pointsRU2LD()).toThrow(NonSquareMatrixError);
    });
  });

  describe('sequences of sequences', () => {
    it('should stream rows and columns as inner sequences', () => {
      expect(grid().streamR().toArray().map((s) => s.toArray())).toEqual([
        [1, 2, 3],
        [4, 5, 6],
      ]);
      expect(grid().streamC().toArray().map((s) => s.toArray())).toEqual([
        [1, 4],
        [2, 5],
        [3, 6],
      ]);
    });

    it('should honour ranges', () => {
      expect(grid().streamR(1, 2).toArray().map((s) => s.toArray())).toEqual([[4, 5, 6]]);
      expect(grid().streamC(0, 0).toArray()).toEqual([]);
    });

    it('should skip whole rows without building them', () => {
      const rows = grid().streamR();
      rows.skip(1);
      expect(rows.remainingCount()).toBe(1);
      expect(rows.nextValue().toArray()).toEqual([4, 5, 6]);
    });

    it('should keep inner sequences independent', () => {
      const columns = square().streamC();
      const first = columns.nextValue();
      const second = columns.nextValue();
      first.skip(2);
      expect(second.toArray()).toEqual([2, 5, 8]);
      expect(first.toArray()).toEqual([7]);
    });
  });

  describe('cursors', () => {
    it('should start a fresh cursor on every call', () => {
      const m = grid();
      const first = m.streamH();
      first.nextValue();
      first.nextValue();
      expect(first.remainingCount()).toBe(4);
      expect(m.streamH().remainingCount()).toBe(6);
    });

    it('should read the live storage when pulled', () => {
      const m = grid();
      const seq = m.streamH();
      m.set(1, 2, 60);
      expect(seq.toArray()).toEqual([1, 2, 3, 4, 5, 60]);
    });

    it('should agree with direct indexing after a skip in every order', () => {
      const m = square();
      const orders: Array<[() => LazySequence<number>, number[]]> = [
        [() => m.streamH(), [1, 2, 3, 4, 5, 6, 7, 8, 9]],
        [() => m.streamV(), [1, 4, 7, 2, 5, 8, 3, 6, 9]],
        [() => m.streamH(1, 3), [4, 5, 6, 7, 8, 9]],
        [() => m.streamV(2), [3, 6, 9]],
        [() => m.streamLU2RD(), [1, 5, 9]],
        [() => m.streamRU2LD(), [3, 5, 7]],
      ];

      for (const [open, expected] of orders) {
        for (let n = 0; n <= expected.length; n++) {
          const seq = open().skip(n);
          expect(seq.remainingCount()).toBe(expected.length - n);
          expect(seq.toArray()).toEqual(expected.slice(n));
        }
      }
    });

    it('should be empty for empty matrices', () => {
      expect(zeros(0, 3).streamH().remainingCount()).toBe(0);
      expect(zeros(3, 0).streamV().remainingCount()).toBe(0);
      expect(zeros(3, 0).streamH().toArray()).toEqual([]);
      expect(zeros(0, 0).streamLU2RD().hasNext()).toBe(false);
    });
  });

  describe('positions', () => {
    it('should list positions row-major and column-major', () => {
      const m = zeros(2, 2);
      expect(labels(m.pointsH())).toEqual(['(0, 0)', '(0, 1)', '(1, 0)', '(1, 1)']);
      expect(labels(m.pointsV())).toEqual(['(0, 0)', '(1, 0)', '(0, 1)', '(1, 1)']);
    });

    it('should list positions of one row or column', () => {
      expect(labels(grid().pointsH(1))).toEqual(['(1, 0)', '(1, 1)', '(1, 2)']);
      expect(labels(grid().pointsV(0, 1))).toEqual(['(0, 0)', '(1, 0)']);
    });

    it('should list diagonal positions', () => {
      expect(labels(square().pointsLU2RD())).toEqual(['(0, 0)', '(1, 1)', '(2, 2)']);
      expect(labels(square().pointsRU2LD())).toEqual(['(0, 2)', '(1, 1)', '(2, 0)']);
    });

    it('should nest positions by row and column', () => {
      expect(grid().pointsR().toArray().map(labels)).toEqual([
        ['(0, 0)', '(0, 1)', '(0, 2)'],
        ['(1, 0)', '(1, 1)', '(1, 2)'],
      ]);
      expect(grid().pointsC(1, 2).toArray().map(labels)).toEqual([['(0, 1)', '(1, 1)']]);
    });

    it('should point at the values the value streams produce', () => {
      const m = square();
      const values = m.pointsV().toArray().map((p) => m.getAt(p));
      expect(values).toEqual(m.streamV().toArray());
    });
  });
});
