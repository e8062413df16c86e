/**
 * Test generators for element-wise operations
 *
 * These are the operations routed through the cell scheduler, so every
 * configuration must give the sequential result.
 */

import { numberType, stringType, zipAll, zipAllWith } from '@gridmat/core';
import type { ExecutionConfig, TestFramework } from './execution';
import { referenceGrid, runIn, sequentialMatrix } from './execution';

const ROWS = 29;
const COLS = 41;

/**
 * Generates tests for element-wise operations
 *
 * @param config - Execution configuration to run under
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateElementWiseTests(config: ExecutionConfig, testFramework: TestFramework): void {
  const { describe, it, expect } = testFramework;
  const matrix = (seed = 1) => sequentialMatrix(config, ROWS, COLS, seed);
  const source = (i: number, j: number, seed = 1) => seed + i * COLS + j;

  describe(`Element-wise Tests (${config.name})`, () => {
    describe('map and update', () => {
      it('should map values', () => {
        runIn(config, () => {
          expect(matrix().map((v) => v * 2).toArray()).toEqual(referenceGrid(ROWS, COLS, (i, j) => 2 * source(i, j)));
        });
      });

      it('should map with positions into another element type', () => {
        runIn(config, () => {
          const labelled = matrix().map((v, i, j) => `${i.toString()}:${j.toString()}=${v.toString()}`, stringType);
          expect(labelled.get(28, 40)).toBe(`28:40=${source(28, 40).toString()}`);
          expect(labelled.elementType).toBe(stringType);
        });
      });

      it('should update every cell in place', () => {
        runIn(config, () => {
          const m = matrix();
          m.updateAll((v, i, j) => v - i * COLS - j);
          expect(m.toArray()).toEqual(referenceGrid(ROWS, COLS, () => 1));
        });
      });

      it('should replace matching cells', () => {
        runIn(config, () => {
          const m = matrix();
          m.replaceIf((v) => v % 3 === 0, 0);
          expect(m.toArray()).toEqual(
            referenceGrid(ROWS, COLS, (i, j) => (source(i, j) % 3 === 0 ? 0 : source(i, j))),
          );
        });
      });

      it('should propagate errors from the callback', () => {
        runIn(config, () => {
          expect(() =>
            matrix().map((v, i, j) => {
              if (i === 3 && j === 4) {
                throw new Error('boom');
              }
              return v;
            }),
          ).toThrow('boom');
        });
      });
    });

    describe('visiting', () => {
      it('should visit every cell exactly once', () => {
        runIn(config, () => {
          let total = 0;
          let count = 0;
          matrix().forEach((v) => {
            total += v;
            count++;
          });
          const size = ROWS * COLS;
          expect(count).toBe(size);
          expect(total).toBe((size * (size + 1)) / 2);
        });
      });

      it('should visit only the requested region', () => {
        runIn(config, () => {
          const seen = new Set<string>();
          matrix().forEach(5, 20, 3, 17, (_, i, j) => {
            seen.add(`${i.toString()},${j.toString()}`);
          });
          expect(seen.size).toBe(15 * 14);
          expect(seen.has('5,3')).toBe(true);
          expect(seen.has('19,16')).toBe(true);
          expect(seen.has('20,16')).toBe(false);
        });
      });
    });

    describe('zip', () => {
      it('should zip two matrices', () => {
        runIn(config, () => {
          expect(matrix().zipWith(matrix(1000), (x, y) => x + y).toArray()).toEqual(
            referenceGrid(ROWS, COLS, (i, j) => source(i, j) + source(i, j, 1000)),
          );
        });
      });

      it('should zip three matrices', () => {
        runIn(config, () => {
          expect(matrix().zipWith3(matrix(10), matrix(100), (x, y, z) => z - y - x).toArray()).toEqual(
            referenceGrid(ROWS, COLS, (i, j) => source(i, j, 100) - source(i, j, 10) - source(i, j)),
          );
        });
      });

      it('should fold and combine many matrices', () => {
        runIn(config, () => {
          const inputs = [matrix(), matrix(2), matrix(3)];
          expect(zipAll(inputs, (acc, v) => acc + v).toArray()).toEqual(
            referenceGrid(ROWS, COLS, (i, j) => 3 * source(i, j) + 3),
          );
          expect(zipAllWith(inputs, (values) => Math.max(...values), numberType).toArray()).toEqual(
            referenceGrid(ROWS, COLS, (i, j) => source(i, j, 3)),
          );
        });
      });

      it('should refuse mismatched shapes', () => {
        runIn(config, () => {
          const other = sequentialMatrix(config, COLS, ROWS);
          expect(() => matrix().zipWith(other, (x, y) => x + y)).toThrow('Shape mismatch: [29, 41] vs [41, 29]');
        });
      });
    });
  });
}
