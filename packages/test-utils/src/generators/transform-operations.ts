/**
 * Test generators for structural transforms
 *
 * Each transform is checked against a reference grid built straight from
 * its index mapping, on a matrix large enough to be split into bands.
 */

import type { ExecutionConfig, TestFramework } from './execution';
import { referenceGrid, runIn, sequentialMatrix } from './execution';

const ROWS = 37;
const COLS = 23;

/**
 * Value of cell (i, j) in the sequential source matrix
 */
function source(i: number, j: number): number {
  return 1 + i * COLS + j;
}

/**
 * Generates tests for transforms
 *
 * @param config - Execution configuration to run under
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateTransformTests(config: ExecutionConfig, testFramework: TestFramework): void {
  const { describe, it, expect } = testFramework;
  const matrix = () => sequentialMatrix(config, ROWS, COLS);

  describe(`Transform Tests (${config.name})`, () => {
    describe('index remappings', () => {
      it('should transpose', () => {
        runIn(config, () => {
          expect(matrix().transpose().toArray()).toEqual(referenceGrid(COLS, ROWS, (i, j) => source(j, i)));
        });
      });

      it('should rotate by quarter turns', () => {
        runIn(config, () => {
          const m = matrix();
          expect(m.rotate90().toArray()).toEqual(referenceGrid(COLS, ROWS, (i, j) => source(ROWS - 1 - j, i)));
          expect(m.rotate180().toArray()).toEqual(
            referenceGrid(ROWS, COLS, (i, j) => source(ROWS - 1 - i, COLS - 1 - j)),
          );
          expect(m.rotate270().toArray()).toEqual(referenceGrid(COLS, ROWS, (i, j) => source(j, COLS - 1 - i)));
        });
      });

      it('should flip', () => {
        runIn(config, () => {
          const m = matrix();
          expect(m.flipH().toArray()).toEqual(referenceGrid(ROWS, COLS, (i, j) => source(i, COLS - 1 - j)));
          expect(m.flipV().toArray()).toEqual(referenceGrid(ROWS, COLS, (i, j) => source(ROWS - 1 - i, j)));
        });
      });
    });

    describe('reshaping and tiling', () => {
      it('should reshape to the same size', () => {
        runIn(config, () => {
          expect(matrix().reshape(COLS, ROWS).toArray()).toEqual(referenceGrid(COLS, ROWS, (i, j) => 1 + i * ROWS + j));
        });
      });

      it('should reshape to a larger size with a zero tail', () => {
        runIn(config, () => {
          const size = ROWS * COLS;
          expect(matrix().reshape(40, 30).toArray()).toEqual(
            referenceGrid(40, 30, (i, j) => (i * 30 + j < size ? 1 + i * 30 + j : 0)),
          );
        });
      });

      it('should tile and expand', () => {
        runIn(config, () => {
          const m = matrix();
          expect(m.repmat(2, 3).toArray()).toEqual(
            referenceGrid(2 * ROWS, 3 * COLS, (i, j) => source(i % ROWS, j % COLS)),
          );
          expect(m.repelem(2, 3).toArray()).toEqual(
            referenceGrid(2 * ROWS, 3 * COLS, (i, j) => source(Math.floor(i / 2), Math.floor(j / 3))),
          );
        });
      });

      it('should extend by margins', () => {
        runIn(config, () => {
          expect(matrix().extend(1, 2, 3, 4, -1).toArray()).toEqual(
            referenceGrid(ROWS + 3, COLS + 7, (i, j) =>
              i >= 1 && i < ROWS + 1 && j >= 3 && j < COLS + 3 ? source(i - 1, j - 3) : -1,
            ),
          );
        });
      });
    });

    describe('ownership', () => {
      it('should allocate derived matrices through the source factory', () => {
        runIn(config, () => {
          const m = matrix();
          expect(m.transpose().arrayFactory).toBe(config.arrayFactory);
          expect(m.repmat(1, 2).arrayFactory).toBe(config.arrayFactory);
        });
      });

      it('should leave the source untouched', () => {
        runIn(config, () => {
          const m = matrix();
          m.rotate90();
          m.flipV();
          m.reshape(1, ROWS * COLS);
          expect(m.toArray()).toEqual(referenceGrid(ROWS, COLS, source));
        });
      });
    });
  });
}
