/**
 * Test generators for lazy traversals
 */

import type { ExecutionConfig, TestFramework } from './execution';
import { runIn, sequentialMatrix } from './execution';

const ROWS = 13;
const COLS = 17;

/**
 * Generates tests for traversals
 *
 * @param config - Execution configuration to run under
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateTraversalTests(config: ExecutionConfig, testFramework: TestFramework): void {
  const { describe, it, expect } = testFramework;
  const matrix = () => sequentialMatrix(config, ROWS, COLS);

  describe(`Traversal Tests (${config.name})`, () => {
    it('should stream rows in flatten order', () => {
      runIn(config, () => {
        const m = matrix();
        expect(m.streamH().toArray()).toEqual(m.flatten());
      });
    });

    it('should skip into a column-major stream', () => {
      runIn(config, () => {
        const m = matrix();
        const columnMajor = m.transpose().flatten();
        for (const n of [0, 1, ROWS, ROWS * COLS - 1, ROWS * COLS]) {
          const seq = m.streamV().skip(n);
          expect(seq.remainingCount()).toBe(ROWS * COLS - n);
          expect(seq.toArray()).toEqual(columnMajor.slice(n));
        }
      });
    });

    it('should agree between row streams and rows', () => {
      runIn(config, () => {
        const m = matrix();
        const rows = m.streamR().toArray().map((s) => s.toArray());
        expect(rows).toEqual(m.toArray());
      });
    });

    it('should agree between transformed streams', () => {
      runIn(config, () => {
        const m = matrix();
        expect(m.transpose().streamH().toArray()).toEqual(m.streamV().toArray());
        expect(m.flipH().streamH(0).toArray()).toEqual(m.streamH(0).toArray().reverse());
      });
    });
  });
}
