/**
 * Cell-region scheduler
 *
 * Runs a command over every cell of a region, either in one sequential sweep
 * or split into disjoint bands along the outer axis. Each band owns a
 * contiguous, non-overlapping run of outer indices, so commands that write
 * only to their own (row, col) in an output grid never touch the same slot
 * from two bands and need no synchronization.
 */

import { getSettings } from '../config';
import { checkFromToIndex, InvalidArgumentError } from '../errors';
import { currentPolicy } from './policy';
import type { CellCommand, CellRegion, PartitionExecutor, PartitionTask } from './types';

/**
 * Runs the bands one after another on the calling thread
 *
 * Caller closures cannot be moved to worker threads, so the default executor
 * keeps the band contract and leaves scheduling to a custom executor.
 */
export const inlineExecutor: PartitionExecutor = (tasks) => {
  for (const task of tasks) {
    task.run();
  }
};

/**
 * Split [from, to) into at most `parts` contiguous, disjoint, non-empty
 * ranges that together cover it. Earlier ranges take the remainder.
 *
 * @example
 * partitionRange(0, 10, 3); // [[0, 4], [4, 7], [7, 10]]
 */
export function partitionRange(from: number, to: number, parts: number): Array<[number, number]> {
  if (!Number.isInteger(parts) || parts < 1) {
    throw new InvalidArgumentError(`Partition count must be a positive integer, got ${String(parts)}`);
  }
  checkFromToIndex(from, to, Number.MAX_SAFE_INTEGER);

  const length = to - from;
  const count = Math.min(parts, length);
  const ranges: Array<[number, number]> = [];
  if (count === 0) {
    return ranges;
  }

  const base = Math.floor(length / count);
  const remainder = length % count;
  let start = from;

  for (let k = 0; k < count; k++) {
    const end = start + base + (k < remainder ? 1 : 0);
    ranges.push([start, end]);
    start = end;
  }

  return ranges;
}

export function regionOf(rows: number, cols: number): CellRegion {
  return { fromRow: 0, toRow: rows, fromCol: 0, toCol: cols };
}

export function regionSize(region: CellRegion): number {
  return (region.toRow - region.fromRow) * (region.toCol - region.fromCol);
}

/**
 * Build the band tasks for a region. The shorter axis is the outer one,
 * matching the sequential sweep order.
 */
export function createPartitionTasks(
  region: CellRegion,
  cmd: CellCommand,
  partitions: number,
): PartitionTask[] {
  const { fromRow, toRow, fromCol, toCol } = region;
  const rowsOuter = toRow - fromRow <= toCol - fromCol;

  if (rowsOuter) {
    return partitionRange(fromRow, toRow, partitions).map(([from, to], index) => ({
      index,
      axis: 'row' as const,
      from,
      to,
      run: () => {
        for (let i = from; i < to; i++) {
          for (let j = fromCol; j < toCol; j++) {
            cmd(i, j);
          }
        }
      },
    }));
  }

  return partitionRange(fromCol, toCol, partitions).map(([from, to], index) => ({
    index,
    axis: 'col' as const,
    from,
    to,
    run: () => {
      for (let j = from; j < to; j++) {
        for (let i = fromRow; i < toRow; i++) {
          cmd(i, j);
        }
      }
    },
  }));
}

function runSequential(region: CellRegion, cmd: CellCommand): void {
  const { fromRow, toRow, fromCol, toCol } = region;

  if (toRow - fromRow <= toCol - fromCol) {
    for (let i = fromRow; i < toRow; i++) {
      for (let j = fromCol; j < toCol; j++) {
        cmd(i, j);
      }
    }
  } else {
    for (let j = fromCol; j < toCol; j++) {
      for (let i = fromRow; i < toRow; i++) {
        cmd(i, j);
      }
    }
  }
}

/**
 * Run `cmd` once for every cell of `region`
 *
 * When `inParallel` is omitted the current policy decides from the region's
 * cell count. Errors thrown by `cmd` propagate unchanged; cells written
 * before the failure keep their new values.
 */
export function runCells(region: CellRegion, cmd: CellCommand, inParallel?: boolean): void {
  const parallel = inParallel ?? currentPolicy().shouldParallelize(regionSize(region));

  if (!parallel) {
    runSequential(region, cmd);
    return;
  }

  const rowsOuter = region.toRow - region.fromRow <= region.toCol - region.fromCol;
  const outerLength = rowsOuter ? region.toRow - region.fromRow : region.toCol - region.fromCol;
  const tasks = createPartitionTasks(region, cmd, currentPolicy().partitionCount(outerLength));
  const executor = getSettings().executor ?? inlineExecutor;

  executor(tasks);
}
