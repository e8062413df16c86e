/**
 * Tests for the parallel policy and the cell scheduler
 */

import { afterEach, describe, it, expect } from 'vitest';
import { configure, resetSettings } from '../config';
import { InvalidArgumentError } from '../errors';
import { thresholdPolicy, shouldParallelize } from './policy';
import {
  createPartitionTasks,
  inlineExecutor,
  partitionRange,
  regionOf,
  regionSize,
  runCells,
} from './scheduler';
import type { PartitionTask } from './types';

afterEach(() => {
  resetSettings();
});

function collect(region: ReturnType<typeof regionOf>, inParallel?: boolean): string[] {
  const visited: string[] = [];
  runCells(region, (i, j) => visited.push(`${i.toString()},${j.toString()}`), inParallel);
  return visited;
}

describe('partitionRange', () => {
  it('should give the remainder to the earlier ranges', () => {
    expect(partitionRange(0, 10, 3)).toEqual([
      [0, 4],
      [4, 7],
      [7, 10],
    ]);
  });

  it('should never produce empty ranges', () => {
    expect(partitionRange(2, 4, 5)).toEqual([
      [2, 3],
      [3, 4],
    ]);
    expect(partitionRange(3, 3, 4)).toEqual([]);
  });

  it('should cover the range with disjoint contiguous bands', () => {
    for (let length = 0; length <= 20; length++) {
      for (let parts = 1; parts <= 6; parts++) {
        const ranges = partitionRange(5, 5 + length, parts);
        let next = 5;
        for (const [from, to] of ranges) {
          expect(from).toBe(next);
          expect(to).toBeGreaterThan(from);
          next = to;
        }
        expect(next).toBe(5 + length);
        expect(ranges.length).toBe(Math.min(parts, length));
      }
    }
  });

  it('should reject invalid arguments', () => {
    expect(() => partitionRange(0, 5, 0)).toThrow(InvalidArgumentError);
    expect(() => partitionRange(0, 5, 1.5)).toThrow(InvalidArgumentError);
    expect(() => partitionRange(4, 2, 2)).toThrow('Range [4, 2) out of bounds');
  });
});

describe('thresholdPolicy', () => {
  it('should always partition non-empty work in yes mode', () => {
    const policy = thresholdPolicy({ parallelMode: 'yes', parallelThreshold: 100, maxPartitions: 4 });
    expect(policy.shouldParallelize(0)).toBe(false);
    expect(policy.shouldParallelize(1)).toBe(true);
  });

  it('should never partition in no mode', () => {
    const policy = thresholdPolicy({ parallelMode: 'no', parallelThreshold: 0, maxPartitions: 4 });
    expect(policy.shouldParallelize(1_000_000)).toBe(false);
  });

  it('should partition above the threshold in default mode', () => {
    const policy = thresholdPolicy({ parallelMode: 'default', parallelThreshold: 8192, maxPartitions: 4 });
    expect(policy.shouldParallelize(8192)).toBe(false);
    expect(policy.shouldParallelize(8193)).toBe(true);
  });

  it('should cap the partition count by the outer length and the maximum', () => {
    const policy = thresholdPolicy({ parallelMode: 'yes', parallelThreshold: 0, maxPartitions: 4 });
    expect(policy.partitionCount(2)).toBe(2);
    expect(policy.partitionCount(100)).toBe(4);
    expect(policy.partitionCount(0)).toBe(1);
  });

  it('should follow the configured settings', () => {
    configure({ parallelMode: 'default', parallelThreshold: 10 });
    expect(shouldParallelize(10)).toBe(false);
    expect(shouldParallelize(11)).toBe(true);
  });
});

describe('createPartitionTasks', () => {
  it('should band rows when rows are the shorter axis', () => {
    const tasks = createPartitionTasks(regionOf(2, 5), () => undefined, 2);
    expect(tasks.map((t) => [t.axis, t.from, t.to])).toEqual([
      ['row', 0, 1],
      ['row', 1, 2],
    ]);
  });

  it('should band columns when columns are the shorter axis', () => {
    const tasks = createPartitionTasks(regionOf(6, 2), () => undefined, 4);
    expect(tasks.map((t) => [t.axis, t.from, t.to])).toEqual([
      ['col', 0, 1],
      ['col', 1, 2],
    ]);
  });

  it('should visit only the cells of each band', () => {
    const log: string[] = [];
    const tasks = createPartitionTasks(
      { fromRow: 1, toRow: 3, fromCol: 0, toCol: 4 },
      (i, j) => log.push(`${i.toString()},${j.toString()}`),
      2,
    );

    const perTask = tasks.map((task) => {
      log.length = 0;
      task.run();
      return [...log];
    });

    expect(perTask).toEqual([
      ['1,0', '1,1', '1,2', '1,3'],
      ['2,0', '2,1', '2,2', '2,3'],
    ]);
  });
});

describe('runCells', () => {
  it('should sweep the shorter axis outermost when sequential', () => {
    expect(collect(regionOf(2, 3), false)).toEqual(['0,0', '0,1', '0,2', '1,0', '1,1', '1,2']);
    expect(collect(regionOf(3, 2), false)).toEqual(['0,0', '1,0', '2,0', '0,1', '1,1', '2,1']);
  });

  it('should visit every cell exactly once when partitioned', () => {
    configure({ maxPartitions: 3 });
    const visited = collect(regionOf(7, 9), true);
    expect(visited).toHaveLength(63);
    expect(new Set(visited).size).toBe(63);
  });

  it('should hand one task per band to the configured executor', () => {
    const batches: (readonly PartitionTask[])[] = [];
    configure({
      parallelMode: 'yes',
      maxPartitions: 3,
      executor: (tasks) => {
        batches.push(tasks);
        inlineExecutor(tasks);
      },
    });

    const visited = collect(regionOf(4, 4));

    expect(batches).toHaveLength(1);
    expect(batches[0].map((t) => [t.index, t.from, t.to])).toEqual([
      [0, 0, 2],
      [1, 2, 3],
      [2, 3, 4],
    ]);
    expect(visited).toHaveLength(16);
  });

  it('should not call the executor in no mode', () => {
    let calls = 0;
    configure({
      parallelMode: 'no',
      executor: (tasks) => {
        calls++;
        inlineExecutor(tasks);
      },
    });
    collect(regionOf(100, 100));
    expect(calls).toBe(0);
  });

  it('should use a custom policy', () => {
    const batches: number[] = [];
    configure({
      policy: { shouldParallelize: () => true, partitionCount: () => 2 },
      executor: (tasks) => {
        batches.push(tasks.length);
        inlineExecutor(tasks);
      },
    });
    collect(regionOf(5, 5));
    expect(batches).toEqual([2]);
  });

  it('should propagate errors from the command', () => {
    expect(() =>
      runCells(
        regionOf(2, 2),
        () => {
          throw new Error('cell failed');
        },
        true,
      ),
    ).toThrow('cell failed');
  });

  it('should do nothing for empty regions', () => {
    expect(collect(regionOf(0, 5), true)).toEqual([]);
    expect(regionSize(regionOf(0, 5))).toBe(0);
  });
});
