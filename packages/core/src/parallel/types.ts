/**
 * Types for partitioned execution of cell-wise workloads
 */

/**
 * Decides whether a bulk operation is split into bands, and into how many
 */
export interface ParallelPolicy {
  shouldParallelize(cellCount: number): boolean;
  partitionCount(outerLength: number): number;
}

/**
 * Half-open cell region [fromRow, toRow) x [fromCol, toCol)
 */
export interface CellRegion {
  readonly fromRow: number;
  readonly toRow: number;
  readonly fromCol: number;
  readonly toCol: number;
}

export type CellCommand = (row: number, col: number) => void;

/**
 * One band of a partitioned operation. `axis` names the outer index the
 * band covers; the band visits every inner index of the region for each
 * outer index in [from, to).
 */
export interface PartitionTask {
  readonly index: number;
  readonly axis: 'row' | 'col';
  readonly from: number;
  readonly to: number;
  run(): void;
}

/**
 * Runs every task before returning. Tasks never share an output cell.
 */
export type PartitionExecutor = (tasks: readonly PartitionTask[]) => void;
