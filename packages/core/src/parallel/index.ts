export type {
  CellCommand,
  CellRegion,
  ParallelPolicy,
  PartitionExecutor,
  PartitionTask,
} from './types';
export { thresholdPolicy, currentPolicy, shouldParallelize } from './policy';
export {
  inlineExecutor,
  partitionRange,
  regionOf,
  regionSize,
  createPartitionTasks,
  runCells,
} from './scheduler';
