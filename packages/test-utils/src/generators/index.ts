export { generateTransformTests } from './transform-operations';
export { generateElementWiseTests } from './element-wise-operations';
export { generateTraversalTests } from './traversal-operations';
export {
  executionConfigs,
  referenceGrid,
  reversedExecutor,
  rowByRowArrayFactory,
  runIn,
  sequentialMatrix,
} from './execution';
export type { ExecutionConfig, TestFramework } from './execution';
