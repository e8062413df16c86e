/**
 * Size-adaptive parallel policy
 */

import { getSettings } from '../config';
import type { MatrixSettings } from '../config';
import type { ParallelPolicy } from './types';

/**
 * The default policy: mode 'yes' always partitions, 'no' never does, and
 * 'default' partitions once the region exceeds `parallelThreshold` cells
 */
export function thresholdPolicy(
  settings: Pick<MatrixSettings, 'parallelMode' | 'parallelThreshold' | 'maxPartitions'>,
): ParallelPolicy {
  const { parallelMode, parallelThreshold, maxPartitions } = settings;

  return {
    shouldParallelize(cellCount: number): boolean {
      switch (parallelMode) {
        case 'yes':
          return cellCount > 0;
        case 'no':
          return false;
        case 'default':
          return cellCount > parallelThreshold;
      }
    },
    partitionCount(outerLength: number): number {
      return Math.max(1, Math.min(maxPartitions, outerLength));
    },
  };
}

/**
 * Policy in effect for the current settings
 */
export function currentPolicy(): ParallelPolicy {
  const settings = getSettings();
  return settings.policy ?? thresholdPolicy(settings);
}

export function shouldParallelize(cellCount: number): boolean {
  return currentPolicy().shouldParallelize(cellCount);
}
