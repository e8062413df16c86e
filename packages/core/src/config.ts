/**
 * Runtime settings for bulk matrix operations
 *
 * Defaults come from the environment once, at module load:
 * - GRIDMAT_PARALLEL: 'yes' | 'no' | 'default'
 * - GRIDMAT_PARALLEL_THRESHOLD: cell count above which 'default' partitions work
 * - GRIDMAT_PARALLEL_PARTITIONS: maximum number of bands per operation
 *
 * `configure()` overrides them programmatically.
 */

import { availableParallelism } from 'node:os';
import { ConfigurationError } from './errors';
import type { ParallelPolicy, PartitionExecutor } from './parallel/types';

/**
 * Whether bulk operations are partitioned
 * - yes: always, regardless of size
 * - no: never
 * - default: only when the affected region exceeds `parallelThreshold` cells
 */
export type ParallelMode = 'yes' | 'no' | 'default';

export const PARALLEL_MODES: readonly ParallelMode[] = ['yes', 'no', 'default'];

/**
 * Cell count above which 'default' mode partitions a bulk operation
 */
export const DEFAULT_PARALLEL_THRESHOLD = 8192;

export interface MatrixSettings {
  readonly parallelMode: ParallelMode;
  readonly parallelThreshold: number;
  readonly maxPartitions: number;
  /**
   * Replaces the threshold policy built from the fields above
   */
  readonly policy?: ParallelPolicy;
  /**
   * Runs the band tasks of a partitioned operation
   */
  readonly executor?: PartitionExecutor;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function isParallelMode(value: unknown): value is ParallelMode {
  return typeof value === 'string' && (PARALLEL_MODES as readonly string[]).includes(value);
}

function parseInteger(raw: string, min: number): number | undefined {
  if (!/^\d+$/.test(raw.trim())) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value >= min ? value : undefined;
}

/**
 * Build settings from environment variables, keeping the default for any
 * variable that is unset or unusable
 */
export function loadSettingsFromEnv(env: EnvSource = process.env): MatrixSettings {
  let parallelMode: ParallelMode = 'default';
  let parallelThreshold = DEFAULT_PARALLEL_THRESHOLD;
  let maxPartitions = Math.max(1, availableParallelism());

  const mode = env['GRIDMAT_PARALLEL'];
  if (mode !== undefined && mode !== '') {
    const normalized = mode.trim().toLowerCase();
    if (isParallelMode(normalized)) {
      parallelMode = normalized;
    } else {
      console.warn(`Ignoring GRIDMAT_PARALLEL=${mode}, using '${parallelMode}'`);
    }
  }

  const threshold = env['GRIDMAT_PARALLEL_THRESHOLD'];
  if (threshold !== undefined && threshold !== '') {
    const parsed = parseInteger(threshold, 0);
    if (parsed === undefined) {
      console.warn(`Ignoring GRIDMAT_PARALLEL_THRESHOLD=${threshold}, using ${parallelThreshold.toString()}`);
    } else {
      parallelThreshold = parsed;
    }
  }

  const partitions = env['GRIDMAT_PARALLEL_PARTITIONS'];
  if (partitions !== undefined && partitions !== '') {
    const parsed = parseInteger(partitions, 1);
    if (parsed === undefined) {
      console.warn(`Ignoring GRIDMAT_PARALLEL_PARTITIONS=${partitions}, using ${maxPartitions.toString()}`);
    } else {
      maxPartitions = parsed;
    }
  }

  return Object.freeze({ parallelMode, parallelThreshold, maxPartitions });
}

const envDefaults = loadSettingsFromEnv();
let current: MatrixSettings = envDefaults;

export function getSettings(): MatrixSettings {
  return current;
}

/**
 * Override settings; omitted fields keep their current value
 */
export function configure(overrides: Partial<MatrixSettings>): MatrixSettings {
  const next = { ...current, ...overrides };

  if (!isParallelMode(next.parallelMode)) {
    throw new ConfigurationError('parallelMode', next.parallelMode, "'yes', 'no' or 'default'");
  }
  if (!Number.isSafeInteger(next.parallelThreshold) || next.parallelThreshold < 0) {
    throw new ConfigurationError('parallelThreshold', next.parallelThreshold, 'a non-negative integer');
  }
  if (!Number.isSafeInteger(next.maxPartitions) || next.maxPartitions < 1) {
    throw new ConfigurationError('maxPartitions', next.maxPartitions, 'a positive integer');
  }

  current = Object.freeze(next);
  return current;
}

/**
 * Restore the environment-derived defaults
 */
export function resetSettings(): void {
  current = envDefaults;
}

export function getParallelMode(): ParallelMode {
  return current.parallelMode;
}

export function setParallelMode(mode: ParallelMode): void {
  configure({ parallelMode: mode });
}

/**
 * Run `fn` with `mode` in effect, restoring the previous mode afterwards
 *
 * @example
 * const doubled = withParallelMode('no', () => m.map((v) => v * 2));
 */
export function withParallelMode<R>(mode: ParallelMode, fn: () => R): R {
  const previous = current.parallelMode;
  setParallelMode(mode);
  try {
    return fn();
  } finally {
    configure({ parallelMode: previous });
  }
}
