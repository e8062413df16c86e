/**
 * Tests for environment-driven and programmatic settings
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_PARALLEL_THRESHOLD,
  configure,
  getParallelMode,
  getSettings,
  isParallelMode,
  loadSettingsFromEnv,
  resetSettings,
  setParallelMode,
  withParallelMode,
} from './config';
import { ConfigurationError } from './errors';

afterEach(() => {
  resetSettings();
  vi.restoreAllMocks();
});

describe('loadSettingsFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    const settings = loadSettingsFromEnv({});
    expect(settings.parallelMode).toBe('default');
    expect(settings.parallelThreshold).toBe(DEFAULT_PARALLEL_THRESHOLD);
    expect(settings.maxPartitions).toBeGreaterThanOrEqual(1);
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it('should read every variable', () => {
    const settings = loadSettingsFromEnv({
      GRIDMAT_PARALLEL: ' No ',
      GRIDMAT_PARALLEL_THRESHOLD: '100',
      GRIDMAT_PARALLEL_PARTITIONS: '3',
    });
    expect(settings).toEqual({ parallelMode: 'no', parallelThreshold: 100, maxPartitions: 3 });
  });

  it('should warn and keep the default for unusable values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const settings = loadSettingsFromEnv({
      GRIDMAT_PARALLEL: 'often',
      GRIDMAT_PARALLEL_THRESHOLD: 'abc',
      GRIDMAT_PARALLEL_PARTITIONS: '0',
    });

    expect(settings.parallelMode).toBe('default');
    expect(settings.parallelThreshold).toBe(DEFAULT_PARALLEL_THRESHOLD);
    expect(settings.maxPartitions).toBeGreaterThanOrEqual(1);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(1, "Ignoring GRIDMAT_PARALLEL=often, using 'default'");
    expect(warn).toHaveBeenNthCalledWith(2, 'Ignoring GRIDMAT_PARALLEL_THRESHOLD=abc, using 8192');
  });

  it('should reject negative thresholds', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const settings = loadSettingsFromEnv({ GRIDMAT_PARALLEL_THRESHOLD: '-5' });
    expect(settings.parallelThreshold).toBe(DEFAULT_PARALLEL_THRESHOLD);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('configure', () => {
  it('should override only the given fields', () => {
    const before = getSettings();
    const after = configure({ parallelThreshold: 10 });
    expect(after.parallelThreshold).toBe(10);
    expect(after.parallelMode).toBe(before.parallelMode);
    expect(after.maxPartitions).toBe(before.maxPartitions);
    expect(getSettings()).toBe(after);
  });

  it('should validate values', () => {
    expect(() => configure({ parallelThreshold: -1 })).toThrow(ConfigurationError);
    expect(() => configure({ maxPartitions: 0 })).toThrow(ConfigurationError);
    expect(() => configure({ maxPartitions: 1.5 })).toThrow(ConfigurationError);
  });

  it('should restore the environment defaults on reset', () => {
    const before = getSettings();
    configure({ parallelMode: 'yes', maxPartitions: 2 });
    resetSettings();
    expect(getSettings()).toBe(before);
  });
});

describe('parallel mode', () => {
  it('should recognise the three modes', () => {
    expect(isParallelMode('yes')).toBe(true);
    expect(isParallelMode('no')).toBe(true);
    expect(isParallelMode('default')).toBe(true);
    expect(isParallelMode('always')).toBe(false);
    expect(isParallelMode(1)).toBe(false);
  });

  it('should set and read the mode', () => {
    setParallelMode('yes');
    expect(getParallelMode()).toBe('yes');
  });

  it('should scope a mode to a block', () => {
    setParallelMode('default');
    const seen = withParallelMode('no', () => getParallelMode());
    expect(seen).toBe('no');
    expect(getParallelMode()).toBe('default');
  });

  it('should restore the previous mode after a throw', () => {
    setParallelMode('yes');
    expect(() =>
      withParallelMode('no', () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(getParallelMode()).toBe('yes');
  });
});
