// Unit tests for environment configuration

import { describe, test, expect } from '@jest/globals';
import { loadManagerConfig } from '../../../src/core/config/manager-config.js';
import { ConfigurationError } from '../../../src/core/errors.js';
import { QueueTier } from '../../../src/core/types/queue.js';

describe('loadManagerConfig', () => {
  test('should apply defaults for an empty environment', () => {
    expect(loadManagerConfig({})).toEqual({
      redisUrl: 'redis://localhost:6379',
      optimizationIntervalMs: 300_000,
      peakHours: [9, 10, 11, 14, 15, 16],
      peakApproachHours: [8, 13],
      workerOverrides: {},
    });
  });

  test('should read values from the environment', () => {
    const config = loadManagerConfig({
      REDIS_URL: 'redis://cache.internal:6380/2',
      OPTIMIZATION_INTERVAL_SEC: '60',
      PEAK_HOURS: '8, 9,17',
      PEAK_APPROACH_HOURS: '7',
      QUEUE_MAX_WORKERS: 'instant_processing:6, heavy_processing:3',
    });

    expect(config).toEqual({
      redisUrl: 'redis://cache.internal:6380/2',
      optimizationIntervalMs: 60_000,
      peakHours: [8, 9, 17],
      peakApproachHours: [7],
      workerOverrides: {
        [QueueTier.INSTANT]: 6,
        [QueueTier.HEAVY]: 3,
      },
    });
    expect(Object.isFrozen(config.peakHours)).toBe(true);
  });

  test('should reject an out-of-range hour', () => {
    expect(() => loadManagerConfig({ PEAK_HOURS: '9,25' })).toThrow(ConfigurationError);
    expect(() => loadManagerConfig({ PEAK_HOURS: '9,25' })).toThrow(/PEAK_HOURS/);
  });

  test('should reject a non-positive interval', () => {
    expect(() => loadManagerConfig({ OPTIMIZATION_INTERVAL_SEC: '0' })).toThrow(
      /^Invalid queue manager configuration - OPTIMIZATION_INTERVAL_SEC: /
    );
  });

  test('should cap the interval at what a timer can hold', () => {
    expect(loadManagerConfig({ OPTIMIZATION_INTERVAL_SEC: '2147483' }).optimizationIntervalMs).toBe(
      2_147_483_000
    );
    expect(() => loadManagerConfig({ OPTIMIZATION_INTERVAL_SEC: '2147484' })).toThrow(
      'Invalid queue manager configuration - OPTIMIZATION_INTERVAL_SEC: must be at most 2147483 seconds'
    );
  });

  test('should reject unknown queues and bad worker counts', () => {
    expect(() => loadManagerConfig({ QUEUE_MAX_WORKERS: 'turbo:3' })).toThrow(
      'Invalid queue manager configuration - QUEUE_MAX_WORKERS: unknown queue "turbo"'
    );
    expect(() => loadManagerConfig({ QUEUE_MAX_WORKERS: 'fast_processing:0' })).toThrow(
      'QUEUE_MAX_WORKERS: worker count for fast_processing must be a positive integer, got "0"'
    );
  });
});
