// Unit tests for the queue tier table

import { describe, test, expect } from '@jest/globals';
import {
  ALL_QUEUE_TIERS,
  MEGABYTE,
  QUEUE_CONFIGURATIONS,
  createQueueConfigurations,
  isQueueTier,
} from '../../../src/core/config/queue-configurations.js';
import { QueueTier } from '../../../src/core/types/queue.js';

describe('queue configurations', () => {
  test('should define every tier', () => {
    expect(Object.keys(QUEUE_CONFIGURATIONS).sort()).toEqual([...ALL_QUEUE_TIERS].sort());
  });

  test('should carry the tier thresholds', () => {
    expect(QUEUE_CONFIGURATIONS[QueueTier.INSTANT]).toEqual({
      max_file_size: 1 * MEGABYTE,
      max_complexity: 0.3,
      max_workers: 4,
      timeout_seconds: 10,
      priority_base: 100,
      eligible_user_tiers: undefined,
    });
    expect(QUEUE_CONFIGURATIONS[QueueTier.PRIORITY].eligible_user_tiers).toEqual([
      'pro',
      'enterprise',
    ]);
    expect(QUEUE_CONFIGURATIONS[QueueTier.ULTRA_HEAVY].timeout_seconds).toBe(Infinity);
  });

  test('should be deeply frozen', () => {
    expect(Object.isFrozen(QUEUE_CONFIGURATIONS)).toBe(true);
    expect(Object.isFrozen(QUEUE_CONFIGURATIONS[QueueTier.FAST])).toBe(true);
    expect(Object.isFrozen(QUEUE_CONFIGURATIONS[QueueTier.PRIORITY].eligible_user_tiers)).toBe(true);
  });

  test('should override worker counts only', () => {
    const configurations = createQueueConfigurations({ [QueueTier.HEAVY]: 5 });

    expect(configurations[QueueTier.HEAVY].max_workers).toBe(5);
    expect(configurations[QueueTier.HEAVY].max_complexity).toBe(1.0);
    expect(configurations[QueueTier.FAST].max_workers).toBe(6);
    expect(QUEUE_CONFIGURATIONS[QueueTier.HEAVY].max_workers).toBe(2);
  });

  test('isQueueTier', () => {
    expect(isQueueTier('ultra_heavy')).toBe(true);
    expect(isQueueTier('ULTRA_HEAVY')).toBe(false);
  });
});
