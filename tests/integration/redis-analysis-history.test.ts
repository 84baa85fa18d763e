// Integration tests for the similar-file history store

import { describe, test, expect, beforeEach } from '@jest/globals';
import type Redis from 'ioredis';
import { RedisAnalysisHistory } from '../../src/core/redis-analysis-history.js';
import { createTestRedis } from '../utils/redis.js';

describe('RedisAnalysisHistory', () => {
  let redis: Redis;
  let history: RedisAnalysisHistory;

  beforeEach(async () => {
    redis = createTestRedis();
    await redis.flushall();
    history = new RedisAnalysisHistory(redis);
  });

  test('should return nothing before any analysis is recorded', async () => {
    await expect(history.findSimilar(1000, 0.2, 10)).resolves.toEqual([]);
  });

  test('should find analyses within the size tolerance, smallest first', async () => {
    await history.record({ file_size: 700, historical_ai_tier: 1 });
    await history.record({ file_size: 1150, historical_ai_tier: 3 });
    await history.record({ file_size: 850, historical_ai_tier: 2 });
    await history.record({ file_size: 1300, historical_ai_tier: 1 });

    await expect(history.findSimilar(1000, 0.2, 10)).resolves.toEqual([
      { file_size: 850, historical_ai_tier: 2 },
      { file_size: 1150, historical_ai_tier: 3 },
    ]);
  });

  test('should keep repeated sizes as separate records', async () => {
    await history.record({ file_size: 1000, historical_ai_tier: 1 });
    await history.record({ file_size: 1000, historical_ai_tier: 1 });
    await history.record({ file_size: 1000, historical_ai_tier: 1 });

    await expect(history.findSimilar(1000, 0.2, 2)).resolves.toHaveLength(2);
    await expect(redis.zcard('analysis:history')).resolves.toBe(3);
  });

  test('should use a custom key', async () => {
    const scoped = new RedisAnalysisHistory(redis, 'tenant-a:history');
    await scoped.record({ file_size: 1000, historical_ai_tier: 2 });

    await expect(history.findSimilar(1000, 0.2, 10)).resolves.toEqual([]);
    await expect(scoped.findSimilar(1000, 0.2, 10)).resolves.toEqual([
      { file_size: 1000, historical_ai_tier: 2 },
    ]);
  });
});
