// RedisAnalysisHistory - finished analyses indexed by file size, so the
// complexity estimator can look up files of similar size.
// Members are "<ai_tier>|<uuid>" in a sorted set scored by file size.

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { AnalysisHistoryInterface } from './interfaces/analysis-history.js';
import { SimilarFileRecord } from './types/queue.js';
import { getComponentLogger } from './utils/logger.js';

const logger = getComponentLogger('analysis-history');

export const ANALYSIS_HISTORY_KEY = 'analysis:history';

export class RedisAnalysisHistory implements AnalysisHistoryInterface {
  constructor(
    private readonly redis: Redis,
    private readonly key: string = ANALYSIS_HISTORY_KEY
  ) {}

  async record(entry: SimilarFileRecord): Promise<void> {
    await this.redis.zadd(this.key, entry.file_size, `${entry.historical_ai_tier}|${uuidv4()}`);
    logger.debug(
      `Recorded analysis history: size=${entry.file_size}, ai_tier=${entry.historical_ai_tier}`
    );
  }

  async findSimilar(
    fileSize: number,
    tolerance: number,
    limit: number
  ): Promise<SimilarFileRecord[]> {
    const result = await this.redis.zrangebyscore(
      this.key,
      fileSize * (1 - tolerance),
      fileSize * (1 + tolerance),
      'WITHSCORES',
      'LIMIT',
      0,
      limit
    );

    const records: SimilarFileRecord[] = [];
    for (let i = 0; i + 1 < result.length; i += 2) {
      const aiTier = parseFloat(result[i].split('|')[0]);
      const size = parseFloat(result[i + 1]);
      if (Number.isNaN(aiTier) || Number.isNaN(size)) continue;
      records.push({ file_size: size, historical_ai_tier: aiTier });
    }
    return records;
  }
}
