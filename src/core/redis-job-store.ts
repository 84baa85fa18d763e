// RedisJobStore - durable job queue backed by Redis
//
// Layout:
//   job:<id>                   hash with the job record
//   queue:<name>:all           every job, scored by created_at
//   queue:<name>:unfinished    not yet finished (failed jobs stay here), by created_at
//   queue:<name>:active        unfinished and not failed, by created_at
//   queue:<name>:failed        by failed_at
//   queue:<name>:finished      by finished_at
//   queue:<name>:scheduled     waiting to run, by scheduled_at

import Redis, { ChainableCommander } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { isQueueTier } from './config/queue-configurations.js';
import { JobStoreError } from './errors.js';
import { JobStoreInterface } from './interfaces/job-store.js';
import {
  AnalysisJob,
  EnqueueRequest,
  JobCountFilter,
  JobHandle,
  JobStatus,
  TimeRange,
} from './types/job.js';
import { QueueTier } from './types/queue.js';
import { Timestamp } from './types/timestamp.js';
import { Clock, systemClock } from './utils/clock.js';
import { getComponentLogger } from './utils/logger.js';
import { TimestampUtil } from './utils/timestamp.js';

const logger = getComponentLogger('job-store');

type QueueIndex = 'all' | 'unfinished' | 'active' | 'failed' | 'finished' | 'scheduled';

const JOB_STATUS_VALUES: readonly string[] = Object.values(JobStatus);

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUS_VALUES.includes(value);
}

export class RedisJobStore implements JobStoreInterface {
  constructor(
    private readonly redis: Redis,
    private readonly clock: Clock = systemClock
  ) {}

  static fromUrl(redisUrl: string, clock: Clock = systemClock): RedisJobStore {
    const redis = new Redis(redisUrl, {
      enableReadyCheck: true,
      maxRetriesPerRequest: 3,
    });

    redis.on('connect', () => logger.info('Redis connected'));
    redis.on('error', error => logger.error('Redis error:', error));

    return new RedisJobStore(redis, clock);
  }

  async disconnect(): Promise<void> {
    await this.redis.quit();
    logger.info('Redis job store disconnected');
  }

  async countJobs(queue: QueueTier, filter: JobCountFilter = {}): Promise<number> {
    if (filter.finished_between) {
      const { from, to } = filter.finished_between;
      return this.redis.zcount(this.key(queue, 'finished'), from, to);
    }

    switch (filter.state) {
      case 'unfinished':
        return this.redis.zcard(this.key(queue, 'unfinished'));
      case 'active':
        return this.redis.zcard(this.key(queue, 'active'));
      case 'failed':
        return this.redis.zcard(this.key(queue, 'failed'));
      case 'finished':
        return this.redis.zcard(this.key(queue, 'finished'));
      default:
        return this.redis.zcard(this.key(queue, 'all'));
    }
  }

  async findOldestUnfinished(queue: QueueTier): Promise<Timestamp | null> {
    const [, score] = await this.redis.zrange(this.key(queue, 'unfinished'), 0, 0, 'WITHSCORES');
    return TimestampUtil.fromStored(score) ?? null;
  }

  async listProcessingTimes(queue: QueueTier, range: TimeRange, limit?: number): Promise<number[]> {
    const finishedKey = this.key(queue, 'finished');
    const jobIds =
      limit === undefined
        ? await this.redis.zrevrangebyscore(finishedKey, range.to, range.from)
        : await this.redis.zrevrangebyscore(finishedKey, range.to, range.from, 'LIMIT', 0, limit);

    const rows = await Promise.all(
      jobIds.map(jobId => this.redis.hmget(`job:${jobId}`, 'created_at', 'finished_at'))
    );

    const durations: number[] = [];
    for (const [createdRaw, finishedRaw] of rows) {
      const createdAt = TimestampUtil.fromStored(createdRaw);
      const finishedAt = TimestampUtil.fromStored(finishedRaw);
      if (createdAt === undefined || finishedAt === undefined) continue;
      durations.push(TimestampUtil.diffSeconds(finishedAt, createdAt));
    }
    return durations;
  }

  async enqueue(request: EnqueueRequest): Promise<JobHandle> {
    const jobId = uuidv4();
    const createdAt = this.clock.now();
    const scheduledAt = TimestampUtil.addSeconds(createdAt, request.delay_seconds);
    const status = request.delay_seconds > 0 ? JobStatus.SCHEDULED : JobStatus.PENDING;

    const jobRecord: Record<string, string> = {
      id: jobId,
      type: request.type,
      queue_name: request.queue,
      priority: request.priority.toString(),
      payload: JSON.stringify(request.payload),
      status,
      created_at: createdAt.toString(),
      scheduled_at: scheduledAt.toString(),
      // Unbounded timeouts are stored empty
      timeout_seconds: Number.isFinite(request.timeout_seconds)
        ? request.timeout_seconds.toString()
        : '',
    };

    await this.exec(
      'enqueue',
      request.queue,
      this.redis
        .multi()
        .hset(`job:${jobId}`, jobRecord)
        .zadd(this.key(request.queue, 'all'), createdAt, jobId)
        .zadd(this.key(request.queue, 'unfinished'), createdAt, jobId)
        .zadd(this.key(request.queue, 'active'), createdAt, jobId)
        .zadd(this.key(request.queue, 'scheduled'), scheduledAt, jobId)
    );

    logger.debug(
      `Job ${jobId} stored in ${request.queue} (priority=${request.priority}, scheduled_at=${scheduledAt})`
    );

    return { job_id: jobId, queue: request.queue, scheduled_at: scheduledAt };
  }

  async getJob(jobId: string): Promise<AnalysisJob | null> {
    const data = await this.redis.hgetall(`job:${jobId}`);
    if (!data.id || !isQueueTier(data.queue_name) || !isJobStatus(data.status)) return null;

    const createdAt = TimestampUtil.fromStored(data.created_at);
    if (createdAt === undefined) return null;

    return {
      id: data.id,
      type: data.type,
      queue_name: data.queue_name,
      priority: parseInt(data.priority, 10),
      payload: parsePayload(data.payload),
      status: data.status,
      created_at: createdAt,
      scheduled_at: TimestampUtil.fromStored(data.scheduled_at) ?? createdAt,
      timeout_seconds: data.timeout_seconds
        ? parseInt(data.timeout_seconds, 10)
        : Number.POSITIVE_INFINITY,
      finished_at: TimestampUtil.fromStored(data.finished_at),
      failed_at: TimestampUtil.fromStored(data.failed_at),
      error: data.error || undefined,
    };
  }

  /**
   * Called by the worker fleet when a job completes.
   */
  async markJobFinished(jobId: string, finishedAt: Timestamp = this.clock.now()): Promise<boolean> {
    const job = await this.getJob(jobId);
    if (!job) {
      logger.warn(`Job ${jobId} not found, cannot mark finished`);
      return false;
    }

    const queue = job.queue_name;
    await this.exec(
      'finish',
      queue,
      this.redis
        .multi()
        .hset(`job:${jobId}`, {
          status: JobStatus.COMPLETED,
          finished_at: finishedAt.toString(),
        })
        .zrem(this.key(queue, 'unfinished'), jobId)
        .zrem(this.key(queue, 'active'), jobId)
        .zrem(this.key(queue, 'scheduled'), jobId)
        .zadd(this.key(queue, 'finished'), finishedAt, jobId)
    );

    logger.debug(`Job ${jobId} finished in ${queue}`);
    return true;
  }

  /**
   * Called by the worker fleet when a job fails. Failed jobs stay unfinished.
   */
  async markJobFailed(
    jobId: string,
    error: string,
    failedAt: Timestamp = this.clock.now()
  ): Promise<boolean> {
    const job = await this.getJob(jobId);
    if (!job) {
      logger.warn(`Job ${jobId} not found, cannot mark failed`);
      return false;
    }

    const queue = job.queue_name;
    await this.exec(
      'fail',
      queue,
      this.redis
        .multi()
        .hset(`job:${jobId}`, {
          status: JobStatus.FAILED,
          failed_at: failedAt.toString(),
          error,
        })
        .zrem(this.key(queue, 'active'), jobId)
        .zrem(this.key(queue, 'scheduled'), jobId)
        .zadd(this.key(queue, 'failed'), failedAt, jobId)
    );

    logger.info(`Job ${jobId} failed in ${queue}: ${error}`);
    return true;
  }

  private key(queue: QueueTier, index: QueueIndex): string {
    return `queue:${queue}:${index}`;
  }

  private async exec(
    operation: string,
    queue: QueueTier,
    transaction: ChainableCommander
  ): Promise<void> {
    const results = await transaction.exec();
    if (!results) {
      throw new JobStoreError(operation, queue, 'transaction aborted');
    }

    const failure = results.find(([error]) => error !== null);
    if (failure) {
      throw new JobStoreError(operation, queue, failure[0]);
    }
  }
}

function parsePayload(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    logger.warn('Stored job payload is not valid JSON', { error });
  }
  return {};
}
