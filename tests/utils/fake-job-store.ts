// In-process job store stand-in with fixed per-queue aggregates
import { jest } from '@jest/globals';
import { QUEUE_CONFIGURATIONS } from '../../src/core/config/queue-configurations.js';
import type { JobStoreInterface } from '../../src/core/interfaces/job-store.js';
import type {
  EnqueueRequest,
  JobCountFilter,
  JobHandle,
  TimeRange,
} from '../../src/core/types/job.js';
import { QueueTier } from '../../src/core/types/queue.js';

export interface QueueSnapshot {
  total: number;
  unfinished: number;
  active: number;
  failed: number;
  finished: number;
  finished_last_hour: number;
  // durations (seconds) of jobs finished in the last hour / last 24 hours
  recent_processing_times: number[];
  daily_processing_times: number[];
  oldest_unfinished: number | null;
}

export const emptySnapshot = (): QueueSnapshot => ({
  total: 0,
  unfinished: 0,
  active: 0,
  failed: 0,
  finished: 0,
  finished_last_hour: 0,
  recent_processing_times: [],
  daily_processing_times: [],
  oldest_unfinished: null,
});

const ONE_HOUR_MS = 60 * 60 * 1000;

export class FakeJobStore implements JobStoreInterface {
  private snapshots = new Map<QueueTier, QueueSnapshot>();
  private nextJobId = 1;

  readonly enqueued: EnqueueRequest[] = [];

  setQueue(queue: QueueTier, snapshot: Partial<QueueSnapshot>): void {
    this.snapshots.set(queue, { ...emptySnapshot(), ...snapshot });
  }

  // Every worker busy and every job waiting: load 1.0
  saturate(queue: QueueTier): void {
    const workers = QUEUE_CONFIGURATIONS[queue].max_workers;
    this.setQueue(queue, { total: 10, unfinished: 10, active: workers });
  }

  saturateAll(except: QueueTier[] = []): void {
    Object.values(QueueTier)
      .filter(queue => !except.includes(queue))
      .forEach(queue => this.saturate(queue));
  }

  countJobs = jest.fn(async (queue: QueueTier, filter: JobCountFilter = {}): Promise<number> => {
    const snapshot = this.snapshot(queue);
    if (filter.finished_between) return snapshot.finished_last_hour;

    switch (filter.state) {
      case 'unfinished':
        return snapshot.unfinished;
      case 'active':
        return snapshot.active;
      case 'failed':
        return snapshot.failed;
      case 'finished':
        return snapshot.finished;
      default:
        return snapshot.total;
    }
  });

  findOldestUnfinished = jest.fn(async (queue: QueueTier): Promise<number | null> => {
    return this.snapshot(queue).oldest_unfinished;
  });

  listProcessingTimes = jest.fn(
    async (queue: QueueTier, range: TimeRange, limit?: number): Promise<number[]> => {
      const snapshot = this.snapshot(queue);
      const times =
        range.to - range.from <= ONE_HOUR_MS
          ? snapshot.recent_processing_times
          : snapshot.daily_processing_times;
      return limit === undefined ? [...times] : times.slice(0, limit);
    }
  );

  enqueue = jest.fn(async (request: EnqueueRequest): Promise<JobHandle> => {
    this.enqueued.push(request);
    const jobId = `job-${this.nextJobId++}`;
    return { job_id: jobId, queue: request.queue, scheduled_at: 0 };
  });

  private snapshot(queue: QueueTier): QueueSnapshot {
    return this.snapshots.get(queue) ?? emptySnapshot();
  }
}
