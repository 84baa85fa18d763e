// JobStore interface - the durable job queue the manager admits work into.
// Reads return 0 / null / [] when there is nothing to report; connectivity
// failures propagate to the caller.

import { QueueTier } from '../types/queue.js';
import { Timestamp } from '../types/timestamp.js';
import { EnqueueRequest, JobCountFilter, JobHandle, TimeRange } from '../types/job.js';

export interface JobStoreInterface {
  // Aggregates
  countJobs(queue: QueueTier, filter?: JobCountFilter): Promise<number>;
  findOldestUnfinished(queue: QueueTier): Promise<Timestamp | null>;

  // created -> finished durations in seconds, most recently finished first
  listProcessingTimes(queue: QueueTier, range: TimeRange, limit?: number): Promise<number[]>;

  // Admission
  enqueue(request: EnqueueRequest): Promise<JobHandle>;
}
