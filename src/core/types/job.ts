// Job types - analysis job records as kept by the job store

import { Timestamp } from './timestamp.js';
import { QueueTier } from './queue.js';

export interface AnalysisJob {
  id: string;
  type: string;
  queue_name: QueueTier;
  priority: number;
  payload: Record<string, unknown>;
  status: JobStatus;
  created_at: Timestamp;
  scheduled_at: Timestamp;
  timeout_seconds?: number;
  finished_at?: Timestamp;
  failed_at?: Timestamp;
  error?: string;
}

export enum JobStatus {
  PENDING = 'pending',
  SCHEDULED = 'scheduled',
  FAILED = 'failed',
  COMPLETED = 'completed',
}

// Buckets the monitor counts by. A failed job stays unfinished until it is
// retried or discarded, so it is counted in both `unfinished` and `failed`.
export type JobState = 'unfinished' | 'active' | 'failed' | 'finished';

export interface TimeRange {
  from: Timestamp;
  to: Timestamp;
}

export interface JobCountFilter {
  state?: JobState;
  finished_between?: TimeRange;
}

export interface EnqueueRequest {
  type: string;
  queue: QueueTier;
  priority: number;
  delay_seconds: number;
  timeout_seconds: number;
  payload: Record<string, unknown>;
}

export interface JobHandle {
  job_id: string;
  queue: QueueTier;
  scheduled_at: Timestamp;
}
