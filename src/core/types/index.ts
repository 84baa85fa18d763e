// Core type definitions

export type { Timestamp } from './timestamp.js';

export * from './queue.js';

export { JobStatus } from './job.js';
export type {
  AnalysisJob,
  JobState,
  JobCountFilter,
  TimeRange,
  EnqueueRequest,
  JobHandle,
} from './job.js';
