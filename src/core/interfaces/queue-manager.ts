// QueueManager interface - admission and periodic optimization entry points

import {
  OptimizationCycleResult,
  QueueAssignment,
  QueueHealthReport,
  OptimizationResult,
  SubmissionRequest,
} from '../types/queue.js';

export interface QueueManagerInterface {
  enqueueAnalysis(request: SubmissionRequest): Promise<QueueAssignment>;

  analyzeQueuePerformance(): Promise<QueueHealthReport>;
  optimizeQueueAssignments(): Promise<OptimizationResult>;
  runOptimizationCycle(): Promise<OptimizationCycleResult>;
}
