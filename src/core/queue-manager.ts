// IntelligentQueueManager - admits analysis jobs into the queue tier that fits
// the file, the user and the current load.
//
// Submission flow:
//   estimate complexity -> classify tier -> priority -> delay
//   -> overload adjustment -> enqueue -> post-enqueue scaling check

import {
  ComplexityEstimator,
  SIMILAR_FILE_LIMIT,
  SIMILAR_SIZE_TOLERANCE,
} from './complexity-estimator.js';
import { MEGABYTE, QUEUE_CONFIGURATIONS } from './config/queue-configurations.js';
import { AnalysisHistoryInterface } from './interfaces/analysis-history.js';
import { JobStoreInterface } from './interfaces/job-store.js';
import { QueueManagerInterface } from './interfaces/queue-manager.js';
import { LoadMonitor } from './load-monitor.js';
import {
  DEFAULT_PEAK_HOURS,
  calculateDelayForLoad,
  calculatePriorityScore,
  estimateProcessingTime,
} from './priority-calculator.js';
import { QueueClassifier } from './queue-classifier.js';
import {
  OptimizationCycleResult,
  OptimizationResult,
  QueueAdjustment,
  QueueAssignment,
  QueueConfigurations,
  QueueHealthReport,
  QueueTier,
  RequestedPriority,
  SimilarFileRecord,
  SubmissionRequest,
  UserTier,
} from './types/queue.js';
import { Clock, systemClock } from './utils/clock.js';
import { getComponentLogger } from './utils/logger.js';
import { TimestampUtil } from './utils/timestamp.js';
import { ValidatedSubmission, validateSubmission } from './validation.js';

const logger = getComponentLogger('queue-manager');

export const ANALYSIS_JOB_TYPE = 'excel_analysis';

export interface AssignmentPlan {
  submission: ValidatedSubmission;
  complexity: number;
  classified_queue: QueueTier;
  priority: number;
  delay_seconds: number;
  estimated_processing_time: string;
  queue_adjustment: QueueAdjustment;
}

export interface QueueManagerOptions {
  configurations?: QueueConfigurations;
  clock?: Clock;
  history?: AnalysisHistoryInterface;
  peakHours?: readonly number[];
  peakApproachHours?: readonly number[];
}

export class IntelligentQueueManager implements QueueManagerInterface {
  readonly estimator: ComplexityEstimator;
  readonly classifier: QueueClassifier;
  readonly monitor: LoadMonitor;

  private readonly configurations: QueueConfigurations;
  private readonly clock: Clock;
  private readonly history?: AnalysisHistoryInterface;
  private readonly peakHours: readonly number[];

  constructor(
    private readonly store: JobStoreInterface,
    options: QueueManagerOptions = {}
  ) {
    this.configurations = options.configurations ?? QUEUE_CONFIGURATIONS;
    this.clock = options.clock ?? systemClock;
    this.history = options.history;
    this.peakHours = options.peakHours ?? DEFAULT_PEAK_HOURS;

    this.estimator = new ComplexityEstimator();
    this.classifier = new QueueClassifier(this.configurations);
    this.monitor = new LoadMonitor(store, this.configurations, {
      clock: this.clock,
      peakApproachHours: options.peakApproachHours,
    });
  }

  async enqueueAnalysis(request: SubmissionRequest): Promise<QueueAssignment> {
    const startedAt = this.clock.now();
    const plan = await this.planAssignment(request);
    const { submission, queue_adjustment: adjustment } = plan;
    const finalQueue = adjustment.queue;

    const handle = await this.store.enqueue({
      type: ANALYSIS_JOB_TYPE,
      queue: finalQueue,
      priority: plan.priority,
      delay_seconds: plan.delay_seconds,
      timeout_seconds: this.configurations[finalQueue].timeout_seconds,
      payload: {
        ...submission.payload,
        file_id: submission.file_id,
        user_id: submission.user_id,
        file_name: submission.file_name,
        file_extension: submission.file_extension,
        file_size: submission.file_size,
      },
    });

    await this.checkQueueScaling(finalQueue);

    const assignment: QueueAssignment = {
      queue: finalQueue,
      priority: plan.priority,
      delay_seconds: plan.delay_seconds,
      estimated_processing_time: plan.estimated_processing_time,
      queue_adjustment: adjustment,
      job_id: handle.job_id,
      assignment_time_ms: this.clock.now() - startedAt,
    };

    logger.info('Queue assignment completed', assignment);
    return assignment;
  }

  /**
   * Everything enqueueAnalysis decides, without touching the queue.
   */
  async planAssignment(request: SubmissionRequest): Promise<AssignmentPlan> {
    const submission = validateSubmission(request);
    const fileSize = submission.file_size;

    const complexity = await this.estimateComplexity(submission);

    logger.info(
      `Intelligent queue assignment: file_size=${(fileSize / MEGABYTE).toFixed(2)}MB, ` +
        `complexity=${complexity.toFixed(3)}, user_tier=${submission.user_tier}`
    );

    const queue = this.determineOptimalQueue(fileSize, complexity, submission.user_tier);
    const priority = this.calculatePriorityScore(
      fileSize,
      complexity,
      submission.user_tier,
      submission.requested_priority
    );
    // Delay follows the load of the classified queue, before any redirect
    const delaySeconds = await this.calculateOptimalDelay(queue);
    const adjustment = await this.adjustQueueIfNeeded(queue, fileSize, submission.user_tier);

    logger.info(
      `Queue assignment: ${adjustment.queue} (priority: ${priority}, wait: ${delaySeconds}s, ` +
        `adjustment: ${adjustment.reason})`
    );

    return {
      submission,
      complexity,
      classified_queue: queue,
      priority,
      delay_seconds: delaySeconds,
      estimated_processing_time: estimateProcessingTime(fileSize, complexity),
      queue_adjustment: adjustment,
    };
  }

  /**
   * Uses the history carried on the submission; falls back to the analysis
   * history store when the submission carries none.
   */
  async estimateComplexity(submission: ValidatedSubmission): Promise<number> {
    let history: SimilarFileRecord[] = submission.similar_file_history ?? [];

    if (!submission.similar_file_history && this.history) {
      history = await this.history.findSimilar(
        submission.file_size,
        SIMILAR_SIZE_TOLERANCE,
        SIMILAR_FILE_LIMIT
      );
    }

    return this.estimator.estimateComplexity({
      file_size: submission.file_size,
      file_name: submission.file_name,
      file_extension: submission.file_extension,
      similar_file_history: history,
    });
  }

  determineOptimalQueue(fileSize: number, complexity: number, userTier: UserTier): QueueTier {
    return this.classifier.determineOptimalQueue(fileSize, complexity, userTier);
  }

  calculatePriorityScore(
    fileSize: number,
    complexity: number,
    userTier: UserTier,
    requestedPriority: RequestedPriority = 'normal'
  ): number {
    return calculatePriorityScore(fileSize, complexity, userTier, requestedPriority);
  }

  async calculateOptimalDelay(queue: QueueTier): Promise<number> {
    const load = await this.monitor.getQueueCurrentLoad(queue);
    return calculateDelayForLoad(load, this.clock.currentHour(), this.peakHours);
  }

  adjustQueueIfNeeded(
    queue: QueueTier,
    fileSize: number,
    userTier: UserTier
  ): Promise<QueueAdjustment> {
    return this.monitor.adjustQueueIfNeeded(queue, fileSize, userTier);
  }

  analyzeQueuePerformance(): Promise<QueueHealthReport> {
    return this.monitor.analyzeQueuePerformance();
  }

  optimizeQueueAssignments(): Promise<OptimizationResult> {
    return this.monitor.optimizeQueueAssignments();
  }

  async runOptimizationCycle(): Promise<OptimizationCycleResult> {
    logger.info('Running queue optimization cycle');

    const performanceAnalysis = await this.analyzeQueuePerformance();
    const optimizationResults = await this.optimizeQueueAssignments();

    logger.info(
      `Queue optimization cycle completed: ${optimizationResults.optimizations_applied.length} ` +
        `optimizations, overall health: ${performanceAnalysis.overall_health.status}`
    );

    return {
      performance_analysis: performanceAnalysis,
      optimization_results: optimizationResults,
      timestamp: TimestampUtil.toISO(this.clock.now()),
    };
  }

  // The job is already stored; a failed advisory check must not fail the submission
  private async checkQueueScaling(queue: QueueTier): Promise<void> {
    try {
      await this.monitor.monitorAndScaleQueue(queue);
    } catch (error) {
      logger.error(`Post-enqueue scaling check failed for ${queue}:`, error);
    }
  }
}
