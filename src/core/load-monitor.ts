// LoadMonitor - per-queue statistics, load and health scoring, overload
// redirection and the periodic advisory optimization pass.
// Stateless: every call reads fresh aggregates from the job store.

import { ALL_QUEUE_TIERS } from './config/queue-configurations.js';
import { JobStoreError } from './errors.js';
import { JobStoreInterface } from './interfaces/job-store.js';
import {
  HealthStatus,
  OptimizationAction,
  OptimizationResult,
  OverallHealth,
  QueueAdjustment,
  QueueConfigurations,
  QueueHealthReport,
  QueuePerformanceMetrics,
  QueuePerformanceReport,
  QueueStatistics,
  QueueTier,
  ResponseTimePercentiles,
  ScalingAdvice,
  UserTier,
} from './types/queue.js';
import { Clock, systemClock } from './utils/clock.js';
import { getComponentLogger } from './utils/logger.js';
import { TimestampUtil } from './utils/timestamp.js';

const logger = getComponentLogger('load-monitor');

export const OVERLOAD_THRESHOLD = 0.85;
export const ALTERNATIVE_MAX_LOAD = 0.7;
export const CONGESTION_THRESHOLD = 0.8;
export const IDLE_THRESHOLD = 0.2;
export const MIN_CONGESTED_PENDING = 5;
export const HEALTH_ALERT_THRESHOLD = 0.7;

export const DEFAULT_PEAK_APPROACH_HOURS: readonly number[] = Object.freeze([8, 13]);

const PROCESSING_TIME_SAMPLE = 100;

const HEALTH_WEIGHTS = {
  success_rate: 0.3,
  low_failure_rate: 0.2,
  good_latency: 0.3,
  worker_efficiency: 0.2,
} as const;

export interface LoadMonitorOptions {
  clock?: Clock;
  peakApproachHours?: readonly number[];
}

interface CongestedQueue {
  queue: QueueTier;
  load: number;
  pending_jobs: number;
}

export class LoadMonitor {
  private readonly clock: Clock;
  private readonly peakApproachHours: readonly number[];

  constructor(
    private readonly store: JobStoreInterface,
    private readonly configurations: QueueConfigurations,
    options: LoadMonitorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.peakApproachHours = options.peakApproachHours ?? DEFAULT_PEAK_APPROACH_HOURS;
  }

  async getQueueStatistics(queue: QueueTier): Promise<QueueStatistics> {
    const now = this.clock.now();
    const lastHour = { from: TimestampUtil.subtractHours(now, 1), to: now };

    const [total, pending, failed, completed, active, processingTimes, oldest] = await this.read(
      'statistics read',
      queue,
      () =>
        Promise.all([
          this.store.countJobs(queue),
          this.store.countJobs(queue, { state: 'unfinished' }),
          this.store.countJobs(queue, { state: 'failed' }),
          this.store.countJobs(queue, { state: 'finished' }),
          this.store.countJobs(queue, { state: 'active' }),
          this.store.listProcessingTimes(queue, lastHour, PROCESSING_TIME_SAMPLE),
          this.store.findOldestUnfinished(queue),
        ])
    );

    return {
      total_jobs: total,
      pending_jobs: pending,
      failed_jobs: failed,
      completed_jobs: completed,
      avg_processing_time: average(processingTimes),
      current_workers: active,
      queue_latency: oldest === null ? 0 : Math.max(TimestampUtil.diffSeconds(now, oldest), 0),
    };
  }

  async getQueueCurrentLoad(queue: QueueTier): Promise<number> {
    return this.calculateLoad(queue, await this.getQueueStatistics(queue));
  }

  /**
   * 0.7 * worker utilization + 0.3 * pending ratio, capped at 1.
   * Running jobs stand in for busy workers.
   */
  calculateLoad(queue: QueueTier, stats: QueueStatistics): number {
    const maxWorkers = this.configurations[queue].max_workers;
    const workerUtilization = stats.current_workers / maxWorkers;
    const pendingRatio = stats.total_jobs > 0 ? stats.pending_jobs / stats.total_jobs : 0;

    return Math.min(workerUtilization * 0.7 + pendingRatio * 0.3, 1.0);
  }

  async adjustQueueIfNeeded(
    queue: QueueTier,
    fileSize: number,
    userTier: UserTier
  ): Promise<QueueAdjustment> {
    const currentLoad = await this.getQueueCurrentLoad(queue);

    if (currentLoad > OVERLOAD_THRESHOLD) {
      const alternative = await this.findAlternativeQueue(queue, fileSize, userTier);
      if (alternative) {
        logger.info(`Queue overloaded, redirecting from ${queue} to ${alternative}`, {
          load_factor: currentLoad,
        });
        return {
          queue: alternative,
          reason: 'original_queue_overloaded',
          original_queue: queue,
          load_factor: currentLoad,
        };
      }
      logger.warn(`Queue ${queue} overloaded (load ${currentLoad.toFixed(2)}) with no alternative`);
    }

    return {
      queue,
      reason: 'optimal_assignment',
      load_factor: currentLoad,
    };
  }

  /**
   * Least-loaded other queue that can take the file, is open to the user's
   * tier and is under 0.7 load.
   */
  async findAlternativeQueue(
    original: QueueTier,
    fileSize: number,
    userTier: UserTier
  ): Promise<QueueTier | null> {
    const candidates = ALL_QUEUE_TIERS.filter(tier => {
      const config = this.configurations[tier];
      return (
        tier !== original &&
        fileSize <= config.max_file_size &&
        (!config.eligible_user_tiers || config.eligible_user_tiers.includes(userTier))
      );
    });

    let best: { queue: QueueTier; load: number } | null = null;
    for (const queue of candidates) {
      const load = await this.getQueueCurrentLoad(queue);
      if (load >= ALTERNATIVE_MAX_LOAD) continue;
      if (!best || load < best.load) {
        best = { queue, load };
      }
    }

    return best ? best.queue : null;
  }

  async calculateQueuePerformance(
    queue: QueueTier,
    stats: QueueStatistics
  ): Promise<QueuePerformanceMetrics> {
    if (stats.total_jobs === 0) return defaultPerformanceMetrics();

    const [throughput, percentiles] = await Promise.all([
      this.calculateThroughput(queue),
      this.calculateResponseTimePercentiles(queue),
    ]);

    return {
      throughput,
      success_rate: stats.completed_jobs / stats.total_jobs,
      failure_rate: stats.failed_jobs / stats.total_jobs,
      avg_latency: stats.queue_latency,
      worker_efficiency: calculateWorkerEfficiency(stats),
      response_time_percentiles: percentiles,
    };
  }

  // Jobs finished in the last hour
  async calculateThroughput(queue: QueueTier): Promise<number> {
    const now = this.clock.now();
    return this.read('throughput read', queue, () =>
      this.store.countJobs(queue, {
        state: 'finished',
        finished_between: { from: TimestampUtil.subtractHours(now, 1), to: now },
      })
    );
  }

  async calculateResponseTimePercentiles(queue: QueueTier): Promise<ResponseTimePercentiles> {
    const now = this.clock.now();
    const durations = await this.read('response time read', queue, () =>
      this.store.listProcessingTimes(queue, { from: TimestampUtil.subtractHours(now, 24), to: now })
    );

    if (durations.length === 0) return { p50: 0, p95: 0, p99: 0 };

    const sorted = [...durations].sort((a, b) => a - b);
    return {
      p50: percentile(sorted, 50),
      p95: percentile(sorted, 95),
      p99: percentile(sorted, 99),
    };
  }

  async analyzeQueuePerformance(): Promise<QueueHealthReport> {
    const reports: Record<QueueTier, QueuePerformanceReport> = {
      [QueueTier.INSTANT]: await this.buildPerformanceReport(QueueTier.INSTANT),
      [QueueTier.FAST]: await this.buildPerformanceReport(QueueTier.FAST),
      [QueueTier.STANDARD]: await this.buildPerformanceReport(QueueTier.STANDARD),
      [QueueTier.PRIORITY]: await this.buildPerformanceReport(QueueTier.PRIORITY),
      [QueueTier.HEAVY]: await this.buildPerformanceReport(QueueTier.HEAVY),
      [QueueTier.ULTRA_HEAVY]: await this.buildPerformanceReport(QueueTier.ULTRA_HEAVY),
    };

    return {
      individual_queues: reports,
      overall_health: calculateOverallSystemHealth(reports),
      system_recommendations: generateSystemRecommendations(reports),
      analysis_timestamp: TimestampUtil.toISO(this.clock.now()),
    };
  }

  async buildPerformanceReport(queue: QueueTier): Promise<QueuePerformanceReport> {
    const stats = await this.getQueueStatistics(queue);
    const performance = await this.calculateQueuePerformance(queue, stats);

    return {
      stats,
      performance,
      health_score: calculateQueueHealthScore(performance),
      recommendations: generateQueueRecommendations(performance),
    };
  }

  /**
   * Periodic advisory pass. Already-queued jobs are never moved between
   * queues; congestion and idleness are reported for operators to act on.
   */
  async optimizeQueueAssignments(): Promise<OptimizationResult> {
    logger.info('Starting queue optimization');
    const startedAt = this.clock.now();
    const optimizations: OptimizationAction[] = [];

    const loads = new Map<QueueTier, { load: number; stats: QueueStatistics }>();
    for (const queue of ALL_QUEUE_TIERS) {
      const stats = await this.getQueueStatistics(queue);
      loads.set(queue, { load: this.calculateLoad(queue, stats), stats });
    }

    const congested: CongestedQueue[] = [];
    loads.forEach(({ load, stats }, queue) => {
      if (load > CONGESTION_THRESHOLD) {
        congested.push({ queue, load, pending_jobs: stats.pending_jobs });
      }
    });

    for (const info of congested) {
      const alert = this.redistributeCongestedQueue(info);
      if (alert) optimizations.push(alert);
    }

    const idleQueues = ALL_QUEUE_TIERS.filter(queue => {
      const entry = loads.get(queue);
      return entry !== undefined && entry.load < IDLE_THRESHOLD;
    });
    if (idleQueues.length > 0) {
      optimizations.push({
        action: 'idle_workers_detected',
        idle_queues: idleQueues,
        recommendation: 'Consider reducing worker allocation for idle queues',
      });
    }

    const predictive = this.applyPredictiveScaling();
    if (predictive) optimizations.push(predictive);

    const elapsed = this.clock.now() - startedAt;
    logger.info(
      `Queue optimization completed: ${optimizations.length} optimizations applied in ${elapsed}ms`
    );

    return {
      optimizations_applied: optimizations,
      optimization_time_ms: elapsed,
      performance_improvement:
        optimizations.length > 0 ? '5-15% improvement expected' : 'No optimizations needed',
    };
  }

  redistributeCongestedQueue(info: CongestedQueue): OptimizationAction | null {
    // Small backlogs clear on their own
    if (info.pending_jobs < MIN_CONGESTED_PENDING) return null;

    logger.info(`Queue ${info.queue} is congested with ${info.pending_jobs} pending jobs`, {
      load: info.load,
    });

    return {
      action: 'congestion_alert',
      queue: info.queue,
      pending_jobs: info.pending_jobs,
      recommendation: 'Consider manual intervention or worker scaling',
    };
  }

  applyPredictiveScaling(): OptimizationAction | null {
    if (!this.peakApproachHours.includes(this.clock.currentHour())) return null;

    return {
      action: 'predictive_scaling',
      reason: 'peak_hours_approaching',
      recommendation: 'Prepare for increased load in the next hour',
    };
  }

  /**
   * Post-enqueue check on the queue that received the job. Scaling itself
   * happens at the infrastructure level; this only decides and logs.
   */
  async monitorAndScaleQueue(queue: QueueTier): Promise<ScalingAdvice> {
    const stats = await this.getQueueStatistics(queue);

    let advice: ScalingAdvice = 'none';
    if (shouldScaleUp(stats)) {
      advice = 'scale_up';
      logger.info(`Scaling up queue ${queue} - high load detected`, {
        pending_jobs: stats.pending_jobs,
        current_workers: stats.current_workers,
      });
    } else if (shouldScaleDown(stats)) {
      advice = 'scale_down';
      logger.info(`Scaling down queue ${queue} - low utilization`, {
        current_workers: stats.current_workers,
      });
    }

    const performance = await this.calculateQueuePerformance(queue, stats);
    const healthScore = calculateQueueHealthScore(performance);
    if (healthScore < HEALTH_ALERT_THRESHOLD) {
      logger.warn(
        `Queue health issue: ${queue} score=${healthScore.toFixed(2)} ` +
          `pending=${stats.pending_jobs} failed=${stats.failed_jobs}`
      );
    }

    return advice;
  }

  private async read<T>(operation: string, queue: QueueTier, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new JobStoreError(operation, queue, error);
    }
  }
}

export function shouldScaleUp(stats: QueueStatistics): boolean {
  const backlogPerWorker = stats.pending_jobs / Math.max(stats.current_workers, 1);
  return backlogPerWorker > 3 && stats.avg_processing_time > 60;
}

export function shouldScaleDown(stats: QueueStatistics): boolean {
  return stats.pending_jobs === 0 && stats.current_workers > 1;
}

export function calculateWorkerEfficiency(stats: QueueStatistics): number {
  if (stats.avg_processing_time === 0) return 0.8;
  return Math.max(1.0 - stats.queue_latency / 3600.0, 0.1);
}

export function calculateLatencyScore(latencySeconds: number): number {
  if (latencySeconds <= 30) return 1.0;
  if (latencySeconds <= 120) return 0.8;
  if (latencySeconds <= 300) return 0.6;
  if (latencySeconds <= 600) return 0.4;
  return 0.2;
}

export function calculateQueueHealthScore(metrics: QueuePerformanceMetrics): number {
  const score =
    HEALTH_WEIGHTS.success_rate * metrics.success_rate +
    HEALTH_WEIGHTS.low_failure_rate * (1 - metrics.failure_rate) +
    HEALTH_WEIGHTS.good_latency * calculateLatencyScore(metrics.avg_latency) +
    HEALTH_WEIGHTS.worker_efficiency * metrics.worker_efficiency;

  return Math.min(Math.max(score, 0), 1);
}

export function generateQueueRecommendations(metrics: QueuePerformanceMetrics): string[] {
  const recommendations: string[] = [];

  if (metrics.failure_rate > 0.05) {
    recommendations.push('High failure rate detected - investigate error patterns');
  }
  if (metrics.avg_latency > 300) {
    recommendations.push('High latency - consider increasing worker capacity');
  }
  if (metrics.worker_efficiency < 0.6) {
    recommendations.push('Low worker efficiency - optimize job processing logic');
  }
  if (metrics.throughput < 10) {
    recommendations.push('Low throughput - review queue configuration');
  }

  return recommendations;
}

export function healthStatus(score: number): HealthStatus {
  if (score >= 0.8) return 'excellent';
  if (score >= 0.6) return 'good';
  if (score >= 0.4) return 'fair';
  if (score >= 0.2) return 'poor';
  return 'critical';
}

export function calculateOverallSystemHealth(
  reports: Partial<Record<QueueTier, QueuePerformanceReport>>
): OverallHealth {
  const entries = queueEntries(reports);
  const averageHealth =
    entries.length > 0
      ? entries.reduce((sum, [, report]) => sum + report.health_score, 0) / entries.length
      : 0;

  let worst: [QueueTier, QueuePerformanceReport] | null = null;
  let best: [QueueTier, QueuePerformanceReport] | null = null;
  for (const entry of entries) {
    if (!worst || entry[1].health_score < worst[1].health_score) worst = entry;
    if (!best || entry[1].health_score > best[1].health_score) best = entry;
  }

  return {
    overall_score: averageHealth,
    status: healthStatus(averageHealth),
    worst_performing_queue: worst ? worst[0] : null,
    best_performing_queue: best ? best[0] : null,
  };
}

export function generateSystemRecommendations(
  reports: Partial<Record<QueueTier, QueuePerformanceReport>>
): string[] {
  const entries = queueEntries(reports);
  if (entries.length === 0) return [];

  const recommendations: string[] = [];
  const averageHealth =
    entries.reduce((sum, [, report]) => sum + report.health_score, 0) / entries.length;

  if (averageHealth < 0.7) {
    recommendations.push('System health below optimal - consider scaling up resources');
  }

  const struggling = entries.filter(([, report]) => report.health_score < 0.6);
  if (struggling.length > 0) {
    recommendations.push(`${struggling.length} queues need attention`);
  }

  return recommendations;
}

// Nearest-rank percentile over an ascending array
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(index, 0)];
}

export function defaultPerformanceMetrics(): QueuePerformanceMetrics {
  return {
    throughput: 0,
    success_rate: 1.0,
    failure_rate: 0.0,
    avg_latency: 0,
    worker_efficiency: 0.8,
    response_time_percentiles: { p50: 0, p95: 0, p99: 0 },
  };
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function queueEntries(
  reports: Partial<Record<QueueTier, QueuePerformanceReport>>
): Array<[QueueTier, QueuePerformanceReport]> {
  const entries: Array<[QueueTier, QueuePerformanceReport]> = [];
  for (const queue of ALL_QUEUE_TIERS) {
    const report = reports[queue];
    if (report) entries.push([queue, report]);
  }
  return entries;
}
