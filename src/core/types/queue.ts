// Queue types - tier configuration, submissions, assignments and health reports

export enum QueueTier {
  INSTANT = 'instant_processing',
  FAST = 'fast_processing',
  STANDARD = 'standard_processing',
  PRIORITY = 'priority_processing',
  HEAVY = 'heavy_processing',
  ULTRA_HEAVY = 'ultra_heavy',
}

export const USER_TIERS = ['free', 'basic', 'pro', 'enterprise'] as const;
export type UserTier = (typeof USER_TIERS)[number];

export const REQUESTED_PRIORITIES = ['urgent', 'high', 'normal', 'low'] as const;
export type RequestedPriority = (typeof REQUESTED_PRIORITIES)[number];

export interface QueueTierConfig {
  max_file_size: number; // bytes, Infinity for unbounded
  max_complexity: number; // 0-1
  max_workers: number;
  timeout_seconds: number; // Infinity for unbounded
  priority_base: number;
  eligible_user_tiers?: readonly UserTier[];
}

export type QueueConfigurations = Readonly<Record<QueueTier, Readonly<QueueTierConfig>>>;

export interface SimilarFileRecord {
  file_size: number;
  historical_ai_tier: number;
}

// At least one of file_name / file_extension is required
export interface SubmissionRequest {
  file_size: number;
  file_name?: string;
  file_extension?: string;
  user_tier: UserTier;
  requested_priority?: RequestedPriority;
  similar_file_history?: SimilarFileRecord[];
  file_id?: string;
  user_id?: string;
  payload?: Record<string, unknown>;
}

export type AdjustmentReason = 'optimal_assignment' | 'original_queue_overloaded';

export interface QueueAdjustment {
  queue: QueueTier;
  reason: AdjustmentReason;
  original_queue?: QueueTier;
  load_factor: number;
}

export interface QueueAssignment {
  queue: QueueTier;
  priority: number;
  delay_seconds: number;
  estimated_processing_time: string;
  queue_adjustment: QueueAdjustment;
  job_id: string;
  assignment_time_ms: number;
}

export interface QueueStatistics {
  total_jobs: number;
  pending_jobs: number;
  failed_jobs: number;
  completed_jobs: number;
  avg_processing_time: number; // seconds
  current_workers: number;
  queue_latency: number; // seconds since the oldest unfinished job was created
}

export interface ResponseTimePercentiles {
  p50: number;
  p95: number;
  p99: number;
}

export interface QueuePerformanceMetrics {
  throughput: number; // jobs finished in the last hour
  success_rate: number;
  failure_rate: number;
  avg_latency: number;
  worker_efficiency: number;
  response_time_percentiles: ResponseTimePercentiles;
}

export interface QueuePerformanceReport {
  stats: QueueStatistics;
  performance: QueuePerformanceMetrics;
  health_score: number;
  recommendations: string[];
}

export type HealthStatus = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';

export interface OverallHealth {
  overall_score: number;
  status: HealthStatus;
  worst_performing_queue: QueueTier | null;
  best_performing_queue: QueueTier | null;
}

export interface QueueHealthReport {
  individual_queues: Record<QueueTier, QueuePerformanceReport>;
  overall_health: OverallHealth;
  system_recommendations: string[];
  analysis_timestamp: string;
}

export type OptimizationAction =
  | {
      action: 'congestion_alert';
      queue: QueueTier;
      pending_jobs: number;
      recommendation: string;
    }
  | {
      action: 'idle_workers_detected';
      idle_queues: QueueTier[];
      recommendation: string;
    }
  | {
      action: 'predictive_scaling';
      reason: 'peak_hours_approaching';
      recommendation: string;
    };

export interface OptimizationResult {
  optimizations_applied: OptimizationAction[];
  optimization_time_ms: number;
  performance_improvement: string;
}

export interface OptimizationCycleResult {
  performance_analysis: QueueHealthReport;
  optimization_results: OptimizationResult;
  timestamp: string;
}

export type ScalingAdvice = 'scale_up' | 'scale_down' | 'none';
