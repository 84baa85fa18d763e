// Unit tests for CLI report rendering

import { describe, test, expect, beforeAll } from '@jest/globals';
import chalk from 'chalk';
import {
  formatAssignmentPlan,
  formatHealthReport,
  formatOptimizationResult,
} from '../../../src/cli/report-format.js';
import type { AssignmentPlan } from '../../../src/core/queue-manager.js';
import { QueueTier } from '../../../src/core/types/queue.js';
import { createHealthReport, idleQueueReport } from '../../fixtures/reports.js';

describe('report formatting', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('formatHealthReport', () => {
    test('should print the overall status and one line per queue', () => {
      const lines = formatHealthReport(createHealthReport());

      expect(lines[0]).toBe('Queue health at 2025-03-04T12:00:00.000Z');
      expect(lines[1]).toBe(
        'Overall: excellent (score 0.96, best instant_processing, worst heavy_processing)'
      );
      expect(lines[3]).toBe(
        'instant_processing   health=0.96 total=0 pending=0 failed=0 throughput=0/h p95=0.0s'
      );
      expect(lines[4]).toBe('  - Low throughput - review queue configuration');
      expect(lines).toHaveLength(15);
    });

    test('should append system recommendations', () => {
      const report = createHealthReport('fair', 0.5);
      report.system_recommendations = ['2 queues need attention'];
      report.individual_queues[QueueTier.FAST] = idleQueueReport({ recommendations: [] });

      const lines = formatHealthReport(report);

      expect(lines.slice(-2)).toEqual(['System recommendations:', '  - 2 queues need attention']);
      expect(lines).toHaveLength(17);
    });
  });

  describe('formatOptimizationResult', () => {
    test('should describe each advisory', () => {
      const lines = formatOptimizationResult({
        optimizations_applied: [
          {
            action: 'congestion_alert',
            queue: QueueTier.INSTANT,
            pending_jobs: 12,
            recommendation: 'Consider manual intervention or worker scaling',
          },
          {
            action: 'idle_workers_detected',
            idle_queues: [QueueTier.HEAVY, QueueTier.ULTRA_HEAVY],
            recommendation: 'Consider reducing worker allocation for idle queues',
          },
          {
            action: 'predictive_scaling',
            reason: 'peak_hours_approaching',
            recommendation: 'Prepare for increased load in the next hour',
          },
        ],
        optimization_time_ms: 4,
        performance_improvement: '5-15% improvement expected',
      });

      expect(lines).toEqual([
        '3 optimizations (5-15% improvement expected)',
        '  congestion_alert instant_processing: 12 pending - Consider manual intervention or worker scaling',
        '  idle_workers_detected heavy_processing, ultra_heavy - Consider reducing worker allocation for idle queues',
        '  predictive_scaling peak_hours_approaching - Prepare for increased load in the next hour',
      ]);
    });
  });

  describe('formatAssignmentPlan', () => {
    const plan: AssignmentPlan = {
      submission: {
        file_size: 819200,
        file_name: 'sales.csv',
        user_tier: 'free',
        requested_priority: 'normal',
      },
      complexity: 0.25,
      classified_queue: QueueTier.INSTANT,
      priority: 60,
      delay_seconds: 15,
      estimated_processing_time: '19초',
      queue_adjustment: {
        queue: QueueTier.FAST,
        reason: 'original_queue_overloaded',
        original_queue: QueueTier.INSTANT,
        load_factor: 1,
      },
    };

    test('should list the decision and the redirect', () => {
      expect(formatAssignmentPlan(plan)).toEqual([
        'queue:          fast_processing',
        'complexity:     0.250',
        'priority:       60',
        'delay:          15s',
        'estimated time: 19초',
        'load factor:    1.00',
        'redirected from instant_processing (overloaded)',
      ]);
    });
  });
});
