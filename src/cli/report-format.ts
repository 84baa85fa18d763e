// Plain-text rendering of queue reports for the CLI

import chalk from 'chalk';
import { ALL_QUEUE_TIERS } from '../core/config/queue-configurations.js';
import { AssignmentPlan } from '../core/queue-manager.js';
import { HealthStatus, OptimizationResult, QueueHealthReport } from '../core/types/queue.js';

const STATUS_COLORS: Record<HealthStatus, (text: string) => string> = {
  excellent: chalk.green,
  good: chalk.green,
  fair: chalk.yellow,
  poor: chalk.red,
  critical: chalk.red,
};

export function formatHealthReport(report: QueueHealthReport): string[] {
  const { overall_health: overall } = report;
  const lines: string[] = [
    chalk.bold(`Queue health at ${report.analysis_timestamp}`),
    `Overall: ${STATUS_COLORS[overall.status](overall.status)} ` +
      `(score ${overall.overall_score.toFixed(2)}, best ${overall.best_performing_queue ?? '-'}, ` +
      `worst ${overall.worst_performing_queue ?? '-'})`,
    '',
  ];

  for (const queue of ALL_QUEUE_TIERS) {
    const entry = report.individual_queues[queue];
    const { stats, performance } = entry;
    lines.push(
      `${queue.padEnd(20)} health=${entry.health_score.toFixed(2)} ` +
        `total=${stats.total_jobs} pending=${stats.pending_jobs} failed=${stats.failed_jobs} ` +
        `throughput=${performance.throughput}/h p95=${performance.response_time_percentiles.p95.toFixed(1)}s`
    );
    for (const recommendation of entry.recommendations) {
      lines.push(chalk.gray(`  - ${recommendation}`));
    }
  }

  if (report.system_recommendations.length > 0) {
    lines.push('', chalk.bold('System recommendations:'));
    for (const recommendation of report.system_recommendations) {
      lines.push(chalk.yellow(`  - ${recommendation}`));
    }
  }

  return lines;
}

export function formatOptimizationResult(result: OptimizationResult): string[] {
  const lines = [
    chalk.bold(
      `${result.optimizations_applied.length} optimizations (${result.performance_improvement})`
    ),
  ];

  for (const optimization of result.optimizations_applied) {
    switch (optimization.action) {
      case 'congestion_alert':
        lines.push(
          `  congestion_alert ${optimization.queue}: ${optimization.pending_jobs} pending - ` +
            optimization.recommendation
        );
        break;
      case 'idle_workers_detected':
        lines.push(
          `  idle_workers_detected ${optimization.idle_queues.join(', ')} - ` +
            optimization.recommendation
        );
        break;
      case 'predictive_scaling':
        lines.push(`  predictive_scaling ${optimization.reason} - ${optimization.recommendation}`);
        break;
    }
  }

  return lines;
}

export function formatAssignmentPlan(plan: AssignmentPlan): string[] {
  const adjustment = plan.queue_adjustment;
  const lines = [
    `queue:          ${adjustment.queue}`,
    `complexity:     ${plan.complexity.toFixed(3)}`,
    `priority:       ${plan.priority}`,
    `delay:          ${plan.delay_seconds}s`,
    `estimated time: ${plan.estimated_processing_time}`,
    `load factor:    ${adjustment.load_factor.toFixed(2)}`,
  ];

  if (adjustment.reason === 'original_queue_overloaded') {
    lines.push(chalk.yellow(`redirected from ${adjustment.original_queue} (overloaded)`));
  }

  return lines;
}
