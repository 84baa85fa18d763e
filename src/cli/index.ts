#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { config as loadEnv } from 'dotenv';
import { createQueueConfigurations } from '../core/config/queue-configurations.js';
import { loadManagerConfig } from '../core/config/manager-config.js';
import { IntelligentQueueManager } from '../core/queue-manager.js';
import { RedisJobStore } from '../core/redis-job-store.js';
import { REQUESTED_PRIORITIES, RequestedPriority, USER_TIERS, UserTier } from '../core/types/queue.js';
import { formatAssignmentPlan, formatHealthReport, formatOptimizationResult } from './report-format.js';

loadEnv();

const program = new Command();

program
  .name('queue-manager')
  .description('Inspect and tune the analysis job queues')
  .version('1.0.0')
  .option('--redis <url>', 'Redis URL (defaults to REDIS_URL)');

function parseSize(value: string): number {
  const size = Number(value);
  if (!Number.isFinite(size) || size < 0) {
    throw new InvalidArgumentError('File size must be a non-negative number of bytes.');
  }
  return size;
}

function parseUserTier(value: string): UserTier {
  const tier = USER_TIERS.find(candidate => candidate === value);
  if (!tier) {
    throw new InvalidArgumentError(`User tier must be one of: ${USER_TIERS.join(', ')}.`);
  }
  return tier;
}

function parsePriority(value: string): RequestedPriority {
  const priority = REQUESTED_PRIORITIES.find(candidate => candidate === value);
  if (!priority) {
    throw new InvalidArgumentError(`Priority must be one of: ${REQUESTED_PRIORITIES.join(', ')}.`);
  }
  return priority;
}

async function withManager<T>(
  action: (manager: IntelligentQueueManager) => Promise<T>
): Promise<T> {
  const config = loadManagerConfig();
  const redisOption: unknown = program.opts().redis;
  const redisUrl = typeof redisOption === 'string' ? redisOption : config.redisUrl;

  const store = RedisJobStore.fromUrl(redisUrl);
  const manager = new IntelligentQueueManager(store, {
    configurations: createQueueConfigurations(config.workerOverrides),
    peakHours: config.peakHours,
    peakApproachHours: config.peakApproachHours,
  });

  try {
    return await action(manager);
  } finally {
    await store.disconnect();
  }
}

function print(lines: string[]): void {
  lines.forEach(line => console.log(line));
}

program
  .command('report')
  .description('Analyze per-queue performance and overall health')
  .option('--json', 'Print the raw report as JSON')
  .action(async (options: { json?: boolean }) => {
    const report = await withManager(manager => manager.analyzeQueuePerformance());
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      print(formatHealthReport(report));
    }
  });

program
  .command('optimize')
  .description('Run one optimization cycle and print the advisories')
  .option('--json', 'Print the raw result as JSON')
  .action(async (options: { json?: boolean }) => {
    const result = await withManager(manager => manager.runOptimizationCycle());
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      print(formatHealthReport(result.performance_analysis));
      console.log('');
      print(formatOptimizationResult(result.optimization_results));
    }
  });

program
  .command('classify')
  .description('Show the assignment a submission would receive, without enqueuing it')
  .requiredOption('-s, --size <bytes>', 'File size in bytes', parseSize)
  .requiredOption('-f, --file <name>', 'File name or bare extension, e.g. report.xlsx or .xlsx')
  .option('-t, --tier <tier>', 'User tier', parseUserTier, 'free')
  .option('-p, --priority <priority>', 'Requested priority', parsePriority, 'normal')
  .action(
    async (options: {
      size: number;
      file: string;
      tier: UserTier;
      priority: RequestedPriority;
    }) => {
      const plan = await withManager(manager =>
        manager.planAssignment({
          file_size: options.size,
          file_name: options.file,
          user_tier: options.tier,
          requested_priority: options.priority,
        })
      );
      print(formatAssignmentPlan(plan));
    }
  );

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
