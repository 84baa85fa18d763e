#!/usr/bin/env node
// Queue optimization service entry point
// Periodically analyzes queue health and logs advisory optimizations

import { config as loadEnv } from 'dotenv';
import { createQueueConfigurations } from '../core/config/queue-configurations.js';
import { loadManagerConfig } from '../core/config/manager-config.js';
import { IntelligentQueueManager } from '../core/queue-manager.js';
import { RedisJobStore } from '../core/redis-job-store.js';
import { getComponentLogger } from '../core/utils/logger.js';
import { OptimizationScheduler } from './optimization-scheduler.js';

const logger = getComponentLogger('service');

loadEnv();

async function main(): Promise<void> {
  const config = loadManagerConfig();

  logger.info('Starting queue optimization service...');
  logger.info(`Redis: ${config.redisUrl}`);

  const store = RedisJobStore.fromUrl(config.redisUrl);
  const manager = new IntelligentQueueManager(store, {
    configurations: createQueueConfigurations(config.workerOverrides),
    peakHours: config.peakHours,
    peakApproachHours: config.peakApproachHours,
  });
  const scheduler = new OptimizationScheduler(manager, {
    intervalMs: config.optimizationIntervalMs,
    runOnStart: true,
  });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      scheduler.stop();
      await store.disconnect();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  scheduler.start();
  logger.info('Queue optimization service is running');
}

main().catch(error => {
  logger.error('Failed to start queue optimization service:', error);
  process.exit(1);
});
