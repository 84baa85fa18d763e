// OptimizationScheduler - runs the queue optimization cycle on a fixed
// interval, outside the request path

import { QueueManagerInterface } from '../core/interfaces/queue-manager.js';
import { OptimizationCycleResult } from '../core/types/queue.js';
import { getComponentLogger } from '../core/utils/logger.js';

const logger = getComponentLogger('scheduler');

export interface OptimizationSchedulerConfig {
  intervalMs: number;
  runOnStart?: boolean;
}

export class OptimizationScheduler {
  private timer?: NodeJS.Timeout;
  private lastResult?: OptimizationCycleResult;
  private cycleCount = 0;

  constructor(
    private readonly manager: QueueManagerInterface,
    private readonly config: OptimizationSchedulerConfig
  ) {}

  start(): void {
    if (this.timer) return;

    logger.info(`Starting queue optimization with ${this.config.intervalMs / 1000}s interval`);

    if (this.config.runOnStart) {
      void this.runCycle();
    }

    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      logger.info('Stopped queue optimization task');
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  getLastResult(): OptimizationCycleResult | undefined {
    return this.lastResult;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  /**
   * One cycle. Errors are logged and the next tick proceeds; every action the
   * cycle takes is advisory, so overlapping runs are harmless.
   */
  async runCycle(): Promise<OptimizationCycleResult | undefined> {
    try {
      const result = await this.manager.runOptimizationCycle();
      this.lastResult = result;
      this.cycleCount += 1;

      const health = result.performance_analysis.overall_health;
      if (health.status === 'poor' || health.status === 'critical') {
        logger.warn(
          `Queue system health ${health.status} (score ${health.overall_score.toFixed(2)}), ` +
            `worst queue: ${health.worst_performing_queue}`
        );
      }
      return result;
    } catch (error) {
      logger.error('Error in queue optimization cycle:', error);
      return undefined;
    }
  }
}
