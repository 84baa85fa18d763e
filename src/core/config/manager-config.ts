// Manager configuration - read from the environment and validated with zod.
// Invalid values stop the process at startup instead of surfacing mid-cycle.

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { QueueTier } from '../types/queue.js';
import { isQueueTier } from './queue-configurations.js';

const hourList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(value =>
      value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0)
        .map(Number)
    )
    .pipe(z.array(z.number().int().min(0).max(23)));

// "instant_processing:6,heavy_processing:3"
const workerOverrides = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const overrides: Partial<Record<QueueTier, number>> = {};
    if (!value) return overrides;

    for (const pair of value.split(',')) {
      const [name, count] = pair.split(':').map(part => part.trim());
      const workers = Number(count);
      if (!isQueueTier(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown queue "${name}"` });
        continue;
      }
      if (!Number.isInteger(workers) || workers < 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `worker count for ${name} must be a positive integer, got "${count}"`,
        });
        continue;
      }
      overrides[name] = workers;
    }
    return overrides;
  });

// setInterval delays are signed 32-bit milliseconds
export const MAX_INTERVAL_SEC = Math.floor((2 ** 31 - 1) / 1000);

export const ManagerEnvSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  OPTIMIZATION_INTERVAL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_INTERVAL_SEC, `must be at most ${MAX_INTERVAL_SEC} seconds`)
    .default(300),
  PEAK_HOURS: hourList('9,10,11,14,15,16'),
  PEAK_APPROACH_HOURS: hourList('8,13'),
  QUEUE_MAX_WORKERS: workerOverrides,
});

export interface ManagerConfig {
  redisUrl: string;
  optimizationIntervalMs: number;
  peakHours: readonly number[];
  peakApproachHours: readonly number[];
  workerOverrides: Partial<Record<QueueTier, number>>;
}

export function loadManagerConfig(env: NodeJS.ProcessEnv = process.env): ManagerConfig {
  const result = ManagerEnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid queue manager configuration - ${issues.join('; ')}`);
  }

  const parsed = result.data;
  return {
    redisUrl: parsed.REDIS_URL,
    optimizationIntervalMs: parsed.OPTIMIZATION_INTERVAL_SEC * 1000,
    peakHours: Object.freeze(parsed.PEAK_HOURS),
    peakApproachHours: Object.freeze(parsed.PEAK_APPROACH_HOURS),
    workerOverrides: parsed.QUEUE_MAX_WORKERS,
  };
}
