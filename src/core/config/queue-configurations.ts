// Static queue tier table. Created once, deep-frozen, and injected into the
// classifier and monitor; nothing mutates it at runtime.

import { QueueConfigurations, QueueTier, QueueTierConfig } from '../types/queue.js';

export const MEGABYTE = 1024 * 1024;

// Fallback order for general submissions; priority_processing is gated by user tier
export const GENERAL_TIER_ORDER: readonly QueueTier[] = Object.freeze([
  QueueTier.INSTANT,
  QueueTier.FAST,
  QueueTier.STANDARD,
  QueueTier.HEAVY,
]);

export const ALL_QUEUE_TIERS: readonly QueueTier[] = Object.freeze([
  QueueTier.INSTANT,
  QueueTier.FAST,
  QueueTier.STANDARD,
  QueueTier.PRIORITY,
  QueueTier.HEAVY,
  QueueTier.ULTRA_HEAVY,
]);

const QUEUE_TIER_VALUES: readonly string[] = Object.values(QueueTier);

export function isQueueTier(value: string): value is QueueTier {
  return QUEUE_TIER_VALUES.includes(value);
}

const DEFAULT_TIERS: Record<QueueTier, QueueTierConfig> = {
  [QueueTier.INSTANT]: {
    max_file_size: 1 * MEGABYTE,
    max_complexity: 0.3,
    max_workers: 4,
    timeout_seconds: 10,
    priority_base: 100,
  },
  [QueueTier.FAST]: {
    max_file_size: 10 * MEGABYTE,
    max_complexity: 0.6,
    max_workers: 6,
    timeout_seconds: 30,
    priority_base: 80,
  },
  [QueueTier.STANDARD]: {
    max_file_size: 50 * MEGABYTE,
    max_complexity: 0.8,
    max_workers: 4,
    timeout_seconds: 2 * 60,
    priority_base: 60,
  },
  [QueueTier.PRIORITY]: {
    max_file_size: 50 * MEGABYTE,
    max_complexity: 0.8,
    max_workers: 8,
    timeout_seconds: 2 * 60,
    priority_base: 90,
    eligible_user_tiers: ['pro', 'enterprise'],
  },
  [QueueTier.HEAVY]: {
    max_file_size: Number.POSITIVE_INFINITY,
    max_complexity: 1.0,
    max_workers: 2,
    timeout_seconds: 10 * 60,
    priority_base: 40,
  },
  [QueueTier.ULTRA_HEAVY]: {
    max_file_size: Number.POSITIVE_INFINITY,
    max_complexity: 1.0,
    max_workers: 1,
    timeout_seconds: Number.POSITIVE_INFINITY,
    priority_base: 20,
  },
};

/**
 * Build a frozen configuration table, optionally overriding worker counts
 * per tier (e.g. from QUEUE_MAX_WORKERS). Thresholds are not overridable.
 */
export function createQueueConfigurations(
  workerOverrides: Partial<Record<QueueTier, number>> = {}
): QueueConfigurations {
  const freezeTier = (tier: QueueTier): Readonly<QueueTierConfig> => {
    const base = DEFAULT_TIERS[tier];
    return Object.freeze({
      ...base,
      max_workers: workerOverrides[tier] ?? base.max_workers,
      eligible_user_tiers: base.eligible_user_tiers
        ? Object.freeze([...base.eligible_user_tiers])
        : undefined,
    });
  };

  return Object.freeze({
    [QueueTier.INSTANT]: freezeTier(QueueTier.INSTANT),
    [QueueTier.FAST]: freezeTier(QueueTier.FAST),
    [QueueTier.STANDARD]: freezeTier(QueueTier.STANDARD),
    [QueueTier.PRIORITY]: freezeTier(QueueTier.PRIORITY),
    [QueueTier.HEAVY]: freezeTier(QueueTier.HEAVY),
    [QueueTier.ULTRA_HEAVY]: freezeTier(QueueTier.ULTRA_HEAVY),
  });
}

export const QUEUE_CONFIGURATIONS: QueueConfigurations = createQueueConfigurations();
