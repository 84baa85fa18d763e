// Priority and delay calculation for admitted jobs

import { MEGABYTE } from './config/queue-configurations.js';
import { RequestedPriority, UserTier } from './types/queue.js';

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 200;

export const DEFAULT_PEAK_HOURS: readonly number[] = Object.freeze([9, 10, 11, 14, 15, 16]);
export const PEAK_HOUR_DELAY_SECONDS = 3;

const BASE_SCORE: Readonly<Record<RequestedPriority, number>> = {
  urgent: 100,
  high: 75,
  normal: 50,
  low: 25,
};

const TIER_BONUS: Readonly<Record<UserTier, number>> = {
  enterprise: 30,
  pro: 20,
  basic: 10,
  free: 5,
};

const LARGE_FILE_THRESHOLD = 20 * MEGABYTE;

export function calculatePriorityScore(
  fileSize: number,
  complexity: number,
  userTier: UserTier,
  requestedPriority: RequestedPriority = 'normal'
): number {
  const complexityAdjustment = Math.round(complexity * 20);
  const sizePenalty = fileSize > LARGE_FILE_THRESHOLD ? -5 : 0;

  const score =
    BASE_SCORE[requestedPriority] + TIER_BONUS[userTier] + complexityAdjustment + sizePenalty;

  return Math.max(Math.min(score, MAX_PRIORITY), MIN_PRIORITY);
}

/**
 * Admission delay for a queue at the given load. Busier queues hold new work
 * back longer; peak hours add a flat extra delay.
 */
export function calculateDelayForLoad(
  load: number,
  hour: number,
  peakHours: readonly number[] = DEFAULT_PEAK_HOURS
): number {
  let baseDelay: number;
  if (load <= 0.3) baseDelay = 0;
  else if (load <= 0.6) baseDelay = 2;
  else if (load <= 0.8) baseDelay = 5;
  else if (load <= 0.9) baseDelay = 10;
  else baseDelay = 15;

  const timeAdjustment = peakHours.includes(hour) ? PEAK_HOUR_DELAY_SECONDS : 0;
  return baseDelay + timeAdjustment;
}

export function estimateProcessingSeconds(fileSize: number, complexity: number): number {
  let baseTime: number;
  if (fileSize <= 1 * MEGABYTE) baseTime = 15;
  else if (fileSize <= 10 * MEGABYTE) baseTime = 45;
  else if (fileSize <= 50 * MEGABYTE) baseTime = 120;
  else baseTime = 300;

  return Math.round(baseTime * (1 + complexity));
}

// "45초", "2분", "1.5시간"
export function formatProcessingTime(seconds: number): string {
  if (seconds < 60) return `${seconds}초`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}분`;
  return `${(Math.round((seconds / 3600) * 10) / 10).toFixed(1)}시간`;
}

export function estimateProcessingTime(fileSize: number, complexity: number): string {
  return formatProcessingTime(estimateProcessingSeconds(fileSize, complexity));
}
