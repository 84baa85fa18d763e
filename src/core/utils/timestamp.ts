/**
 * Timestamp utilities
 *
 * Timestamps are numbers (milliseconds since epoch) everywhere inside the
 * manager and in the job store; ISO strings appear only in reports.
 */

import { Timestamp } from '../types/timestamp.js';

export const TimestampUtil = {
  toISO: (ts: Timestamp): string => new Date(ts).toISOString(),

  addSeconds: (ts: Timestamp, seconds: number): Timestamp => ts + seconds * 1000,
  subtractHours: (ts: Timestamp, hours: number): Timestamp => ts - hours * 60 * 60 * 1000,

  // Fractional seconds; processing times are averaged, not bucketed
  diffSeconds: (a: Timestamp, b: Timestamp): number => (a - b) / 1000,

  isValid: (value: unknown): value is Timestamp =>
    typeof value === 'number' && Number.isFinite(value) && value >= 0,

  // Job store fields come back as strings; empty means unset
  fromStored: (value: string | null | undefined): Timestamp | undefined => {
    if (value === null || value === undefined || value === '') return undefined;
    const ts = Number(value);
    return TimestampUtil.isValid(ts) ? ts : undefined;
  },
} as const;
