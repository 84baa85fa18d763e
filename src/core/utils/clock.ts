// Clock - the manager never reads wall-clock time directly

import { Timestamp } from '../types/timestamp.js';

export interface Clock {
  now(): Timestamp;
  // Local hour of day, 0-23
  currentHour(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  currentHour: () => new Date().getHours(),
};
