import type { TimeUnit } from '../types.js';

const MILLIS_PER_UNIT: Record<TimeUnit, number> = {
  nanoseconds: 1e-6,
  microseconds: 1e-3,
  milliseconds: 1,
  seconds: 1_000,
  minutes: 60_000,
  hours: 3_600_000,
  days: 86_400_000,
};

export const DEFAULT_TIME_UNIT: TimeUnit = 'milliseconds';

export function toMillis(duration: number, unit: TimeUnit = DEFAULT_TIME_UNIT): number {
  return duration * MILLIS_PER_UNIT[unit];
}

export function describeDuration(duration: number, unit: TimeUnit = DEFAULT_TIME_UNIT): string {
  return `${duration} ${unit}`;
}
