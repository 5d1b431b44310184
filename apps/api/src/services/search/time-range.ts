import type { TimeRange } from '@radar/shared';
import type { DateWindow } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export const TIME_RANGE_DAYS: Record<TimeRange, number> = {
  past_week: 7,
  past_month: 30,
  past_3months: 90,
  past_year: 365,
};

export function windowForDays(days: number, now: Date = new Date()): DateWindow {
  return { start: new Date(now.getTime() - days * DAY_MS), end: now };
}

export function windowForTimeRange(range: TimeRange, now: Date = new Date()): DateWindow {
  return windowForDays(TIME_RANGE_DAYS[range], now);
}

/** YYYY-MM-DD in UTC */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function isWithinWindow(date: Date, window: DateWindow): boolean {
  const time = date.getTime();
  return time >= window.start.getTime() && time <= window.end.getTime();
}
