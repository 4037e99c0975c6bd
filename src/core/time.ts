/**
 * Time utilities for consistent date handling
 */

import { format, fromUnixTime, getUnixTime, subDays } from 'date-fns';

/** Lookback used when nothing is configured: about six months of daily bars. */
export const DEFAULT_LOOKBACK_DAYS = 182;

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function formatTimestamp(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

/** Bar timestamps from providers arrive as unix seconds; dates are taken in UTC. */
export function unixToDate(seconds: number): string {
  return fromUnixTime(seconds).toISOString().slice(0, 10);
}

export interface LookbackWindow {
  from: number;
  to: number;
}

export function lookbackWindow(lookbackDays: number, now: Date = new Date()): LookbackWindow {
  return {
    from: getUnixTime(subDays(now, lookbackDays)),
    to: getUnixTime(now),
  };
}

export function describeLookback(lookbackDays: number): string {
  if (lookbackDays === DEFAULT_LOOKBACK_DAYS) return 'Last 6 months';
  return `Last ${lookbackDays} days`;
}

export function hoursToSeconds(hours: number): number {
  return hours * 60 * 60;
}
