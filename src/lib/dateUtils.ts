/**
 * Wall-clock helpers for the notification scheduler and export file names.
 *
 * Subscriptions store a bare "HH:MM", so every comparison is made in the
 * scheduler's configured time zone rather than the host's.
 */
import { formatInTimeZone } from 'date-fns-tz';

export interface SchedulerClock {
  /** "HH:MM", 24-hour */
  time: string;
  /** ISO weekday, Monday = 1 ... Sunday = 7 */
  weekday: number;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function getSchedulerClock(now: Date, timeZone: string): SchedulerClock {
  return {
    time: formatInTimeZone(now, timeZone, 'HH:mm'),
    weekday: Number(formatInTimeZone(now, timeZone, 'i')),
  };
}

/**
 * Timestamp used in export file names, e.g. 20240107_093000
 */
export function toFileTimestamp(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, 'yyyyMMdd_HHmmss');
}
