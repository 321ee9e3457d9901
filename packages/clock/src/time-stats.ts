/**
 * @fileoverview Time statistics for an instant.
 *
 * All functions take the instant as an argument; only `currentInstant` reads
 * the system clock.
 *
 * @module @daybook/clock/time-stats
 */

import moment from 'moment-timezone';
import { ConfigurationError, type TimeStats } from '@daybook/contracts';
import { isLeapYear } from './calendar.js';

const SECONDS_PER_DAY = 86_400;

/**
 * Display format for the current time, e.g. `Sunday, October 18, 2026 03:37:00 PM`.
 */
export const CURRENT_TIME_FORMAT = 'dddd, MMMM DD, YYYY hh:mm:ss A';

/**
 * Computes day/year progress and calendar facts for an instant, using the
 * instant's own wall clock (its zone or UTC mode).
 *
 * @example
 * ```typescript
 * const stats = computeTimeStats(moment.utc('2024-03-01T12:00:00'));
 * stats.dayOfYear    // 61
 * stats.dayProgress  // 50
 * stats.isLeapYear   // true
 * ```
 */
export function computeTimeStats(instant: moment.Moment): TimeStats {
  const isLeap = isLeapYear(instant.year());
  const totalDaysInYear = isLeap ? 366 : 365;

  const secondsIntoDay = instant.hours() * 3600 + instant.minutes() * 60 + instant.seconds();
  const dayOfYear = instant.dayOfYear();

  return Object.freeze({
    dayOfYear,
    totalDaysInYear,
    dayProgress: (secondsIntoDay / SECONDS_PER_DAY) * 100,
    yearProgress: (dayOfYear / totalDaysInYear) * 100,
    weekOfYear: instant.isoWeek(),
    isLeapYear: isLeap,
    unixTimestamp: instant.unix(),
  });
}

export function renderCurrentTime(instant: moment.Moment): string {
  return instant.format(CURRENT_TIME_FORMAT);
}

export function isValidTimezone(name: string): boolean {
  return moment.tz.zone(name) !== null;
}

/**
 * Reads the system clock, in the given IANA zone or the local zone.
 *
 * @throws {ConfigurationError} If the zone name is unknown
 */
export function currentInstant(timezone?: string): moment.Moment {
  if (timezone === undefined) {
    return moment();
  }
  if (!isValidTimezone(timezone)) {
    throw new ConfigurationError(`Unknown time zone '${timezone}'`, { timezone });
  }
  return moment.tz(timezone);
}
