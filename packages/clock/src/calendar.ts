/**
 * @fileoverview Reference calendar and target-date resolution.
 *
 * Month/day pairs are validated against a fixed leap year so that Feb 29 is
 * always a legal request, whatever year it is today.
 *
 * @module @daybook/clock/calendar
 */

import moment from 'moment-timezone';
import { InvalidDateError, type MonthDay } from '@daybook/contracts';

/**
 * Leap year used to validate and label month/day pairs.
 */
export const REFERENCE_LEAP_YEAR = 2000;

/**
 * A year is leap iff Feb 29 exists in it.
 *
 * @example
 * ```typescript
 * isLeapYear(2024)  // true
 * isLeapYear(1900)  // false
 * isLeapYear(2000)  // true
 * ```
 */
export function isLeapYear(year: number): boolean {
  return moment([year, 1, 29]).isValid();
}

/**
 * Whether month (1-12) and day form a date in the reference leap year.
 */
export function isValidMonthDay(month: number, day: number): boolean {
  if (!Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12) {
    return false;
  }
  return moment([REFERENCE_LEAP_YEAR, month - 1, day]).isValid();
}

/**
 * Resolves the month/day to look up.
 *
 * Each override replaces only its own field; a missing field falls back to
 * today's value.
 *
 * @throws {InvalidDateError} If the resulting pair is not a calendar date
 *
 * @example
 * ```typescript
 * // today is 2026-10-18
 * resolveTargetDate({}, today)                     // { month: 10, day: 18 }
 * resolveTargetDate({ day: 3 }, today)             // { month: 10, day: 3 }
 * resolveTargetDate({ month: 2, day: 29 }, today)  // { month: 2, day: 29 }
 * resolveTargetDate({ month: 4, day: 31 }, today)  // throws InvalidDateError
 * ```
 */
export function resolveTargetDate(
  overrides: { month?: number; day?: number },
  today: moment.Moment
): MonthDay {
  const month = overrides.month ?? today.month() + 1;
  const day = overrides.day ?? today.date();

  if (!isValidMonthDay(month, day)) {
    throw new InvalidDateError(month, day);
  }

  return { month, day };
}

/**
 * Formats a month/day as a header label, e.g. `February 29`.
 */
export function formatMonthDay(date: MonthDay): string {
  return moment([REFERENCE_LEAP_YEAR, date.month - 1, date.day]).format('MMMM D');
}
