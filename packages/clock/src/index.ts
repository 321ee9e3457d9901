/**
 * @fileoverview Public API for @daybook/clock.
 *
 * @module @daybook/clock
 */

export {
  REFERENCE_LEAP_YEAR,
  isLeapYear,
  isValidMonthDay,
  resolveTargetDate,
  formatMonthDay,
} from './calendar.js';

export {
  CURRENT_TIME_FORMAT,
  computeTimeStats,
  renderCurrentTime,
  isValidTimezone,
  currentInstant,
} from './time-stats.js';
