/**
 * @fileoverview Time statistics snapshot.
 *
 * @module @daybook/contracts/time
 */

/**
 * Derived statistics for a single instant.
 *
 * @invariant 1 <= dayOfYear <= totalDaysInYear
 * @invariant totalDaysInYear === (isLeapYear ? 366 : 365)
 * @invariant 0 <= dayProgress < 100
 * @invariant 0 < yearProgress <= 100
 */
export interface TimeStats {
  readonly dayOfYear: number;
  readonly totalDaysInYear: number;
  /** Percentage of the local day elapsed, unrounded */
  readonly dayProgress: number;
  /** Percentage of the year elapsed by ordinal day, unrounded */
  readonly yearProgress: number;
  /** ISO 8601 week number */
  readonly weekOfYear: number;
  readonly isLeapYear: boolean;
  /** Seconds since the Unix epoch */
  readonly unixTimestamp: number;
}
