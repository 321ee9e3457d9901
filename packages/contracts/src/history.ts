/**
 * @fileoverview On This Day request and response types.
 *
 * @module @daybook/contracts/history
 */

import type { Category } from './categories.js';

/**
 * A dated fact: an event, a birth or a death.
 */
export interface HistoricalEntry {
  /** Year of the fact; negative for BCE */
  year: number;
  text: string;
}

export interface HolidayEntry {
  text: string;
}

/**
 * Decoded On This Day payload.
 *
 * @invariant Every array is present; categories missing from the API body are empty.
 * @invariant Arrays keep the API's ordering (ascending year for dated entries).
 */
export interface OnThisDayResponse {
  events: HistoricalEntry[];
  births: HistoricalEntry[];
  deaths: HistoricalEntry[];
  holidays: HolidayEntry[];
}

/**
 * Calendar month (1-12) and day (1-31), without a year.
 */
export interface MonthDay {
  month: number;
  day: number;
}

/**
 * User-supplied history parameters, before the date is resolved.
 */
export interface HistoryQuery {
  category: Category;
  /** Validated lowercase two-letter language code */
  language: string;
  /** Overrides today's month when set */
  month?: number;
  /** Overrides today's day when set */
  day?: number;
}

/**
 * Fully resolved request: the unit of fetching and caching.
 */
export interface FeedRequest extends MonthDay {
  language: string;
  category: Category;
}

/**
 * Creates a response with every category empty.
 */
export function emptyOnThisDayResponse(): OnThisDayResponse {
  return { events: [], births: [], deaths: [], holidays: [] };
}
