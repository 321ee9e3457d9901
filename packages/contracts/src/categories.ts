/**
 * @fileoverview On This Day categories and their per-category layout.
 *
 * Category-specific behaviour (column headers, which response array to read,
 * placeholder text) lives in one table so that callers never branch on the
 * category themselves.
 *
 * @module @daybook/contracts/categories
 */

import { InvalidCategoryError } from './errors.js';
import type { HistoricalEntry, HolidayEntry, OnThisDayResponse } from './history.js';

/**
 * Feed categories. Values are the path segments the API expects.
 */
export enum Category {
  Events = 'events',
  Births = 'births',
  Deaths = 'deaths',
  Holidays = 'holidays',
}

/**
 * Layout for the dated categories (events, births, deaths): two columns,
 * year first.
 */
export interface DatedCategoryLayout {
  kind: 'dated';
  headers: readonly [year: string, text: string];
  select: (response: OnThisDayResponse) => readonly HistoricalEntry[];
  emptyMessage: string;
}

/**
 * Layout for holidays: a single text column.
 */
export interface UndatedCategoryLayout {
  kind: 'undated';
  headers: readonly [text: string];
  select: (response: OnThisDayResponse) => readonly HolidayEntry[];
  emptyMessage: string;
}

export type CategoryLayout = DatedCategoryLayout | UndatedCategoryLayout;

/**
 * Per-category layout table.
 */
export const CATEGORY_LAYOUTS: {
  [Category.Events]: DatedCategoryLayout;
  [Category.Births]: DatedCategoryLayout;
  [Category.Deaths]: DatedCategoryLayout;
  [Category.Holidays]: UndatedCategoryLayout;
} = {
  [Category.Events]: {
    kind: 'dated',
    headers: ['Year', 'Event'],
    select: (response) => response.events,
    emptyMessage: 'No events found',
  },
  [Category.Births]: {
    kind: 'dated',
    headers: ['Born', 'Person'],
    select: (response) => response.births,
    emptyMessage: 'No births found',
  },
  [Category.Deaths]: {
    kind: 'dated',
    headers: ['Died', 'Person'],
    select: (response) => response.deaths,
    emptyMessage: 'No deaths found',
  },
  [Category.Holidays]: {
    kind: 'undated',
    headers: ['Holiday'],
    select: (response) => response.holidays,
    emptyMessage: 'No holidays found',
  },
};

/**
 * Returns the layout for a category.
 */
export function getCategoryLayout(category: Category): CategoryLayout {
  return CATEGORY_LAYOUTS[category];
}

/**
 * Returns all categories in display order.
 */
export function getAllCategories(): Category[] {
  return [Category.Events, Category.Births, Category.Deaths, Category.Holidays];
}

export function isValidCategory(value: string): value is Category {
  return getAllCategories().some((category) => category === value);
}

/**
 * Parses a category name case-insensitively.
 *
 * @throws {InvalidCategoryError} If the name is not a known category
 *
 * @example
 * ```typescript
 * parseCategory('Births')  // Category.Births
 * parseCategory('wars')    // throws InvalidCategoryError
 * ```
 */
export function parseCategory(value: string): Category {
  const normalized = value.trim().toLowerCase();
  if (!isValidCategory(normalized)) {
    throw new InvalidCategoryError(value, getAllCategories());
  }
  return normalized;
}
