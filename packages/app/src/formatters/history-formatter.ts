/**
 * History formatter
 *
 * Renders an On This Day response as a heading plus a box table, or as
 * JSON. Dated categories (events, births, deaths) are shown most recent
 * first; holidays keep the API's order.
 */

import {
  Category,
  getCategoryLayout,
  type CategoryLayout,
  type HistoricalEntry,
  type HolidayEntry,
  type MonthDay,
  type OnThisDayResponse,
} from '@daybook/contracts';
import { formatMonthDay } from '@daybook/clock';
import { createPalette } from './palette.js';
import { renderTable, type TableRow } from './table.js';
import { wrapText } from './text-wrap.js';

/**
 * Terminal widths below this are treated as this
 */
export const MIN_TABLE_WIDTH = 40;

/**
 * Columns reserved for borders and, in dated tables, the year column
 */
export const WRAP_MARGINS: Record<CategoryLayout['kind'], number> = {
  dated: 14,
  undated: 6,
};

export interface HistoryFormatOptions {
  category: Category;
  date: MonthDay;
  /** Terminal width in columns */
  width: number;
  color: boolean;
  /** Keep only the first N rows in display order */
  limit?: number;
}

export interface HistoryJsonOptions {
  category: Category;
  date: MonthDay;
  language: string;
  limit?: number;
}

function displayOrder<T>(entries: readonly T[], reverse: boolean, limit?: number): T[] {
  const ordered = reverse ? [...entries].reverse() : [...entries];
  return limit === undefined ? ordered : ordered.slice(0, limit);
}

/**
 * Entries of the selected category in display order.
 */
export function selectEntries(
  response: OnThisDayResponse,
  category: Category,
  limit?: number
): HistoricalEntry[] | HolidayEntry[] {
  const layout = getCategoryLayout(category);
  if (layout.kind === 'dated') {
    return displayOrder(layout.select(response), true, limit).map(({ year, text }) => ({
      year,
      text,
    }));
  }
  return displayOrder(layout.select(response), false, limit).map(({ text }) => ({ text }));
}

/**
 * @example
 * ```typescript
 * historyHeading(Category.Births, { month: 2, day: 29 })  // 'On This Day: February 29 (births)'
 * ```
 */
export function historyHeading(category: Category, date: MonthDay): string {
  const heading = `On This Day: ${formatMonthDay(date)}`;
  return category === Category.Events ? heading : `${heading} (${category})`;
}

/**
 * Width available to the text column.
 */
export function textColumnWidth(terminalWidth: number, layout: CategoryLayout): number {
  return Math.max(terminalWidth, MIN_TABLE_WIDTH) - WRAP_MARGINS[layout.kind];
}

function tableRows(
  response: OnThisDayResponse,
  layout: CategoryLayout,
  textWidth: number,
  limit?: number
): TableRow[] {
  if (layout.kind === 'dated') {
    const entries = displayOrder(layout.select(response), true, limit);
    if (entries.length === 0) {
      return [[['-'], [layout.emptyMessage]]];
    }
    return entries.map((entry) => [[String(entry.year)], wrapText(entry.text, textWidth)]);
  }

  const entries = displayOrder(layout.select(response), false, limit);
  if (entries.length === 0) {
    return [[[layout.emptyMessage]]];
  }
  return entries.map((entry) => [wrapText(entry.text, textWidth)]);
}

export function formatHistory(response: OnThisDayResponse, options: HistoryFormatOptions): string {
  const layout = getCategoryLayout(options.category);
  const paint = createPalette(options.color);
  const rows = tableRows(
    response,
    layout,
    textColumnWidth(options.width, layout),
    options.limit
  );

  const table = renderTable(layout.headers, rows, {
    header: (text) => paint.bold(text),
    border: (text) => paint.dim(text),
  });

  return [paint.bold.cyan(historyHeading(options.category, options.date)), '', table].join('\n');
}

/**
 * Zero-padded `MM-DD` form of a date, e.g. `02-09`.
 */
export function monthDayKey(date: MonthDay): string {
  return `${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
}

export function formatHistoryJson(response: OnThisDayResponse, options: HistoryJsonOptions): string {
  return JSON.stringify(
    {
      date: monthDayKey(options.date),
      language: options.language,
      category: options.category,
      entries: selectEntries(response, options.category, options.limit),
    },
    null,
    2
  );
}
