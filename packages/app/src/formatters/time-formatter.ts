/**
 * Time formatter
 */

import type moment from 'moment-timezone';
import type { TimeStats } from '@daybook/contracts';
import { renderCurrentTime } from '@daybook/clock';
import { createPalette } from './palette.js';

export type TimeOutputFormat = 'text' | 'json';

export function formatCurrentTime(
  instant: moment.Moment,
  format: TimeOutputFormat = 'text',
  color = false
): string {
  if (format === 'json') {
    return JSON.stringify({ now: instant.format() }, null, 2);
  }

  const paint = createPalette(color);
  return `${paint.bold('The current time is:')}\n${renderCurrentTime(instant)}`;
}

/**
 * Percentages are rounded to two decimals here and nowhere else.
 */
export function formatTimeStatistics(
  stats: TimeStats,
  format: TimeOutputFormat = 'text',
  color = false
): string {
  if (format === 'json') {
    return JSON.stringify(stats, null, 2);
  }

  const paint = createPalette(color);
  const lines: string[] = [];

  lines.push(paint.bold('Time statistics:'));
  lines.push('-'.repeat(16));
  lines.push(`Day of the year: ${stats.dayOfYear}/${stats.totalDaysInYear}`);
  lines.push(`Week of the year: ${stats.weekOfYear}`);
  lines.push(`Is it a leap year? ${stats.isLeapYear ? 'Yes' : 'No'}`);
  lines.push(`Seconds since Unix epoch: ${stats.unixTimestamp}`);
  lines.push('');
  lines.push('Progress:');
  lines.push(`Day is ${stats.dayProgress.toFixed(2)}% complete`);
  lines.push(`Year is ${stats.yearProgress.toFixed(2)}% complete`);

  return lines.join('\n');
}
