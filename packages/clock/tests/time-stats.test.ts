import { describe, it, expect } from 'vitest';
import moment from 'moment-timezone';
import { ConfigurationError } from '@daybook/contracts';
import {
  computeTimeStats,
  currentInstant,
  isValidTimezone,
  renderCurrentTime,
} from '../src/time-stats.js';

describe('computeTimeStats', () => {
  it('should report leap-year statistics', () => {
    const stats = computeTimeStats(moment.utc('2024-03-01T00:00:00'));

    expect(stats.isLeapYear).toBe(true);
    expect(stats.totalDaysInYear).toBe(366);
    // 1 March in a leap year is day 61
    expect(stats.dayOfYear).toBe(61);
    expect(stats.weekOfYear).toBe(9);
    expect(stats.unixTimestamp).toBe(1709251200);
  });

  it('should report non-leap-year statistics', () => {
    const stats = computeTimeStats(moment.utc('2025-03-01T00:00:00'));

    expect(stats.isLeapYear).toBe(false);
    expect(stats.totalDaysInYear).toBe(365);
    expect(stats.dayOfYear).toBe(60);
  });

  it('should start the day at zero progress', () => {
    expect(computeTimeStats(moment.utc('2026-10-18T00:00:00')).dayProgress).toBe(0);
  });

  it('should measure day progress from the wall clock', () => {
    expect(computeTimeStats(moment.utc('2026-10-18T12:00:00')).dayProgress).toBe(50);
    expect(computeTimeStats(moment.utc('2026-10-18T06:00:00')).dayProgress).toBe(25);
  });

  it('should stay below 100% at the last second of the day', () => {
    const stats = computeTimeStats(moment.utc('2026-10-18T23:59:59'));

    expect(stats.dayProgress).toBeLessThan(100);
    expect(stats.dayProgress).toBeCloseTo((86399 / 86400) * 100, 10);
  });

  it('should compute year progress from the ordinal day', () => {
    const stats = computeTimeStats(moment.utc('2024-03-01T00:00:00'));

    expect(stats.yearProgress).toBeCloseTo((61 / 366) * 100, 10);
  });

  it('should keep progress values within range across the year', () => {
    const start = moment.utc('2023-01-01T00:00:00');
    for (let offset = 0; offset < 365; offset += 7) {
      const stats = computeTimeStats(start.clone().add(offset, 'days').add(offset, 'minutes'));
      expect(stats.dayProgress).toBeGreaterThanOrEqual(0);
      expect(stats.dayProgress).toBeLessThan(100);
      expect(stats.yearProgress).toBeGreaterThan(0);
      expect(stats.yearProgress).toBeLessThanOrEqual(100);
    }
  });

  it('should use ISO week numbering', () => {
    // 2021-01-01 is a Friday and belongs to week 53 of 2020
    expect(computeTimeStats(moment.utc('2021-01-01T10:00:00')).weekOfYear).toBe(53);
    expect(computeTimeStats(moment.utc('2024-01-01T10:00:00')).weekOfYear).toBe(1);
  });

  it('should use the wall clock of the instant zone', () => {
    // 23:30 UTC is 01:30 the next day in Berlin (CEST)
    const instant = moment.tz('2026-06-30T23:30:00Z', 'Europe/Berlin');
    const stats = computeTimeStats(instant);

    expect(stats.dayOfYear).toBe(182);
    expect(stats.dayProgress).toBeCloseTo((5400 / 86400) * 100, 10);
  });

  it('should return a frozen snapshot', () => {
    expect(Object.isFrozen(computeTimeStats(moment.utc('2026-10-18T00:00:00')))).toBe(true);
  });
});

describe('renderCurrentTime', () => {
  it('should render weekday, date and 12-hour time', () => {
    expect(renderCurrentTime(moment.utc('2026-10-18T15:37:00'))).toBe(
      'Sunday, October 18, 2026 03:37:00 PM'
    );
  });
});

describe('currentInstant', () => {
  it('should use the requested zone', () => {
    expect(currentInstant('Europe/Berlin').tz()).toBe('Europe/Berlin');
  });

  it('should reject unknown zones', () => {
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
    expect(() => currentInstant('Mars/Olympus_Mons')).toThrow(ConfigurationError);
  });
});
