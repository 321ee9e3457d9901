import { describe, it, expect } from 'vitest';
import moment from 'moment-timezone';
import { InvalidDateError } from '@daybook/contracts';
import {
  formatMonthDay,
  isLeapYear,
  isValidMonthDay,
  resolveTargetDate,
} from '../src/calendar.js';

function gregorianLeap(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

describe('isLeapYear', () => {
  it('should agree with the Gregorian rule', () => {
    for (let year = 1600; year <= 2800; year += 1) {
      expect(isLeapYear(year)).toBe(gregorianLeap(year));
    }
  });

  it('should handle century years', () => {
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
    expect(isLeapYear(2100)).toBe(false);
  });
});

describe('isValidMonthDay', () => {
  it('should always accept February 29', () => {
    expect(isValidMonthDay(2, 29)).toBe(true);
  });

  it('should reject days past the end of the month', () => {
    expect(isValidMonthDay(4, 31)).toBe(false);
    expect(isValidMonthDay(2, 30)).toBe(false);
  });

  it('should reject out-of-range and non-integer values', () => {
    expect(isValidMonthDay(0, 1)).toBe(false);
    expect(isValidMonthDay(13, 1)).toBe(false);
    expect(isValidMonthDay(1, 0)).toBe(false);
    expect(isValidMonthDay(1, 32)).toBe(false);
    expect(isValidMonthDay(1.5, 2)).toBe(false);
  });
});

describe('resolveTargetDate', () => {
  // A non-leap year, so Feb 29 acceptance cannot come from "today"
  const today = moment.utc('2026-10-18T09:00:00');

  it('should use today when no override is given', () => {
    expect(resolveTargetDate({}, today)).toEqual({ month: 10, day: 18 });
  });

  it('should fall back per field', () => {
    expect(resolveTargetDate({ day: 3 }, today)).toEqual({ month: 10, day: 3 });
    expect(resolveTargetDate({ month: 7 }, today)).toEqual({ month: 7, day: 18 });
  });

  it('should accept February 29 in a non-leap year', () => {
    expect(resolveTargetDate({ month: 2, day: 29 }, today)).toEqual({ month: 2, day: 29 });
  });

  it('should reject April 31 with the padded date', () => {
    expect(() => resolveTargetDate({ month: 4, day: 31 }, today)).toThrow(InvalidDateError);
    expect(() => resolveTargetDate({ month: 4, day: 31 }, today)).toThrow(
      "'04-31' is not a valid calendar date"
    );
  });

  it('should validate the combination with a fallback field', () => {
    // today's day 18 is fine, but day 31 in November is not
    expect(() => resolveTargetDate({ month: 11, day: 31 }, today)).toThrow(InvalidDateError);
    expect(() =>
      resolveTargetDate({ month: 2 }, moment.utc('2026-10-31T09:00:00'))
    ).toThrow("'02-31' is not a valid calendar date");
  });
});

describe('formatMonthDay', () => {
  it('should render the month name and unpadded day', () => {
    expect(formatMonthDay({ month: 2, day: 29 })).toBe('February 29');
    expect(formatMonthDay({ month: 10, day: 8 })).toBe('October 8');
  });
});
