import { describe, it, expect } from 'vitest';
import {
  parseCalendarDate,
  addCalendarDays,
  calendarDaysBetween,
  todayCalendarDate,
} from './calendar';

describe('parseCalendarDate', () => {
  it('should accept ISO dates unchanged', () => {
    expect(parseCalendarDate('2020-01-01')).toBe('2020-01-01');
  });

  it('should convert compact dates to ISO form', () => {
    expect(parseCalendarDate('20080102')).toBe('2008-01-02');
  });

  it('should trim surrounding whitespace', () => {
    expect(parseCalendarDate(' 2021-06-30 ')).toBe('2021-06-30');
  });

  it('should reject dates that do not exist', () => {
    expect(() => parseCalendarDate('2021-02-30')).toThrow(RangeError);
    expect(() => parseCalendarDate('20211301')).toThrow(RangeError);
  });

  it('should reject other formats', () => {
    expect(() => parseCalendarDate('01/02/2020')).toThrow('expected YYYY-MM-DD or YYYYMMDD');
    expect(() => parseCalendarDate('')).toThrow(RangeError);
  });
});

describe('calendar arithmetic', () => {
  it('should add days across a leap day', () => {
    expect(addCalendarDays('2020-02-28', 1)).toBe('2020-02-29');
    expect(addCalendarDays('2020-02-28', 2)).toBe('2020-03-01');
  });

  it('should add days across a year boundary', () => {
    expect(addCalendarDays('2019-12-31', 1)).toBe('2020-01-01');
  });

  it('should count whole days between dates', () => {
    expect(calendarDaysBetween('2020-01-01', '2020-01-01')).toBe(0);
    expect(calendarDaysBetween('2020-01-01', '2020-12-31')).toBe(365);
    expect(calendarDaysBetween('2020-01-10', '2020-01-01')).toBe(-9);
  });

  it('should format the local date of a timestamp', () => {
    expect(todayCalendarDate(new Date(2024, 5, 7, 23, 30))).toBe('2024-06-07');
  });
});
