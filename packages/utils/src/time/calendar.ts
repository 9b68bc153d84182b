import { addDays, differenceInCalendarDays, format, isValid, parse } from 'date-fns';
import type { CalendarDate } from '@quarry/schemas';

const ISO_DATE = 'yyyy-MM-dd';
const COMPACT_DATE = 'yyyyMMdd';

/**
 * Parse a user-supplied calendar date.
 *
 * Accepts 'YYYY-MM-DD' or 'YYYYMMDD' and returns the ISO form.
 *
 * @throws RangeError when the input is not a real calendar date
 */
export function parseCalendarDate(input: string): CalendarDate {
  const value = input.trim();
  let parsed: Date;
  if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    parsed = parse(value, ISO_DATE, new Date(0));
  } else if (/^\d{8}$/.test(value)) {
    parsed = parse(value, COMPACT_DATE, new Date(0));
  } else {
    throw new RangeError(`Invalid date "${input}": expected YYYY-MM-DD or YYYYMMDD`);
  }

  if (!isValid(parsed)) {
    throw new RangeError(`Invalid date "${input}": not a calendar date`);
  }
  return format(parsed, ISO_DATE);
}

/**
 * Local midnight of a calendar date
 */
export function toDate(date: CalendarDate): Date {
  return parse(date, ISO_DATE, new Date(0));
}

export function formatCalendarDate(date: Date): CalendarDate {
  return format(date, ISO_DATE);
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  return formatCalendarDate(addDays(toDate(date), days));
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 */
export function calendarDaysBetween(from: CalendarDate, to: CalendarDate): number {
  return differenceInCalendarDays(toDate(to), toDate(from));
}

export function todayCalendarDate(now: Date = new Date()): CalendarDate {
  return formatCalendarDate(now);
}
