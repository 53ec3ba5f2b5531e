import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  format,
  isValid,
  parse,
} from 'date-fns';
import { InvalidScheduleError } from '../errors/billing.errors';

/**
 * Calendar date without a time of day, formatted `YYYY-MM-DD`.
 * Postgres `date` columns round-trip as this string.
 */
export type DateOnly = string;

export type CalendarUnit = 'day' | 'week' | 'month' | 'year';

const DATE_ONLY_FORMAT = 'yyyy-MM-dd';
const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isDateOnly(value: string): boolean {
  if (!DATE_ONLY_PATTERN.test(value)) {
    return false;
  }
  return isValid(parse(value, DATE_ONLY_FORMAT, new Date()));
}

export function parseDateOnly(value: DateOnly, label = 'date'): Date {
  const parsed = DATE_ONLY_PATTERN.test(value)
    ? parse(value, DATE_ONLY_FORMAT, new Date())
    : new Date(Number.NaN);

  if (!isValid(parsed)) {
    throw new InvalidScheduleError(`Invalid ${label}: ${value}`);
  }
  return parsed;
}

export function formatDateOnly(date: Date): DateOnly {
  return format(date, DATE_ONLY_FORMAT);
}

function datePart(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPart['type']) {
  return parts.find((part) => part.type === type)?.value;
}

/**
 * The calendar date in `timeZone` (IANA name) at `now`, independent of the
 * zone the process runs in.
 */
export function todayDateOnly(timeZone: string, now: Date = new Date()): DateOnly {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const year = datePart(parts, 'year');
  const month = datePart(parts, 'month');
  const day = datePart(parts, 'day');
  if (!year || !month || !day) {
    throw new InvalidScheduleError(`Cannot resolve today's date in time zone ${timeZone}`);
  }
  return `${year}-${month}-${day}`;
}

export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/**
 * Adds whole calendar units. Months and years clamp to the last valid day of
 * the target month (Jan 31 + 1 month = Feb 28, or Feb 29 in a leap year).
 */
export function addCalendarUnits(
  date: DateOnly,
  unit: CalendarUnit,
  amount: number,
): DateOnly {
  const base = parseDateOnly(date);

  switch (unit) {
    case 'day':
      return formatDateOnly(addDays(base, amount));
    case 'week':
      return formatDateOnly(addWeeks(base, amount));
    case 'month':
      return formatDateOnly(addMonths(base, amount));
    case 'year':
      return formatDateOnly(addYears(base, amount));
  }
}

export function compareDateOnly(a: DateOnly, b: DateOnly): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function maxDateOnly(a: DateOnly, b: DateOnly): DateOnly {
  return compareDateOnly(a, b) >= 0 ? a : b;
}
