import { InvalidScheduleError } from '../errors/billing.errors';
import {
  addCalendarUnits,
  CalendarUnit,
  compareDateOnly,
  DateOnly,
} from './date-only';

export const RECURRENCE_FREQUENCIES = [
  'daily',
  'weekly',
  'biweekly',
  'monthly',
  'quarterly',
  'semi_annually',
  'annually',
] as const;

export type RecurrenceFrequency = (typeof RECURRENCE_FREQUENCIES)[number];

export const RECURRENCE_STATUSES = [
  'active',
  'paused',
  'cancelled',
  'completed',
  'expired',
] as const;

export type RecurrenceStatus = (typeof RECURRENCE_STATUSES)[number];

export interface CalendarPeriod {
  unit: CalendarUnit;
  amount: number;
}

const FREQUENCY_PERIODS: Record<RecurrenceFrequency, CalendarPeriod> = {
  daily: { unit: 'day', amount: 1 },
  weekly: { unit: 'week', amount: 1 },
  biweekly: { unit: 'week', amount: 2 },
  monthly: { unit: 'month', amount: 1 },
  quarterly: { unit: 'month', amount: 3 },
  semi_annually: { unit: 'month', amount: 6 },
  annually: { unit: 'year', amount: 1 },
};

// Legacy default for frequencies stored before the enum was enforced.
export const FALLBACK_PERIOD: CalendarPeriod = { unit: 'month', amount: 1 };

export function isRecurrenceFrequency(
  value: string,
): value is RecurrenceFrequency {
  return (RECURRENCE_FREQUENCIES as readonly string[]).includes(value);
}

export function isRecurrenceStatus(value: string): value is RecurrenceStatus {
  return (RECURRENCE_STATUSES as readonly string[]).includes(value);
}

export function resolveFrequencyPeriod(frequency: string): CalendarPeriod | null {
  return isRecurrenceFrequency(frequency) ? FREQUENCY_PERIODS[frequency] : null;
}

export function assertIntervalValue(interval: number): void {
  if (!Number.isInteger(interval) || interval < 1) {
    throw new InvalidScheduleError(
      `Interval must be a positive integer, got ${interval}`,
    );
  }
}

/**
 * Moves `date` forward by `interval` periods of `frequency`. Unknown
 * frequencies use {@link FALLBACK_PERIOD}.
 */
export function advanceOccurrenceDate(
  date: DateOnly,
  frequency: string,
  interval = 1,
): DateOnly {
  assertIntervalValue(interval);
  const period = resolveFrequencyPeriod(frequency) ?? FALLBACK_PERIOD;
  return addCalendarUnits(date, period.unit, period.amount * interval);
}

/**
 * The part of a recurring invoice that drives its schedule.
 */
export interface RecurrenceState {
  frequency: string;
  intervalValue: number;
  nextOccurrenceDate: DateOnly;
  occurrencesGenerated: number;
  maxOccurrences: number | null;
  endDate: DateOnly | null;
  status: RecurrenceStatus;
}

export interface RecurrenceAdvance {
  occurrenceNumber: number;
  scheduledDate: DateOnly;
  nextOccurrenceDate: DateOnly;
  occurrencesGenerated: number;
  status: RecurrenceStatus;
  frequencyRecognized: boolean;
}

export function isRecurrenceDue(state: RecurrenceState, asOf: DateOnly): boolean {
  if (state.status !== 'active') return false;
  if (compareDateOnly(state.nextOccurrenceDate, asOf) > 0) return false;
  if (
    state.endDate !== null &&
    compareDateOnly(state.nextOccurrenceDate, state.endDate) > 0
  ) {
    return false;
  }
  if (
    state.maxOccurrences !== null &&
    state.occurrencesGenerated >= state.maxOccurrences
  ) {
    return false;
  }
  return true;
}

/**
 * Generates one occurrence. The next date is computed from the previous next
 * date, never from the run date, so a late run does not shift the series.
 */
export function advanceRecurrence(state: RecurrenceState): RecurrenceAdvance {
  const occurrencesGenerated = state.occurrencesGenerated + 1;
  const nextOccurrenceDate = advanceOccurrenceDate(
    state.nextOccurrenceDate,
    state.frequency,
    state.intervalValue,
  );

  const reachedMax =
    state.maxOccurrences !== null && occurrencesGenerated >= state.maxOccurrences;
  const reachedEnd =
    state.endDate !== null &&
    compareDateOnly(nextOccurrenceDate, state.endDate) >= 0;

  return {
    occurrenceNumber: occurrencesGenerated,
    scheduledDate: state.nextOccurrenceDate,
    nextOccurrenceDate,
    occurrencesGenerated,
    status: reachedMax || reachedEnd ? 'completed' : state.status,
    frequencyRecognized: isRecurrenceFrequency(state.frequency),
  };
}

/**
 * True when nothing more can be generated: the limit is used up or the next
 * date is already past the end date.
 */
export function isSeriesExhausted(state: RecurrenceState): boolean {
  if (
    state.maxOccurrences !== null &&
    state.occurrencesGenerated >= state.maxOccurrences
  ) {
    return true;
  }
  return (
    state.endDate !== null &&
    compareDateOnly(state.nextOccurrenceDate, state.endDate) > 0
  );
}

export interface PreviewedOccurrence {
  occurrenceNumber: number;
  date: DateOnly;
}

export const MAX_PREVIEW_COUNT = 50;

export function previewOccurrences(
  state: RecurrenceState,
  count: number,
): PreviewedOccurrence[] {
  if (!Number.isInteger(count) || count < 1 || count > MAX_PREVIEW_COUNT) {
    throw new InvalidScheduleError(
      `Preview count must be between 1 and ${MAX_PREVIEW_COUNT}`,
    );
  }

  const occurrences: PreviewedOccurrence[] = [];
  let current: RecurrenceState = { ...state, status: 'active' };

  while (occurrences.length < count && !isSeriesExhausted(current)) {
    const advance = advanceRecurrence(current);
    occurrences.push({
      occurrenceNumber: advance.occurrenceNumber,
      date: advance.scheduledDate,
    });

    if (advance.status === 'completed') {
      break;
    }

    current = {
      ...current,
      nextOccurrenceDate: advance.nextOccurrenceDate,
      occurrencesGenerated: advance.occurrencesGenerated,
    };
  }

  return occurrences;
}
