import { isTimeZone } from '../domain/date-only';

export interface BillingOptions {
  /** Rows per scheduler pass; the rest wait for the next run */
  schedulerBatchSize: number;
  /** Postgres advisory lock key held while the scheduler runs */
  schedulerLockKey: number;
  /** Due-date offset for payment terms that are not "Net N" */
  defaultPaymentDays: number;
  /** IANA zone that decides which calendar day "today" is */
  timezone: string;
}

export interface BillingScheduleOptions {
  schedulerCron: string;
  overdueCron: string;
  timezone: string;
}

export const DEFAULT_BILLING_OPTIONS: BillingOptions = {
  schedulerBatchSize: 500,
  schedulerLockKey: 4242001,
  defaultPaymentDays: 30,
  timezone: 'UTC',
};

export const DEFAULT_BILLING_SCHEDULE: BillingScheduleOptions = {
  schedulerCron: '0 6 * * *',
  overdueCron: '30 6 * * *',
  timezone: 'UTC',
};

type EnvReader = (key: string) => string | undefined;

function readTimeZone(read: EnvReader): string {
  const raw = read('BILLING_TIMEZONE');
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_BILLING_OPTIONS.timezone;
  }
  if (!isTimeZone(raw)) {
    throw new Error(`BILLING_TIMEZONE must be an IANA time zone, got "${raw}"`);
  }
  return raw;
}

function readPositiveInt(read: EnvReader, key: string, fallback: number): number {
  const raw = read(key);
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function resolveBillingOptions(read: EnvReader): BillingOptions {
  return {
    schedulerBatchSize: readPositiveInt(
      read,
      'BILLING_SCHEDULER_BATCH_SIZE',
      DEFAULT_BILLING_OPTIONS.schedulerBatchSize,
    ),
    schedulerLockKey: readPositiveInt(
      read,
      'BILLING_SCHEDULER_LOCK_KEY',
      DEFAULT_BILLING_OPTIONS.schedulerLockKey,
    ),
    defaultPaymentDays: readPositiveInt(
      read,
      'BILLING_DEFAULT_PAYMENT_DAYS',
      DEFAULT_BILLING_OPTIONS.defaultPaymentDays,
    ),
    timezone: readTimeZone(read),
  };
}

export function resolveBillingSchedule(read: EnvReader): BillingScheduleOptions {
  return {
    schedulerCron: read('BILLING_SCHEDULER_CRON') || DEFAULT_BILLING_SCHEDULE.schedulerCron,
    overdueCron: read('BILLING_OVERDUE_CRON') || DEFAULT_BILLING_SCHEDULE.overdueCron,
    timezone: readTimeZone(read),
  };
}
