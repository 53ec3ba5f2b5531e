import type { DateOnly } from '../domain/date-only';
import type { InstanceStatus } from '../domain/instance-status';
import type { RecurrenceStatus } from '../domain/recurrence';
import type { RecurringInvoiceEntity } from '../entities/recurring-invoice.entity';
import type { RecurringInvoiceInstanceEntity } from '../entities/recurring-invoice-instance.entity';

export type NewRecurringInvoice = Omit<
  RecurringInvoiceEntity,
  | 'id'
  | 'createdAt'
  | 'updatedAt'
  | 'lastAttemptAt'
  | 'lastError'
  | 'failedAttempts'
>;

export type NewRecurringInvoiceInstance = Pick<
  RecurringInvoiceInstanceEntity,
  'recurringInvoiceId' | 'occurrenceNumber' | 'scheduledDate' | 'status'
>;

export interface RecurringInvoiceListFilter {
  customerId?: string;
  status?: RecurrenceStatus;
  frequency?: string;
  limit: number;
  offset: number;
}

export interface InstanceListFilter {
  status?: InstanceStatus;
  limit: number;
}

/**
 * Recurring Invoice Repository Interface
 * Data access for recurring invoice definitions and their instances
 */
export interface IRecurringInvoiceRepository {
  /**
   * Active definitions due on or before `asOf`. Fewest failed attempts first,
   * then oldest next date, so rows that keep failing cannot fill a batch.
   */
  findDue(asOf: DateOnly, limit: number): Promise<RecurringInvoiceEntity[]>;

  findById(id: string): Promise<RecurringInvoiceEntity | null>;

  /**
   * Same as findById but row-locked until the surrounding transaction ends
   */
  findByIdForUpdate(id: string): Promise<RecurringInvoiceEntity | null>;

  list(
    filter: RecurringInvoiceListFilter,
  ): Promise<{ items: RecurringInvoiceEntity[]; total: number }>;

  create(data: NewRecurringInvoice): Promise<RecurringInvoiceEntity>;

  save(definition: RecurringInvoiceEntity): Promise<RecurringInvoiceEntity>;

  /**
   * Stamps a failed scheduler attempt without touching the schedule
   */
  recordAttemptFailure(id: string, message: string, attemptedAt: Date): Promise<void>;

  findInstances(
    recurringInvoiceId: string,
    filter: InstanceListFilter,
  ): Promise<RecurringInvoiceInstanceEntity[]>;

  /**
   * `scheduled` instances that have no invoice yet, oldest first
   */
  findAwaitingInvoice(limit: number): Promise<RecurringInvoiceInstanceEntity[]>;

  findInstanceById(id: string): Promise<RecurringInvoiceInstanceEntity | null>;

  insertInstance(
    data: NewRecurringInvoiceInstance,
  ): Promise<RecurringInvoiceInstanceEntity>;

  saveInstance(
    instance: RecurringInvoiceInstanceEntity,
  ): Promise<RecurringInvoiceInstanceEntity>;

  /**
   * Cancels every instance still waiting to be materialized; returns the count
   */
  cancelScheduledInstances(recurringInvoiceId: string): Promise<number>;
}
