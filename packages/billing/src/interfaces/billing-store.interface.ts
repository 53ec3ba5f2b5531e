import type { IInvoiceRepository } from './invoice-repository.interface';
import type { IPaymentPlanRepository } from './payment-plan-repository.interface';
import type { IRecurringInvoiceRepository } from './recurring-invoice-repository.interface';

/**
 * Billing Store
 * Groups the billing repositories behind one connection so a unit of work
 * can span several tables
 */
export interface BillingStore {
  readonly recurringInvoices: IRecurringInvoiceRepository;
  readonly invoices: IInvoiceRepository;
  readonly paymentPlans: IPaymentPlanRepository;

  /**
   * Runs `work` in a transaction; everything written through the store passed
   * to it commits together or not at all
   */
  transaction<T>(work: (store: BillingStore) => Promise<T>): Promise<T>;
}

export type ExclusiveRunResult<T> =
  | { acquired: true; result: T }
  | { acquired: false };

/**
 * At-most-one concurrent holder per key, across processes
 */
export interface SchedulerLock {
  runExclusive<T>(key: number, work: () => Promise<T>): Promise<ExclusiveRunResult<T>>;
}
