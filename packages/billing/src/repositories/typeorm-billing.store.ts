import { DataSource, EntityManager } from 'typeorm';
import {
  BillingStore,
  ExclusiveRunResult,
  SchedulerLock,
} from '../interfaces/billing-store.interface';
import { InvoiceRepository } from './invoice.repository';
import { PaymentPlanRepository } from './payment-plan.repository';
import { RecurringInvoiceRepository } from './recurring-invoice.repository';

export class TypeOrmBillingStore implements BillingStore {
  readonly recurringInvoices: RecurringInvoiceRepository;
  readonly invoices: InvoiceRepository;
  readonly paymentPlans: PaymentPlanRepository;

  constructor(private readonly manager: EntityManager) {
    this.recurringInvoices = new RecurringInvoiceRepository(manager);
    this.invoices = new InvoiceRepository(manager);
    this.paymentPlans = new PaymentPlanRepository(manager);
  }

  async transaction<T>(work: (store: BillingStore) => Promise<T>): Promise<T> {
    return this.manager.transaction((manager) => work(new TypeOrmBillingStore(manager)));
  }
}

/**
 * Session-level Postgres advisory lock. The lock belongs to the connection
 * that took it, so one query runner is held for the whole run.
 */
export class AdvisorySchedulerLock implements SchedulerLock {
  constructor(private readonly dataSource: DataSource) {}

  async runExclusive<T>(
    key: number,
    work: () => Promise<T>,
  ): Promise<ExclusiveRunResult<T>> {
    const runner = this.dataSource.createQueryRunner();
    await runner.connect();

    try {
      const rows: Array<{ locked: boolean }> = await runner.query(
        'SELECT pg_try_advisory_lock($1) AS locked',
        [key],
      );
      if (!rows[0]?.locked) {
        return { acquired: false };
      }

      try {
        return { acquired: true, result: await work() };
      } finally {
        await runner.query('SELECT pg_advisory_unlock($1)', [key]);
      }
    } finally {
      await runner.release();
    }
  }
}
