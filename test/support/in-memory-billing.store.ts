import { randomUUID } from 'crypto';
import {
  BillingStore,
  compareDateOnly,
  DateOnly,
  ExclusiveRunResult,
  IInvoiceRepository,
  InstanceListFilter,
  InvoiceEntity,
  InvoicePaymentEntity,
  IPaymentPlanRepository,
  IRecurringInvoiceRepository,
  isInvoiceOverdue,
  NewInstallment,
  NewInvoice,
  NewInvoicePayment,
  NewPaymentPlan,
  NewRecurringInvoice,
  NewRecurringInvoiceInstance,
  PaymentPlanEntity,
  PaymentPlanInstallmentEntity,
  RecurringInvoiceEntity,
  RecurringInvoiceInstanceEntity,
  RecurringInvoiceListFilter,
  SchedulerLock,
} from '@invoicing/billing';

interface Tables {
  recurringInvoices: Map<string, RecurringInvoiceEntity>;
  instances: Map<string, RecurringInvoiceInstanceEntity>;
  invoices: Map<string, InvoiceEntity>;
  payments: Map<string, InvoicePaymentEntity>;
  plans: Map<string, PaymentPlanEntity>;
  installments: Map<string, PaymentPlanInstallmentEntity>;
}

function copy<T>(row: T): T {
  return structuredClone(row);
}

function copyTables(tables: Tables): Tables {
  return {
    recurringInvoices: new Map([...tables.recurringInvoices].map(([id, row]) => [id, copy(row)])),
    instances: new Map([...tables.instances].map(([id, row]) => [id, copy(row)])),
    invoices: new Map([...tables.invoices].map(([id, row]) => [id, copy(row)])),
    payments: new Map([...tables.payments].map(([id, row]) => [id, copy(row)])),
    plans: new Map([...tables.plans].map(([id, row]) => [id, copy(row)])),
    installments: new Map([...tables.installments].map(([id, row]) => [id, copy(row)])),
  };
}

/**
 * Hook for making a single write fail, keyed by method name
 */
export type FailureHook = (method: string, id: string) => void;

class InMemoryRecurringInvoiceRepository implements IRecurringInvoiceRepository {
  constructor(private readonly store: InMemoryBillingStore) {}

  private get tables(): Tables {
    return this.store.tables;
  }

  async findDue(asOf: DateOnly, limit: number): Promise<RecurringInvoiceEntity[]> {
    return [...this.tables.recurringInvoices.values()]
      .filter(
        (row) =>
          row.status === 'active' &&
          compareDateOnly(row.nextOccurrenceDate, asOf) <= 0 &&
          (row.endDate === null || compareDateOnly(row.nextOccurrenceDate, row.endDate) <= 0) &&
          (row.maxOccurrences === null || row.occurrencesGenerated < row.maxOccurrences),
      )
      .sort(
        (a, b) =>
          a.failedAttempts - b.failedAttempts ||
          compareDateOnly(a.nextOccurrenceDate, b.nextOccurrenceDate) ||
          a.id.localeCompare(b.id),
      )
      .slice(0, limit)
      .map(copy);
  }

  async findById(id: string): Promise<RecurringInvoiceEntity | null> {
    const row = this.tables.recurringInvoices.get(id);
    return row ? copy(row) : null;
  }

  async findByIdForUpdate(id: string): Promise<RecurringInvoiceEntity | null> {
    this.store.failIfArmed('recurringInvoices.findByIdForUpdate', id);
    return this.findById(id);
  }

  async list(
    filter: RecurringInvoiceListFilter,
  ): Promise<{ items: RecurringInvoiceEntity[]; total: number }> {
    const matching = [...this.tables.recurringInvoices.values()].filter(
      (row) =>
        (!filter.customerId || row.customerId === filter.customerId) &&
        (!filter.status || row.status === filter.status) &&
        (!filter.frequency || row.frequency === filter.frequency),
    );
    return {
      items: matching.slice(filter.offset, filter.offset + filter.limit).map(copy),
      total: matching.length,
    };
  }

  async create(data: NewRecurringInvoice): Promise<RecurringInvoiceEntity> {
    const now = new Date();
    const row: RecurringInvoiceEntity = {
      ...data,
      id: randomUUID(),
      lastAttemptAt: null,
      lastError: null,
      failedAttempts: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.recurringInvoices.set(row.id, copy(row));
    return row;
  }

  async save(definition: RecurringInvoiceEntity): Promise<RecurringInvoiceEntity> {
    this.store.failIfArmed('recurringInvoices.save', definition.id);
    const row = { ...definition, updatedAt: new Date() };
    this.tables.recurringInvoices.set(row.id, copy(row));
    return row;
  }

  async recordAttemptFailure(id: string, message: string, attemptedAt: Date): Promise<void> {
    const row = this.tables.recurringInvoices.get(id);
    if (row) {
      row.lastError = message;
      row.lastAttemptAt = attemptedAt;
      row.failedAttempts += 1;
    }
  }

  async findInstances(
    recurringInvoiceId: string,
    filter: InstanceListFilter,
  ): Promise<RecurringInvoiceInstanceEntity[]> {
    return [...this.tables.instances.values()]
      .filter(
        (row) =>
          row.recurringInvoiceId === recurringInvoiceId &&
          (!filter.status || row.status === filter.status),
      )
      .sort((a, b) => b.occurrenceNumber - a.occurrenceNumber)
      .slice(0, filter.limit)
      .map(copy);
  }

  async findAwaitingInvoice(limit: number): Promise<RecurringInvoiceInstanceEntity[]> {
    return [...this.tables.instances.values()]
      .filter((row) => row.status === 'scheduled' && row.invoiceId === null)
      .sort(
        (a, b) =>
          compareDateOnly(a.scheduledDate, b.scheduledDate) ||
          a.createdAt.getTime() - b.createdAt.getTime(),
      )
      .slice(0, limit)
      .map(copy);
  }

  async findInstanceById(id: string): Promise<RecurringInvoiceInstanceEntity | null> {
    const row = this.tables.instances.get(id);
    return row ? copy(row) : null;
  }

  async insertInstance(
    data: NewRecurringInvoiceInstance,
  ): Promise<RecurringInvoiceInstanceEntity> {
    this.store.failIfArmed('recurringInvoices.insertInstance', data.recurringInvoiceId);
    const duplicate = [...this.tables.instances.values()].some(
      (row) =>
        row.recurringInvoiceId === data.recurringInvoiceId &&
        row.occurrenceNumber === data.occurrenceNumber,
    );
    if (duplicate) {
      throw new Error(
        'duplicate key value violates unique constraint "uq_recurring_invoice_instances_occurrence"',
      );
    }

    const now = new Date();
    const row: RecurringInvoiceInstanceEntity = {
      ...data,
      id: randomUUID(),
      invoiceId: null,
      generatedAt: null,
      sentAt: null,
      errorMessage: null,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.instances.set(row.id, copy(row));
    return row;
  }

  async saveInstance(
    instance: RecurringInvoiceInstanceEntity,
  ): Promise<RecurringInvoiceInstanceEntity> {
    const row = { ...instance, updatedAt: new Date() };
    this.tables.instances.set(row.id, copy(row));
    return row;
  }

  async cancelScheduledInstances(recurringInvoiceId: string): Promise<number> {
    let count = 0;
    for (const row of this.tables.instances.values()) {
      if (row.recurringInvoiceId === recurringInvoiceId && row.status === 'scheduled') {
        row.status = 'cancelled';
        count++;
      }
    }
    return count;
  }
}

class InMemoryInvoiceRepository implements IInvoiceRepository {
  constructor(private readonly store: InMemoryBillingStore) {}

  private get tables(): Tables {
    return this.store.tables;
  }

  async findById(id: string): Promise<InvoiceEntity | null> {
    const row = this.tables.invoices.get(id);
    return row ? copy(row) : null;
  }

  async findByIdForUpdate(id: string): Promise<InvoiceEntity | null> {
    this.store.failIfArmed('invoices.findByIdForUpdate', id);
    return this.findById(id);
  }

  async findByIds(ids: readonly string[]): Promise<InvoiceEntity[]> {
    return ids.flatMap((id) => {
      const row = this.tables.invoices.get(id);
      return row ? [copy(row)] : [];
    });
  }

  async create(data: NewInvoice): Promise<InvoiceEntity> {
    const now = new Date();
    const row: InvoiceEntity = {
      ...data,
      id: randomUUID(),
      paidDate: null,
      overdueDate: null,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.invoices.set(row.id, copy(row));
    return row;
  }

  async save(invoice: InvoiceEntity): Promise<InvoiceEntity> {
    this.store.failIfArmed('invoices.save', invoice.id);
    const row = { ...invoice, updatedAt: new Date() };
    this.tables.invoices.set(row.id, copy(row));
    return row;
  }

  async findOverdueCandidates(asOf: DateOnly): Promise<InvoiceEntity[]> {
    return [...this.tables.invoices.values()]
      .filter((row) => isInvoiceOverdue(row, asOf))
      .map(copy);
  }

  async findPayments(invoiceId: string): Promise<InvoicePaymentEntity[]> {
    return [...this.tables.payments.values()]
      .filter((row) => row.invoiceId === invoiceId)
      .sort((a, b) => compareDateOnly(a.paymentDate, b.paymentDate))
      .map(copy);
  }

  async findPaymentById(id: string): Promise<InvoicePaymentEntity | null> {
    const row = this.tables.payments.get(id);
    return row ? copy(row) : null;
  }

  async insertPayment(data: NewInvoicePayment): Promise<InvoicePaymentEntity> {
    const row: InvoicePaymentEntity = { ...data, id: randomUUID(), createdAt: new Date() };
    this.tables.payments.set(row.id, copy(row));
    return row;
  }

  async savePayment(payment: InvoicePaymentEntity): Promise<InvoicePaymentEntity> {
    this.tables.payments.set(payment.id, copy(payment));
    return payment;
  }

  async deletePayment(id: string): Promise<void> {
    this.tables.payments.delete(id);
  }
}

class InMemoryPaymentPlanRepository implements IPaymentPlanRepository {
  constructor(private readonly store: InMemoryBillingStore) {}

  private get tables(): Tables {
    return this.store.tables;
  }

  async findById(id: string): Promise<PaymentPlanEntity | null> {
    const row = this.tables.plans.get(id);
    return row ? copy(row) : null;
  }

  async findByIdForUpdate(id: string): Promise<PaymentPlanEntity | null> {
    this.store.failIfArmed('paymentPlans.findByIdForUpdate', id);
    return this.findById(id);
  }

  async findOpenByInvoiceId(invoiceId: string): Promise<PaymentPlanEntity | null> {
    const row = [...this.tables.plans.values()].find(
      (plan) =>
        plan.invoiceId === invoiceId && (plan.status === 'active' || plan.status === 'past_due'),
    );
    return row ? copy(row) : null;
  }

  async create(
    plan: NewPaymentPlan,
    installments: readonly NewInstallment[],
  ): Promise<{ plan: PaymentPlanEntity; installments: PaymentPlanInstallmentEntity[] }> {
    const now = new Date();
    const savedPlan: PaymentPlanEntity = { ...plan, id: randomUUID(), createdAt: now, updatedAt: now };
    this.tables.plans.set(savedPlan.id, copy(savedPlan));

    const savedInstallments = installments.map((installment) => {
      const row: PaymentPlanInstallmentEntity = {
        ...installment,
        id: randomUUID(),
        paymentPlanId: savedPlan.id,
        paidAmount: 0,
        status: 'pending',
        paidDate: null,
        overdueDate: null,
        createdAt: now,
        updatedAt: now,
      };
      this.tables.installments.set(row.id, copy(row));
      return row;
    });

    return { plan: savedPlan, installments: savedInstallments };
  }

  async save(plan: PaymentPlanEntity): Promise<PaymentPlanEntity> {
    const row = { ...plan, updatedAt: new Date() };
    this.tables.plans.set(row.id, copy(row));
    return row;
  }

  async findInstallments(paymentPlanId: string): Promise<PaymentPlanInstallmentEntity[]> {
    return [...this.tables.installments.values()]
      .filter((row) => row.paymentPlanId === paymentPlanId)
      .sort((a, b) => a.installmentNumber - b.installmentNumber)
      .map(copy);
  }

  async saveInstallment(
    installment: PaymentPlanInstallmentEntity,
  ): Promise<PaymentPlanInstallmentEntity> {
    const row = { ...installment, updatedAt: new Date() };
    this.tables.installments.set(row.id, copy(row));
    return row;
  }

  async findOverdueInstallmentCandidates(
    asOf: DateOnly,
  ): Promise<PaymentPlanInstallmentEntity[]> {
    return [...this.tables.installments.values()]
      .filter((row) => row.status === 'pending' && compareDateOnly(row.dueDate, asOf) < 0)
      .sort((a, b) => compareDateOnly(a.dueDate, b.dueDate))
      .map(copy);
  }
}

/**
 * BillingStore kept in maps. A transaction works on a copy of every table and
 * swaps it in only when the work resolves.
 */
export class InMemoryBillingStore implements BillingStore {
  tables: Tables = {
    recurringInvoices: new Map(),
    instances: new Map(),
    invoices: new Map(),
    payments: new Map(),
    plans: new Map(),
    installments: new Map(),
  };

  readonly recurringInvoices = new InMemoryRecurringInvoiceRepository(this);
  readonly invoices = new InMemoryInvoiceRepository(this);
  readonly paymentPlans = new InMemoryPaymentPlanRepository(this);

  private readonly failures = new Map<string, Set<string>>();

  async transaction<T>(work: (store: BillingStore) => Promise<T>): Promise<T> {
    const committed = this.tables;
    this.tables = copyTables(committed);
    try {
      const result = await work(this);
      return result;
    } catch (error) {
      this.tables = committed;
      throw error;
    }
  }

  /**
   * Makes `method` throw whenever it is called for `id`
   */
  failOn(method: string, id: string): void {
    const ids = this.failures.get(method) ?? new Set<string>();
    ids.add(id);
    this.failures.set(method, ids);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  failIfArmed(method: string, id: string): void {
    if (this.failures.get(method)?.has(id)) {
      throw new Error(`simulated failure in ${method} for ${id}`);
    }
  }
}

export class InMemorySchedulerLock implements SchedulerLock {
  private readonly held = new Set<number>();

  async runExclusive<T>(key: number, work: () => Promise<T>): Promise<ExclusiveRunResult<T>> {
    if (this.held.has(key)) {
      return { acquired: false };
    }
    this.held.add(key);
    try {
      return { acquired: true, result: await work() };
    } finally {
      this.held.delete(key);
    }
  }

  /** Simulates another worker holding the lock */
  hold(key: number): void {
    this.held.add(key);
  }

  release(key: number): void {
    this.held.delete(key);
  }
}
