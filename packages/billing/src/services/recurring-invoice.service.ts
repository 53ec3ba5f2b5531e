import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { BILLING_OPTIONS, BILLING_STORE } from '../billing.tokens';
import type { BillingOptions } from '../config/billing.config';
import {
  compareDateOnly,
  DateOnly,
  maxDateOnly,
  parseDateOnly,
  todayDateOnly,
} from '../domain/date-only';
import { computeInvoiceTotals, InvoiceLineItem } from '../domain/invoice-amounts';
import { canTransitionInstance, InstanceStatus } from '../domain/instance-status';
import { fromCents, sumCents } from '../domain/money';
import {
  assertIntervalValue,
  isRecurrenceFrequency,
  isSeriesExhausted,
  previewOccurrences,
  PreviewedOccurrence,
  RecurrenceFrequency,
  RecurrenceStatus,
} from '../domain/recurrence';
import { InvalidScheduleError } from '../errors/billing.errors';
import { RecurringInvoiceEntity } from '../entities/recurring-invoice.entity';
import { RecurringInvoiceInstanceEntity } from '../entities/recurring-invoice-instance.entity';
import type { BillingStore } from '../interfaces/billing-store.interface';
import type { RecurringInvoiceListFilter } from '../interfaces/recurring-invoice-repository.interface';
import { assertLineItems } from './invoice.service';
import {
  GeneratedOccurrence,
  RecurringBillingSchedulerService,
} from './recurring-billing-scheduler.service';

export interface RecurrenceScheduleInput {
  frequency: string;
  interval?: number;
}

export interface CreateRecurringInvoiceInput {
  customerId: string;
  templateId?: string | null;
  schedule: RecurrenceScheduleInput;
  startDate: DateOnly;
  endDate?: DateOnly | null;
  maxOccurrences?: number | null;
  lineItems: InvoiceLineItem[];
  taxRate?: number;
  paymentTerms?: string;
  notes?: string | null;
  autoSend?: boolean;
  metadata?: Record<string, unknown> | null;
}

export interface UpdateRecurringInvoiceInput {
  schedule?: RecurrenceScheduleInput;
  endDate?: DateOnly | null;
  maxOccurrences?: number | null;
  lineItems?: InvoiceLineItem[];
  taxRate?: number;
  paymentTerms?: string;
  notes?: string | null;
  autoSend?: boolean;
}

export interface RecurringInvoiceStatistics {
  totalInstances: number;
  invoicedInstances: number;
  paidCount: number;
  totalRevenue: number;
  averageInvoiceAmount: number;
}

export interface RecurringInvoiceDetails {
  recurringInvoice: RecurringInvoiceEntity;
  recentInstances: RecurringInvoiceInstanceEntity[];
  statistics: RecurringInvoiceStatistics;
}

export interface PreviewedInvoice extends PreviewedOccurrence {
  amount?: number;
}

export interface CancelResult {
  recurringInvoice: RecurringInvoiceEntity;
  cancelledInstances: number;
}

const RECENT_INSTANCE_COUNT = 10;
const STATISTICS_INSTANCE_LIMIT = 1000;
export const CREATE_PREVIEW_COUNT = 5;

/**
 * Recurring Invoice Service
 * Lifecycle of recurring invoice definitions and their instances
 */
@Injectable()
export class RecurringInvoiceService {
  private readonly logger = new Logger(RecurringInvoiceService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    private readonly scheduler: RecurringBillingSchedulerService,
    @Inject(BILLING_OPTIONS)
    private readonly options: BillingOptions,
  ) {}

  async create(
    input: CreateRecurringInvoiceInput,
  ): Promise<{ recurringInvoice: RecurringInvoiceEntity; upcoming: PreviewedOccurrence[] }> {
    const frequency = this.assertFrequency(input.schedule.frequency);
    const intervalValue = input.schedule.interval ?? 1;
    assertIntervalValue(intervalValue);

    parseDateOnly(input.startDate, 'start date');
    const endDate = input.endDate ?? null;
    if (endDate !== null) {
      parseDateOnly(endDate, 'end date');
      if (compareDateOnly(endDate, input.startDate) < 0) {
        throw new InvalidScheduleError('End date must not be before the start date');
      }
    }
    const maxOccurrences = input.maxOccurrences ?? null;
    this.assertMaxOccurrences(maxOccurrences);

    assertLineItems(input.lineItems);
    const taxRate = input.taxRate ?? 0;
    computeInvoiceTotals(input.lineItems, taxRate);

    const recurringInvoice = await this.store.recurringInvoices.create({
      customerId: input.customerId,
      templateId: input.templateId ?? null,
      frequency,
      intervalValue,
      startDate: input.startDate,
      endDate,
      maxOccurrences,
      occurrencesGenerated: 0,
      nextOccurrenceDate: input.startDate,
      status: 'active',
      lineItems: input.lineItems,
      taxRate,
      paymentTerms: input.paymentTerms ?? 'Net 30',
      notes: input.notes ?? null,
      autoSend: input.autoSend ?? false,
      metadata: input.metadata ?? null,
    });

    this.logger.log(
      `Created recurring invoice ${recurringInvoice.id} for customer ${recurringInvoice.customerId} (${frequency} x${intervalValue}) starting ${recurringInvoice.startDate}`,
    );

    return {
      recurringInvoice,
      upcoming: previewOccurrences(recurringInvoice, CREATE_PREVIEW_COUNT),
    };
  }

  async list(
    filter: RecurringInvoiceListFilter,
  ): Promise<{ items: RecurringInvoiceEntity[]; total: number }> {
    return this.store.recurringInvoices.list(filter);
  }

  async findOne(id: string): Promise<RecurringInvoiceDetails> {
    const recurringInvoice = await this.getOrThrow(this.store, id);
    const instances = await this.store.recurringInvoices.findInstances(id, {
      limit: STATISTICS_INSTANCE_LIMIT,
    });

    const invoiceIds = instances.flatMap((instance) =>
      instance.invoiceId ? [instance.invoiceId] : [],
    );
    const invoices = invoiceIds.length > 0 ? await this.store.invoices.findByIds(invoiceIds) : [];
    const revenueCents = sumCents(invoices.map((invoice) => invoice.totalAmount));

    return {
      recurringInvoice,
      recentInstances: instances.slice(0, RECENT_INSTANCE_COUNT),
      statistics: {
        totalInstances: instances.length,
        invoicedInstances: invoices.length,
        paidCount: invoices.filter((invoice) => invoice.status === 'paid').length,
        totalRevenue: fromCents(revenueCents),
        averageInvoiceAmount:
          invoices.length > 0 ? fromCents(Math.round(revenueCents / invoices.length)) : 0,
      },
    };
  }

  /**
   * Schedule changes apply from the stored next occurrence date on; instances
   * already generated are left alone
   */
  async update(id: string, input: UpdateRecurringInvoiceInput): Promise<RecurringInvoiceEntity> {
    return this.store.transaction(async (tx) => {
      const definition = await this.getOrThrow(tx, id, true);
      if (definition.status !== 'active' && definition.status !== 'paused') {
        throw new BadRequestException(`Recurring invoice ${id} is ${definition.status}`);
      }

      if (input.schedule) {
        definition.frequency = this.assertFrequency(input.schedule.frequency);
        const intervalValue = input.schedule.interval ?? definition.intervalValue;
        assertIntervalValue(intervalValue);
        definition.intervalValue = intervalValue;
      }
      if (input.endDate !== undefined) {
        if (input.endDate !== null) {
          parseDateOnly(input.endDate, 'end date');
          if (compareDateOnly(input.endDate, definition.startDate) < 0) {
            throw new InvalidScheduleError('End date must not be before the start date');
          }
        }
        definition.endDate = input.endDate;
      }
      if (input.maxOccurrences !== undefined) {
        this.assertMaxOccurrences(input.maxOccurrences);
        definition.maxOccurrences = input.maxOccurrences;
      }
      if (input.lineItems !== undefined) {
        assertLineItems(input.lineItems);
        definition.lineItems = input.lineItems;
      }
      if (input.taxRate !== undefined) definition.taxRate = input.taxRate;
      if (input.paymentTerms !== undefined) definition.paymentTerms = input.paymentTerms;
      if (input.notes !== undefined) definition.notes = input.notes;
      if (input.autoSend !== undefined) definition.autoSend = input.autoSend;

      computeInvoiceTotals(definition.lineItems, definition.taxRate);

      if (isSeriesExhausted(definition)) {
        definition.status = 'expired';
        this.logger.log(`Recurring invoice ${id} has no occurrences left after update; expired`);
      }

      return tx.recurringInvoices.save(definition);
    });
  }

  async pause(id: string): Promise<RecurringInvoiceEntity> {
    return this.transition(id, ['active'], (definition) => {
      definition.status = 'paused';
    });
  }

  /**
   * Missed occurrences while paused are skipped: a next date in the past
   * moves up to `today`. A series with nothing left after that expires.
   */
  async resume(
    id: string,
    today: DateOnly = todayDateOnly(this.options.timezone),
  ): Promise<RecurringInvoiceEntity> {
    return this.transition(id, ['paused'], (definition) => {
      definition.nextOccurrenceDate = maxDateOnly(definition.nextOccurrenceDate, today);
      definition.status = isSeriesExhausted(definition) ? 'expired' : 'active';
    });
  }

  async cancel(id: string, cancelPending: boolean): Promise<CancelResult> {
    return this.store.transaction(async (tx) => {
      const definition = await this.getOrThrow(tx, id, true);
      if (definition.status !== 'active' && definition.status !== 'paused') {
        throw new BadRequestException(`Recurring invoice ${id} is already ${definition.status}`);
      }

      definition.status = 'cancelled';
      const recurringInvoice = await tx.recurringInvoices.save(definition);
      const cancelledInstances = cancelPending
        ? await tx.recurringInvoices.cancelScheduledInstances(id)
        : 0;

      this.logger.log(
        `Recurring invoice ${id} cancelled; ${cancelledInstances} pending instances cancelled`,
      );

      return { recurringInvoice, cancelledInstances };
    });
  }

  async preview(id: string, count: number, includeAmounts: boolean): Promise<PreviewedInvoice[]> {
    const definition = await this.getOrThrow(this.store, id);
    if (definition.status !== 'active' && definition.status !== 'paused') {
      return [];
    }

    const occurrences = previewOccurrences(definition, count);
    if (!includeAmounts) {
      return occurrences;
    }

    const { total } = computeInvoiceTotals(definition.lineItems, definition.taxRate);
    return occurrences.map((occurrence) => ({ ...occurrence, amount: total }));
  }

  /**
   * Generates the next occurrence now, whether or not it is due yet
   */
  async generateNext(
    id: string,
    today: DateOnly = todayDateOnly(this.options.timezone),
  ): Promise<GeneratedOccurrence> {
    const definition = await this.getOrThrow(this.store, id);
    if (definition.status !== 'active') {
      throw new BadRequestException(`Recurring invoice ${id} is ${definition.status}`);
    }

    const occurrence = await this.scheduler.generateOccurrence(id, today, { requireDue: false });
    if (!occurrence) {
      throw new BadRequestException(`Recurring invoice ${id} has no occurrences left`);
    }
    return occurrence;
  }

  async findInstances(
    id: string,
    filter: { status?: InstanceStatus; limit: number },
  ): Promise<RecurringInvoiceInstanceEntity[]> {
    await this.getOrThrow(this.store, id);
    return this.store.recurringInvoices.findInstances(id, filter);
  }

  async updateInstanceStatus(
    instanceId: string,
    status: InstanceStatus,
    errorMessage?: string | null,
  ): Promise<RecurringInvoiceInstanceEntity> {
    return this.store.transaction(async (tx) => {
      const instance = await tx.recurringInvoices.findInstanceById(instanceId);
      if (!instance) {
        throw new NotFoundException(`Recurring invoice instance not found: ${instanceId}`);
      }
      if (!canTransitionInstance(instance.status, status)) {
        throw new BadRequestException(
          `Cannot move instance ${instanceId} from ${instance.status} to ${status}`,
        );
      }

      instance.status = status;
      if (status === 'failed') {
        instance.errorMessage = errorMessage ?? null;
      }
      if (status === 'sent') {
        instance.sentAt = new Date();
      }
      if (status === 'generated' && instance.generatedAt === null) {
        instance.generatedAt = new Date();
      }

      return tx.recurringInvoices.saveInstance(instance);
    });
  }

  private async transition(
    id: string,
    from: readonly RecurrenceStatus[],
    apply: (definition: RecurringInvoiceEntity) => void,
  ): Promise<RecurringInvoiceEntity> {
    return this.store.transaction(async (tx) => {
      const definition = await this.getOrThrow(tx, id, true);
      if (!from.includes(definition.status)) {
        throw new BadRequestException(`Recurring invoice ${id} is ${definition.status}`);
      }

      apply(definition);
      const saved = await tx.recurringInvoices.save(definition);
      this.logger.log(`Recurring invoice ${id} is now ${saved.status}`);
      return saved;
    });
  }

  private async getOrThrow(
    store: BillingStore,
    id: string,
    forUpdate = false,
  ): Promise<RecurringInvoiceEntity> {
    const definition = forUpdate
      ? await store.recurringInvoices.findByIdForUpdate(id)
      : await store.recurringInvoices.findById(id);
    if (!definition) {
      throw new NotFoundException(`Recurring invoice not found: ${id}`);
    }
    return definition;
  }

  private assertFrequency(frequency: string): RecurrenceFrequency {
    if (!isRecurrenceFrequency(frequency)) {
      throw new InvalidScheduleError(`Unsupported frequency: ${frequency}`);
    }
    return frequency;
  }

  private assertMaxOccurrences(maxOccurrences: number | null): void {
    if (maxOccurrences !== null && (!Number.isInteger(maxOccurrences) || maxOccurrences < 1)) {
      throw new InvalidScheduleError('Max occurrences must be a positive integer');
    }
  }
}
