import { randomUUID } from 'crypto';
import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { BILLING_OPTIONS, BILLING_STORE } from '../billing.tokens';
import type { BillingOptions } from '../config/billing.config';
import { DateOnly, parseDateOnly, todayDateOnly } from '../domain/date-only';
import {
  computeInvoiceTotals,
  dueDateForTerms,
  formatInvoiceNumber,
  InvoiceLineItem,
} from '../domain/invoice-amounts';
import { canTransitionInstance } from '../domain/instance-status';
import { InvalidScheduleError } from '../errors/billing.errors';
import { InvoiceEntity } from '../entities/invoice.entity';
import { InvoicePaymentEntity } from '../entities/invoice-payment.entity';
import type { BillingStore } from '../interfaces/billing-store.interface';

export interface CreateInvoiceInput {
  customerId: string;
  title?: string | null;
  invoiceDate?: DateOnly;
  paymentTerms?: string;
  lineItems: InvoiceLineItem[];
  taxRate?: number;
  notes?: string | null;
  recurringInstanceId?: string | null;
  /** Issue straight away instead of leaving a draft */
  send?: boolean;
}

export interface InvoiceWithPayments {
  invoice: InvoiceEntity;
  payments: InvoicePaymentEntity[];
}

export function assertLineItems(lineItems: readonly InvoiceLineItem[]): void {
  if (lineItems.length === 0) {
    throw new InvalidScheduleError('At least one line item is required');
  }
  for (const item of lineItems) {
    if (!Number.isFinite(item.unitPrice) || item.unitPrice < 0) {
      throw new InvalidScheduleError(`Line item "${item.description}" has an invalid unit price`);
    }
    if (item.quantity !== undefined && (!Number.isFinite(item.quantity) || item.quantity <= 0)) {
      throw new InvalidScheduleError(`Line item "${item.description}" has an invalid quantity`);
    }
  }
}

@Injectable()
export class InvoiceService {
  private readonly logger = new Logger(InvoiceService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    @Inject(BILLING_OPTIONS)
    private readonly options: BillingOptions,
  ) {}

  async create(input: CreateInvoiceInput): Promise<InvoiceEntity> {
    return this.store.transaction((tx) => this.createWithin(tx, input));
  }

  /**
   * Totals are computed here from the line items; the due date follows the
   * payment terms counted from the invoice date
   */
  async createWithin(tx: BillingStore, input: CreateInvoiceInput): Promise<InvoiceEntity> {
    assertLineItems(input.lineItems);

    const invoiceDate = input.invoiceDate ?? todayDateOnly(this.options.timezone);
    parseDateOnly(invoiceDate, 'invoice date');

    const paymentTerms = input.paymentTerms ?? 'Net 30';
    const totals = computeInvoiceTotals(input.lineItems, input.taxRate ?? 0);
    const send = input.send ?? false;

    const invoice = await tx.invoices.create({
      invoiceNumber: formatInvoiceNumber(invoiceDate, randomUUID()),
      customerId: input.customerId,
      recurringInstanceId: input.recurringInstanceId ?? null,
      title: input.title ?? null,
      invoiceDate,
      dueDate: dueDateForTerms(invoiceDate, paymentTerms, this.options.defaultPaymentDays),
      paymentTerms,
      lineItems: input.lineItems,
      subtotal: totals.subtotal,
      taxRate: input.taxRate ?? 0,
      taxAmount: totals.taxAmount,
      totalAmount: totals.total,
      amountPaid: 0,
      balanceDue: totals.total,
      status: send ? 'sent' : 'draft',
      sentAt: send ? new Date() : null,
      notes: input.notes ?? null,
    });

    this.logger.log(
      `Created invoice ${invoice.invoiceNumber} for customer ${invoice.customerId}: total ${invoice.totalAmount}`,
    );

    return invoice;
  }

  async findOne(invoiceId: string): Promise<InvoiceWithPayments> {
    const invoice = await this.store.invoices.findById(invoiceId);
    if (!invoice) {
      throw new NotFoundException(`Invoice not found: ${invoiceId}`);
    }

    return { invoice, payments: await this.store.invoices.findPayments(invoiceId) };
  }

  /**
   * Issues a draft. A linked recurring instance moves to `sent` with it.
   */
  async send(invoiceId: string): Promise<InvoiceEntity> {
    return this.store.transaction(async (tx) => {
      const invoice = await tx.invoices.findByIdForUpdate(invoiceId);
      if (!invoice) {
        throw new NotFoundException(`Invoice not found: ${invoiceId}`);
      }
      if (invoice.status !== 'draft') {
        throw new BadRequestException(
          `Invoice ${invoice.invoiceNumber} is ${invoice.status}; only drafts can be sent`,
        );
      }

      const sentAt = new Date();
      invoice.status = 'sent';
      invoice.sentAt = sentAt;
      const saved = await tx.invoices.save(invoice);

      if (saved.recurringInstanceId) {
        const instance = await tx.recurringInvoices.findInstanceById(saved.recurringInstanceId);
        if (instance && canTransitionInstance(instance.status, 'sent')) {
          instance.status = 'sent';
          instance.sentAt = sentAt;
          await tx.recurringInvoices.saveInstance(instance);
        }
      }

      this.logger.log(`Invoice ${saved.invoiceNumber} sent`);
      return saved;
    });
  }
}
