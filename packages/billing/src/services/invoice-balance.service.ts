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
import { assertMoneyAmount } from '../domain/invoice-amounts';
import { recomputeInvoiceBalance } from '../domain/invoice-balance';
import { canTransitionInstance } from '../domain/instance-status';
import { InvoiceEntity } from '../entities/invoice.entity';
import { InvoicePaymentEntity, PaymentMethod } from '../entities/invoice-payment.entity';
import type { BillingStore } from '../interfaces/billing-store.interface';

export interface RecordPaymentInput {
  amount: number;
  paymentDate?: DateOnly;
  paymentMethod?: PaymentMethod;
  reference?: string | null;
  notes?: string | null;
  paymentPlanId?: string | null;
}

export type UpdatePaymentInput = Partial<
  Pick<RecordPaymentInput, 'amount' | 'paymentDate' | 'paymentMethod' | 'reference' | 'notes'>
>;

export interface PaymentResult {
  payment: InvoicePaymentEntity;
  invoice: InvoiceEntity;
}

/**
 * Invoice Balance Service
 * Every payment write recomputes the invoice summary in the same transaction
 */
@Injectable()
export class InvoiceBalanceService {
  private readonly logger = new Logger(InvoiceBalanceService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    @Inject(BILLING_OPTIONS)
    private readonly options: BillingOptions,
  ) {}

  async recordPayment(invoiceId: string, input: RecordPaymentInput): Promise<PaymentResult> {
    return this.store.transaction((tx) => this.recordPaymentWithin(tx, invoiceId, input));
  }

  /**
   * For callers that already hold a transaction (payment plans)
   */
  async recordPaymentWithin(
    tx: BillingStore,
    invoiceId: string,
    input: RecordPaymentInput,
  ): Promise<PaymentResult> {
    const invoice = await this.lockInvoice(tx, invoiceId);
    if (invoice.status === 'cancelled') {
      throw new BadRequestException(`Invoice ${invoice.invoiceNumber} is cancelled`);
    }

    assertMoneyAmount(input.amount, 'Payment amount');
    const paymentDate = input.paymentDate ?? todayDateOnly(this.options.timezone);
    parseDateOnly(paymentDate, 'payment date');

    const payment = await tx.invoices.insertPayment({
      invoiceId: invoice.id,
      paymentPlanId: input.paymentPlanId ?? null,
      paymentDate,
      amount: input.amount,
      paymentMethod: input.paymentMethod ?? 'other',
      reference: input.reference ?? null,
      notes: input.notes ?? null,
    });

    const updated = await this.applyBalance(tx, invoice);
    this.logger.log(
      `Payment of ${input.amount} recorded on invoice ${invoice.invoiceNumber}; status ${updated.status}, balance ${updated.balanceDue}`,
    );

    return { payment, invoice: updated };
  }

  async updatePayment(paymentId: string, input: UpdatePaymentInput): Promise<PaymentResult> {
    return this.store.transaction(async (tx) => {
      const payment = await this.findEditablePayment(tx, paymentId);
      const invoice = await this.lockInvoice(tx, payment.invoiceId);

      if (input.amount !== undefined) {
        assertMoneyAmount(input.amount, 'Payment amount');
        payment.amount = input.amount;
      }
      if (input.paymentDate !== undefined) {
        parseDateOnly(input.paymentDate, 'payment date');
        payment.paymentDate = input.paymentDate;
      }
      if (input.paymentMethod !== undefined) payment.paymentMethod = input.paymentMethod;
      if (input.reference !== undefined) payment.reference = input.reference;
      if (input.notes !== undefined) payment.notes = input.notes;

      const saved = await tx.invoices.savePayment(payment);
      return { payment: saved, invoice: await this.applyBalance(tx, invoice) };
    });
  }

  async deletePayment(paymentId: string): Promise<InvoiceEntity> {
    return this.store.transaction(async (tx) => {
      const payment = await this.findEditablePayment(tx, paymentId);
      const invoice = await this.lockInvoice(tx, payment.invoiceId);

      await tx.invoices.deletePayment(payment.id);
      this.logger.log(`Payment ${payment.id} removed from invoice ${invoice.invoiceNumber}`);

      return this.applyBalance(tx, invoice);
    });
  }

  /**
   * Re-derive the cached totals from the payment rows as they are now
   */
  async recalculate(invoiceId: string): Promise<InvoiceEntity> {
    return this.store.transaction(async (tx) =>
      this.applyBalance(tx, await this.lockInvoice(tx, invoiceId)),
    );
  }

  private async lockInvoice(tx: BillingStore, invoiceId: string): Promise<InvoiceEntity> {
    const invoice = await tx.invoices.findByIdForUpdate(invoiceId);
    if (!invoice) {
      throw new NotFoundException(`Invoice not found: ${invoiceId}`);
    }
    return invoice;
  }

  private async findEditablePayment(
    tx: BillingStore,
    paymentId: string,
  ): Promise<InvoicePaymentEntity> {
    const payment = await tx.invoices.findPaymentById(paymentId);
    if (!payment) {
      throw new NotFoundException(`Payment not found: ${paymentId}`);
    }
    if (payment.paymentPlanId) {
      throw new BadRequestException(
        `Payment ${paymentId} belongs to payment plan ${payment.paymentPlanId} and cannot be changed directly`,
      );
    }
    return payment;
  }

  private async applyBalance(tx: BillingStore, invoice: InvoiceEntity): Promise<InvoiceEntity> {
    const payments = await tx.invoices.findPayments(invoice.id);
    Object.assign(invoice, recomputeInvoiceBalance(invoice, payments));
    const saved = await tx.invoices.save(invoice);

    if (saved.status === 'paid') {
      await this.closePaymentPlan(tx, saved);
    }

    if (saved.status === 'paid' && saved.recurringInstanceId) {
      const instance = await tx.recurringInvoices.findInstanceById(saved.recurringInstanceId);
      if (instance && canTransitionInstance(instance.status, 'paid')) {
        instance.status = 'paid';
        await tx.recurringInvoices.saveInstance(instance);
      }
    }

    return saved;
  }

  /**
   * Nothing is owed on the plan of a settled invoice: its open installments
   * are cancelled and the plan completes
   */
  private async closePaymentPlan(tx: BillingStore, invoice: InvoiceEntity): Promise<void> {
    const open = await tx.paymentPlans.findOpenByInvoiceId(invoice.id);
    if (!open) {
      return;
    }

    const plan = (await tx.paymentPlans.findByIdForUpdate(open.id)) ?? open;
    const installments = await tx.paymentPlans.findInstallments(plan.id);
    for (const installment of installments) {
      if (installment.status === 'pending' || installment.status === 'overdue') {
        installment.status = 'cancelled';
        await tx.paymentPlans.saveInstallment(installment);
      }
    }

    plan.status = 'completed';
    await tx.paymentPlans.save(plan);
    this.logger.log(`Payment plan ${plan.id} completed: invoice ${invoice.invoiceNumber} is paid`);
  }
}
