import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { BILLING_OPTIONS, BILLING_STORE } from '../billing.tokens';
import type { BillingOptions } from '../config/billing.config';
import { DateOnly, parseDateOnly, todayDateOnly } from '../domain/date-only';
import { assertMoneyAmount } from '../domain/invoice-amounts';
import { fromCents, toCents } from '../domain/money';
import {
  applyInstallmentPayment,
  buildInstallmentSchedule,
  derivePaymentPlanStatus,
  PaymentPlanFrequency,
} from '../domain/payment-plan';
import { InvoiceEntity } from '../entities/invoice.entity';
import { PaymentMethod } from '../entities/invoice-payment.entity';
import { PaymentPlanEntity } from '../entities/payment-plan.entity';
import { PaymentPlanInstallmentEntity } from '../entities/payment-plan-installment.entity';
import type { BillingStore } from '../interfaces/billing-store.interface';
import { InvoiceBalanceService } from './invoice-balance.service';

export interface CreatePaymentPlanInput {
  invoiceId: string;
  downPayment?: number;
  installmentCount: number;
  frequency: PaymentPlanFrequency;
  startDate?: DateOnly;
  paymentMethod?: PaymentMethod;
}

export interface PayInstallmentInput {
  amount: number;
  paymentDate?: DateOnly;
  paymentMethod?: PaymentMethod;
  reference?: string | null;
}

export interface PaymentPlanDetails {
  plan: PaymentPlanEntity;
  installments: PaymentPlanInstallmentEntity[];
}

export interface InstallmentPaymentResult {
  plan: PaymentPlanEntity;
  installment: PaymentPlanInstallmentEntity;
  invoice: InvoiceEntity;
}

@Injectable()
export class PaymentPlanService {
  private readonly logger = new Logger(PaymentPlanService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    private readonly invoiceBalanceService: InvoiceBalanceService,
    @Inject(BILLING_OPTIONS)
    private readonly options: BillingOptions,
  ) {}

  /**
   * Splits the open balance of an invoice, less the down payment, into
   * installments. The down payment is recorded against the invoice at once.
   */
  async create(input: CreatePaymentPlanInput): Promise<PaymentPlanDetails> {
    return this.store.transaction(async (tx) => {
      const invoice = await tx.invoices.findByIdForUpdate(input.invoiceId);
      if (!invoice) {
        throw new NotFoundException(`Invoice not found: ${input.invoiceId}`);
      }
      if (invoice.status === 'paid' || invoice.status === 'cancelled') {
        throw new BadRequestException(
          `Invoice ${invoice.invoiceNumber} is ${invoice.status} and cannot be put on a payment plan`,
        );
      }
      if (await tx.paymentPlans.findOpenByInvoiceId(invoice.id)) {
        throw new ConflictException(
          `Invoice ${invoice.invoiceNumber} already has an open payment plan`,
        );
      }

      const downPayment = input.downPayment ?? 0;
      if (downPayment !== 0) {
        assertMoneyAmount(downPayment, 'Down payment');
      }
      const balanceCents = toCents(invoice.balanceDue);
      const downCents = toCents(downPayment);
      if (downCents > balanceCents) {
        throw new BadRequestException('Down payment exceeds the invoice balance');
      }

      const startDate = input.startDate ?? todayDateOnly(this.options.timezone);
      parseDateOnly(startDate, 'start date');

      const schedule = buildInstallmentSchedule({
        startDate,
        installmentCount: input.installmentCount,
        frequency: input.frequency,
        financedAmount: fromCents(balanceCents - downCents),
      });

      const created = await tx.paymentPlans.create(
        {
          invoiceId: invoice.id,
          totalAmount: invoice.balanceDue,
          downPayment,
          installmentCount: input.installmentCount,
          installmentAmount: schedule[0].amount,
          frequency: input.frequency,
          startDate,
          status: 'active',
        },
        schedule,
      );

      if (downCents > 0) {
        await this.invoiceBalanceService.recordPaymentWithin(tx, invoice.id, {
          amount: downPayment,
          paymentMethod: input.paymentMethod,
          paymentPlanId: created.plan.id,
          notes: 'Payment plan down payment',
        });
      }

      this.logger.log(
        `Payment plan ${created.plan.id} created for invoice ${invoice.invoiceNumber}: ${input.installmentCount} x ${created.plan.installmentAmount}`,
      );

      return created;
    });
  }

  async findOne(planId: string): Promise<PaymentPlanDetails> {
    const plan = await this.store.paymentPlans.findById(planId);
    if (!plan) {
      throw new NotFoundException(`Payment plan not found: ${planId}`);
    }
    return { plan, installments: await this.store.paymentPlans.findInstallments(planId) };
  }

  /**
   * Pays toward one installment and records the same amount as an invoice
   * payment, so the invoice balance and the plan move together
   */
  async payInstallment(
    planId: string,
    installmentNumber: number,
    input: PayInstallmentInput,
  ): Promise<InstallmentPaymentResult> {
    return this.store.transaction(async (tx) => {
      const plan = await tx.paymentPlans.findByIdForUpdate(planId);
      if (!plan) {
        throw new NotFoundException(`Payment plan not found: ${planId}`);
      }
      if (plan.status === 'cancelled' || plan.status === 'completed') {
        throw new BadRequestException(`Payment plan ${planId} is ${plan.status}`);
      }

      const installments = await tx.paymentPlans.findInstallments(planId);
      const installment = installments.find(
        (candidate) => candidate.installmentNumber === installmentNumber,
      );
      if (!installment) {
        throw new NotFoundException(
          `Installment ${installmentNumber} not found on payment plan ${planId}`,
        );
      }
      if (installment.status === 'paid' || installment.status === 'cancelled') {
        throw new BadRequestException(
          `Installment ${installmentNumber} is already ${installment.status}`,
        );
      }

      assertMoneyAmount(input.amount, 'Installment payment');
      const remainingCents = toCents(installment.amount) - toCents(installment.paidAmount);
      if (toCents(input.amount) > remainingCents) {
        throw new BadRequestException(
          `Payment exceeds the ${fromCents(remainingCents)} remaining on installment ${installmentNumber}`,
        );
      }

      const paymentDate = input.paymentDate ?? todayDateOnly(this.options.timezone);
      const applied = applyInstallmentPayment(installment, input.amount);
      installment.paidAmount = applied.paidAmount;
      installment.status = applied.status;
      if (applied.status === 'paid') {
        installment.paidDate = paymentDate;
      }
      await tx.paymentPlans.saveInstallment(installment);

      const { invoice } = await this.invoiceBalanceService.recordPaymentWithin(
        tx,
        plan.invoiceId,
        {
          amount: input.amount,
          paymentDate,
          paymentMethod: input.paymentMethod,
          reference: input.reference,
          paymentPlanId: plan.id,
          notes: `Installment ${installmentNumber} of ${plan.installmentCount}`,
        },
      );

      // Settling the invoice closes the plan, so read both back
      const current = (await tx.paymentPlans.findByIdForUpdate(planId)) ?? plan;
      const refreshed = await tx.paymentPlans.findInstallments(planId);
      current.status = derivePaymentPlanStatus(current.status, refreshed);
      const savedPlan = await tx.paymentPlans.save(current);
      const savedInstallment =
        refreshed.find((candidate) => candidate.id === installment.id) ?? installment;

      return { plan: savedPlan, installment: savedInstallment, invoice };
    });
  }

  /**
   * Stops the plan; unpaid installments are cancelled, payments already made
   * stay on the invoice
   */
  async cancel(planId: string): Promise<PaymentPlanDetails> {
    return this.store.transaction(async (tx) => {
      const plan = await tx.paymentPlans.findByIdForUpdate(planId);
      if (!plan) {
        throw new NotFoundException(`Payment plan not found: ${planId}`);
      }
      if (plan.status === 'cancelled' || plan.status === 'completed') {
        throw new BadRequestException(`Payment plan ${planId} is already ${plan.status}`);
      }

      const installments = await tx.paymentPlans.findInstallments(planId);
      for (const installment of installments) {
        if (installment.status === 'pending' || installment.status === 'overdue') {
          installment.status = 'cancelled';
          await tx.paymentPlans.saveInstallment(installment);
        }
      }

      plan.status = 'cancelled';
      const saved = await tx.paymentPlans.save(plan);
      this.logger.log(`Payment plan ${planId} cancelled`);

      return { plan: saved, installments };
    });
  }
}
