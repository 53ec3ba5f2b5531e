import { Inject, Injectable, Logger } from '@nestjs/common';
import { BILLING_OPTIONS, BILLING_STORE } from '../billing.tokens';
import type { BillingOptions } from '../config/billing.config';
import { DateOnly, parseDateOnly, todayDateOnly } from '../domain/date-only';
import { isInstallmentOverdue, isInvoiceOverdue } from '../domain/overdue';
import { derivePaymentPlanStatus } from '../domain/payment-plan';
import { TransientPersistenceError } from '../errors/billing.errors';
import type { BillingStore } from '../interfaces/billing-store.interface';

export interface OverdueSweepFailure {
  entityId: string;
  error: string;
}

export interface OverdueSweepSummary {
  asOf: DateOnly;
  invoicesMarked: string[];
  installmentsMarked: string[];
  plansUpdated: string[];
  failed: OverdueSweepFailure[];
}

/**
 * Overdue Sweep
 * Flags unpaid invoices and installments past their due date. Each invoice
 * and each plan is written in its own transaction.
 */
@Injectable()
export class OverdueSweepService {
  private readonly logger = new Logger(OverdueSweepService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    @Inject(BILLING_OPTIONS)
    private readonly billingOptions: BillingOptions,
  ) {}

  async sweep(options: { asOf?: DateOnly } = {}): Promise<OverdueSweepSummary> {
    const asOf = options.asOf ?? todayDateOnly(this.billingOptions.timezone);
    parseDateOnly(asOf, 'sweep date');

    const summary: OverdueSweepSummary = {
      asOf,
      invoicesMarked: [],
      installmentsMarked: [],
      plansUpdated: [],
      failed: [],
    };

    await this.sweepInvoices(asOf, summary);
    await this.sweepInstallments(asOf, summary);

    this.logger.log(
      `Overdue sweep for ${asOf}: ${summary.invoicesMarked.length} invoices, ${summary.installmentsMarked.length} installments, ${summary.failed.length} failures`,
    );

    return summary;
  }

  private async sweepInvoices(asOf: DateOnly, summary: OverdueSweepSummary): Promise<void> {
    const candidates = await this.store.invoices.findOverdueCandidates(asOf);

    for (const candidate of candidates) {
      try {
        const marked = await this.store.transaction(async (tx) => {
          const invoice = await tx.invoices.findByIdForUpdate(candidate.id);
          // A payment may have landed since the candidate query
          if (!invoice || !isInvoiceOverdue(invoice, asOf)) {
            return false;
          }
          invoice.status = 'overdue';
          invoice.overdueDate = asOf;
          await tx.invoices.save(invoice);
          return true;
        });

        if (marked) {
          summary.invoicesMarked.push(candidate.id);
        }
      } catch (error) {
        this.recordFailure(summary, new TransientPersistenceError(candidate.id, error));
      }
    }
  }

  private async sweepInstallments(asOf: DateOnly, summary: OverdueSweepSummary): Promise<void> {
    const candidates = await this.store.paymentPlans.findOverdueInstallmentCandidates(asOf);
    const planIds = [...new Set(candidates.map((installment) => installment.paymentPlanId))];

    for (const planId of planIds) {
      try {
        const result = await this.store.transaction(async (tx) => {
          const plan = await tx.paymentPlans.findByIdForUpdate(planId);
          if (!plan || plan.status === 'cancelled' || plan.status === 'completed') {
            return { marked: [], planChanged: false };
          }
          // Installments of a paid invoice are owed no longer
          const invoice = await tx.invoices.findById(plan.invoiceId);
          if (invoice?.status === 'paid') {
            return { marked: [], planChanged: false };
          }

          const installments = await tx.paymentPlans.findInstallments(planId);
          const marked: string[] = [];
          for (const installment of installments) {
            if (isInstallmentOverdue(installment, asOf)) {
              installment.status = 'overdue';
              installment.overdueDate = asOf;
              await tx.paymentPlans.saveInstallment(installment);
              marked.push(installment.id);
            }
          }

          const status = derivePaymentPlanStatus(plan.status, installments);
          const planChanged = status !== plan.status;
          if (planChanged) {
            plan.status = status;
            await tx.paymentPlans.save(plan);
          }

          return { marked, planChanged };
        });

        summary.installmentsMarked.push(...result.marked);
        if (result.planChanged) {
          summary.plansUpdated.push(planId);
        }
      } catch (error) {
        this.recordFailure(summary, new TransientPersistenceError(planId, error));
      }
    }
  }

  private recordFailure(summary: OverdueSweepSummary, failure: TransientPersistenceError): void {
    this.logger.error(failure.message);
    summary.failed.push({ entityId: failure.entityId, error: failure.message });
  }
}
