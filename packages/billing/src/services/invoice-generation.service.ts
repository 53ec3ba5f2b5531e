import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { BILLING_STORE } from '../billing.tokens';
import { canTransitionInstance } from '../domain/instance-status';
import { InvoiceEntity } from '../entities/invoice.entity';
import { RecurringInvoiceInstanceEntity } from '../entities/recurring-invoice-instance.entity';
import type { BillingStore } from '../interfaces/billing-store.interface';
import { InvoiceService } from './invoice.service';

export interface MaterializeResult {
  instance: RecurringInvoiceInstanceEntity;
  invoice: InvoiceEntity | null;
  created: boolean;
}

/**
 * Invoice Generation Service
 * Turns a scheduled recurring instance into a real invoice
 */
@Injectable()
export class InvoiceGenerationService {
  private readonly logger = new Logger(InvoiceGenerationService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    private readonly invoiceService: InvoiceService,
  ) {}

  /**
   * Safe to call more than once: an instance that already has an invoice is
   * returned as is. A failure marks the instance `failed` and is rethrown so
   * the job is retried.
   */
  async materialize(instanceId: string): Promise<MaterializeResult> {
    try {
      return await this.store.transaction(async (tx) => {
        const found = await tx.recurringInvoices.findInstanceById(instanceId);
        if (!found) {
          throw new NotFoundException(`Recurring invoice instance not found: ${instanceId}`);
        }

        // The definition lock serializes concurrent workers on the same series
        const definition = await tx.recurringInvoices.findByIdForUpdate(found.recurringInvoiceId);
        if (!definition) {
          throw new NotFoundException(`Recurring invoice not found: ${found.recurringInvoiceId}`);
        }

        const instance = (await tx.recurringInvoices.findInstanceById(instanceId)) ?? found;
        if (instance.invoiceId || !canTransitionInstance(instance.status, 'generated')) {
          const existing = instance.invoiceId
            ? await tx.invoices.findById(instance.invoiceId)
            : null;
          return { instance, invoice: existing, created: false };
        }

        const invoice = await this.invoiceService.createWithin(tx, {
          customerId: definition.customerId,
          title: `Recurring Invoice #${instance.occurrenceNumber}`,
          invoiceDate: instance.scheduledDate,
          paymentTerms: definition.paymentTerms,
          lineItems: definition.lineItems,
          taxRate: definition.taxRate,
          notes: definition.notes,
          recurringInstanceId: instance.id,
          send: definition.autoSend,
        });

        instance.invoiceId = invoice.id;
        instance.generatedAt = new Date();
        instance.status = definition.autoSend ? 'sent' : 'generated';
        instance.sentAt = definition.autoSend ? invoice.sentAt : null;
        instance.errorMessage = null;
        const saved = await tx.recurringInvoices.saveInstance(instance);

        this.logger.log(
          `Instance ${instance.id} of recurring invoice ${definition.id} materialized as ${invoice.invoiceNumber}`,
        );

        return { instance: saved, invoice, created: true };
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to materialize instance ${instanceId}: ${message}`);
      await this.markFailed(instanceId, message);
      throw error;
    }
  }

  private async markFailed(instanceId: string, message: string): Promise<void> {
    try {
      const instance = await this.store.recurringInvoices.findInstanceById(instanceId);
      if (!instance || !canTransitionInstance(instance.status, 'failed')) {
        return;
      }
      instance.status = 'failed';
      instance.errorMessage = message;
      await this.store.recurringInvoices.saveInstance(instance);
    } catch (error) {
      this.logger.error(
        `Could not mark instance ${instanceId} as failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
