import { Inject, Injectable, Logger } from '@nestjs/common';
import { BILLING_OPTIONS, BILLING_STORE, SCHEDULER_LOCK } from '../billing.tokens';
import type { BillingOptions } from '../config/billing.config';
import { DateOnly, parseDateOnly, todayDateOnly } from '../domain/date-only';
import {
  advanceRecurrence,
  isRecurrenceDue,
  isSeriesExhausted,
  RecurrenceStatus,
} from '../domain/recurrence';
import type { RecurringInvoiceInstanceEntity } from '../entities/recurring-invoice-instance.entity';
import { TransientPersistenceError } from '../errors/billing.errors';
import type { BillingStore, SchedulerLock } from '../interfaces/billing-store.interface';

export interface GeneratedOccurrence {
  recurringInvoiceId: string;
  instanceId: string;
  occurrenceNumber: number;
  scheduledDate: DateOnly;
  nextOccurrenceDate: DateOnly;
  status: RecurrenceStatus;
  frequencyRecognized: boolean;
}

export interface FailedOccurrence {
  recurringInvoiceId: string;
  error: string;
}

export interface SchedulerRunSummary {
  asOf: DateOnly;
  skipped: boolean;
  processed: number;
  generated: GeneratedOccurrence[];
  failed: FailedOccurrence[];
  /** Definitions advanced with the 1-month fallback */
  fallbacks: string[];
}

/**
 * Recurring Billing Scheduler
 * Daily pass that turns due recurring invoices into scheduled instances
 */
@Injectable()
export class RecurringBillingSchedulerService {
  private readonly logger = new Logger(RecurringBillingSchedulerService.name);

  constructor(
    @Inject(BILLING_STORE)
    private readonly store: BillingStore,
    @Inject(SCHEDULER_LOCK)
    private readonly lock: SchedulerLock,
    @Inject(BILLING_OPTIONS)
    private readonly options: BillingOptions,
  ) {}

  /**
   * Run one pass. Only one pass runs at a time across all workers; a
   * concurrent call returns a skipped summary.
   */
  async run(options: { asOf?: DateOnly } = {}): Promise<SchedulerRunSummary> {
    const asOf = options.asOf ?? todayDateOnly(this.options.timezone);
    parseDateOnly(asOf, 'run date');

    const outcome = await this.lock.runExclusive(this.options.schedulerLockKey, () =>
      this.processDue(asOf),
    );

    if (!outcome.acquired) {
      this.logger.warn(
        `Recurring invoice run for ${asOf} skipped: another run holds the scheduler lock`,
      );
      return { asOf, skipped: true, processed: 0, generated: [], failed: [], fallbacks: [] };
    }

    return outcome.result;
  }

  /**
   * Generate the next occurrence of one definition in its own transaction.
   * With `requireDue` the definition must still be due on `asOf` once locked,
   * which makes a repeated run a no-op. Returns null when nothing was generated.
   */
  async generateOccurrence(
    recurringInvoiceId: string,
    asOf: DateOnly,
    options: { requireDue: boolean },
  ): Promise<GeneratedOccurrence | null> {
    return this.store.transaction(async (tx) => {
      const definition = await tx.recurringInvoices.findByIdForUpdate(recurringInvoiceId);
      if (!definition) {
        return null;
      }

      const eligible = options.requireDue
        ? isRecurrenceDue(definition, asOf)
        : definition.status === 'active' && !isSeriesExhausted(definition);
      if (!eligible) {
        return null;
      }

      const advance = advanceRecurrence(definition);
      if (!advance.frequencyRecognized) {
        this.logger.warn(
          `Recurring invoice ${definition.id} has unrecognized frequency "${definition.frequency}"; advancing by the 1-month fallback`,
        );
      }

      const instance = await tx.recurringInvoices.insertInstance({
        recurringInvoiceId: definition.id,
        occurrenceNumber: advance.occurrenceNumber,
        scheduledDate: advance.scheduledDate,
        status: 'scheduled',
      });

      definition.nextOccurrenceDate = advance.nextOccurrenceDate;
      definition.occurrencesGenerated = advance.occurrencesGenerated;
      definition.status = advance.status;
      definition.lastError = null;
      definition.failedAttempts = 0;
      await tx.recurringInvoices.save(definition);

      return {
        recurringInvoiceId: definition.id,
        instanceId: instance.id,
        occurrenceNumber: advance.occurrenceNumber,
        scheduledDate: advance.scheduledDate,
        nextOccurrenceDate: advance.nextOccurrenceDate,
        status: advance.status,
        frequencyRecognized: advance.frequencyRecognized,
      };
    });
  }

  /**
   * Instances committed as `scheduled` that still have no invoice. Includes
   * the ones whose materialize job was never queued.
   */
  async findAwaitingInvoice(): Promise<RecurringInvoiceInstanceEntity[]> {
    return this.store.recurringInvoices.findAwaitingInvoice(this.options.schedulerBatchSize);
  }

  private async processDue(asOf: DateOnly): Promise<SchedulerRunSummary> {
    const due = await this.store.recurringInvoices.findDue(
      asOf,
      this.options.schedulerBatchSize,
    );

    this.logger.log(`Found ${due.length} recurring invoices due on or before ${asOf}`);

    const summary: SchedulerRunSummary = {
      asOf,
      skipped: false,
      processed: due.length,
      generated: [],
      failed: [],
      fallbacks: [],
    };

    for (const definition of due) {
      try {
        const occurrence = await this.generateOccurrence(definition.id, asOf, {
          requireDue: true,
        });
        if (!occurrence) {
          continue;
        }

        summary.generated.push(occurrence);
        if (!occurrence.frequencyRecognized) {
          summary.fallbacks.push(definition.id);
        }
      } catch (error) {
        const failure = new TransientPersistenceError(definition.id, error);
        this.logger.error(
          `Recurring invoice ${definition.id} not generated: ${failure.message}`,
          error instanceof Error ? error.stack : undefined,
        );
        summary.failed.push({ recurringInvoiceId: definition.id, error: failure.message });
        await this.recordFailure(definition.id, failure.message);
      }
    }

    this.logger.log(
      `Recurring invoice run for ${asOf} completed. Generated: ${summary.generated.length}, Failed: ${summary.failed.length}`,
    );

    return summary;
  }

  private async recordFailure(recurringInvoiceId: string, message: string): Promise<void> {
    try {
      await this.store.recurringInvoices.recordAttemptFailure(
        recurringInvoiceId,
        message,
        new Date(),
      );
    } catch (error) {
      this.logger.error(
        `Could not record failed attempt for recurring invoice ${recurringInvoiceId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
