/**
 * Recurring Invoice Scheduler Job Handler
 * Daily cron: generates due occurrences, then queues a materialize job for
 * every instance still waiting for its invoice
 */

import { Injectable, Logger } from '@nestjs/common';
import { RecurringBillingSchedulerService, SchedulerRunSummary } from '@invoicing/billing';
import { QueueJob, QueueService } from '../../queue/queue.service';
import { RunDateDto } from '../dto/billing-job.dto';
import { parseJobPayload } from './job-payload';
import { MATERIALIZE_QUEUE } from './queue-names';

@Injectable()
export class RecurringInvoiceSchedulerJobHandler {
  private readonly logger = new Logger(RecurringInvoiceSchedulerJobHandler.name);

  constructor(
    private readonly scheduler: RecurringBillingSchedulerService,
    private readonly queueService: QueueService,
  ) {}

  async execute(job: QueueJob): Promise<SchedulerRunSummary> {
    const { asOf } = await parseJobPayload(RunDateDto, job.data);
    const summary = await this.scheduler.run({ asOf });

    if (summary.failed.length > 0) {
      this.logger.warn(
        `${summary.failed.length} recurring invoices failed on ${summary.asOf}; they stay due for the next run`,
      );
    }

    // Instances from earlier runs whose enqueue was lost are picked up here;
    // the singleton key keeps an instance from being queued twice
    const awaiting = await this.scheduler.findAwaitingInvoice();
    let notQueued = 0;

    for (const instance of awaiting) {
      try {
        await this.queueService.sendJob(
          MATERIALIZE_QUEUE,
          { instanceId: instance.id },
          { singletonKey: instance.id, retryLimit: 3, retryBackoff: true },
        );
      } catch (error) {
        notQueued++;
        this.logger.error(
          `Materialize job for instance ${instance.id} not queued: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (notQueued > 0) {
      throw new Error(
        `${notQueued} of ${awaiting.length} recurring invoice instances could not be queued for invoicing`,
      );
    }

    return summary;
  }
}
