import { Injectable, Logger } from '@nestjs/common';
import { InvoiceGenerationService } from '@invoicing/billing';
import { QueueJob } from '../../queue/queue.service';
import { MaterializeInstanceJobDto } from '../dto/billing-job.dto';
import { parseJobPayload } from './job-payload';

@Injectable()
export class RecurringInvoiceMaterializeJobHandler {
  private readonly logger = new Logger(RecurringInvoiceMaterializeJobHandler.name);

  constructor(private readonly invoiceGenerationService: InvoiceGenerationService) {}

  async execute(job: QueueJob): Promise<void> {
    const { instanceId } = await parseJobPayload(MaterializeInstanceJobDto, job.data);
    const result = await this.invoiceGenerationService.materialize(instanceId);

    if (!result.created) {
      this.logger.log(`Instance ${instanceId} already materialized (${result.instance.status})`);
    }
  }
}
