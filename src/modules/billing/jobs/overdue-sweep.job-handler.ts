import { Injectable } from '@nestjs/common';
import { OverdueSweepService, OverdueSweepSummary } from '@invoicing/billing';
import { QueueJob } from '../../queue/queue.service';
import { RunDateDto } from '../dto/billing-job.dto';
import { parseJobPayload } from './job-payload';

@Injectable()
export class OverdueSweepJobHandler {
  constructor(private readonly overdueSweepService: OverdueSweepService) {}

  async execute(job: QueueJob): Promise<OverdueSweepSummary> {
    const { asOf } = await parseJobPayload(RunDateDto, job.data);
    return this.overdueSweepService.sweep({ asOf });
  }
}
