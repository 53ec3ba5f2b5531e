/**
 * Billing Jobs Controller
 * Manual triggers for the daily billing jobs
 */

import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { QueueService } from '../../queue/queue.service';
import { RunDateDto } from '../dto/billing-job.dto';
import { OVERDUE_SWEEP_QUEUE, SCHEDULER_QUEUE } from '../jobs/queue-names';

@ApiTags('Billing Jobs')
@Controller('billing/jobs')
export class BillingJobsController {
  constructor(private readonly queueService: QueueService) {}

  @Post('recurring-invoices')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Queue a recurring invoice scheduler run' })
  @ApiResponse({ status: 202, description: 'Run queued' })
  async runScheduler(@Body() dto: RunDateDto) {
    const jobId = await this.queueService.sendJob(
      SCHEDULER_QUEUE,
      dto.asOf ? { asOf: dto.asOf } : {},
    );

    return {
      success: true,
      data: { jobId, queue: SCHEDULER_QUEUE },
    };
  }

  @Post('overdue-sweep')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Queue an overdue sweep' })
  @ApiResponse({ status: 202, description: 'Sweep queued' })
  async runOverdueSweep(@Body() dto: RunDateDto) {
    const jobId = await this.queueService.sendJob(
      OVERDUE_SWEEP_QUEUE,
      dto.asOf ? { asOf: dto.asOf } : {},
    );

    return {
      success: true,
      data: { jobId, queue: OVERDUE_SWEEP_QUEUE },
    };
  }
}
