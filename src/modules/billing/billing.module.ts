/**
 * Billing Module
 * HTTP surface and queue wiring for recurring billing
 */

import { Logger, Module, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BillingPackageModule,
  resolveBillingOptions,
  resolveBillingSchedule,
} from '@invoicing/billing';
import { QueueService } from '../queue/queue.service';
import { BillingJobsController } from './controllers/billing-jobs.controller';
import { InvoiceController } from './controllers/invoice.controller';
import { PaymentPlanController } from './controllers/payment-plan.controller';
import { RecurringInvoiceController } from './controllers/recurring-invoice.controller';
import { OverdueSweepJobHandler } from './jobs/overdue-sweep.job-handler';
import {
  MATERIALIZE_QUEUE,
  OVERDUE_SWEEP_QUEUE,
  SCHEDULER_QUEUE,
} from './jobs/queue-names';
import { RecurringInvoiceMaterializeJobHandler } from './jobs/recurring-invoice-materialize.job-handler';
import { RecurringInvoiceSchedulerJobHandler } from './jobs/recurring-invoice-scheduler.job-handler';

@Module({
  imports: [
    BillingPackageModule.forRootAsync({
      useFactory: (config: ConfigService) =>
        resolveBillingOptions((key) => config.get<string>(key)),
      inject: [ConfigService],
    }),
  ],
  controllers: [
    RecurringInvoiceController,
    InvoiceController,
    PaymentPlanController,
    BillingJobsController,
  ],
  providers: [
    RecurringInvoiceSchedulerJobHandler,
    RecurringInvoiceMaterializeJobHandler,
    OverdueSweepJobHandler,
  ],
})
export class BillingModule implements OnModuleInit {
  private readonly logger = new Logger(BillingModule.name);

  constructor(
    private readonly queueService: QueueService,
    private readonly configService: ConfigService,
    private readonly schedulerHandler: RecurringInvoiceSchedulerJobHandler,
    private readonly materializeHandler: RecurringInvoiceMaterializeJobHandler,
    private readonly overdueHandler: OverdueSweepJobHandler,
  ) {}

  async onModuleInit() {
    this.logger.log('Registering billing job handlers with queue service...');

    await this.queueService.registerHandler(SCHEDULER_QUEUE, async (job) => {
      await this.schedulerHandler.execute(job);
    });

    await this.queueService.registerHandler(MATERIALIZE_QUEUE, (job) =>
      this.materializeHandler.execute(job),
    );

    await this.queueService.registerHandler(OVERDUE_SWEEP_QUEUE, async (job) => {
      await this.overdueHandler.execute(job);
    });

    const schedule = resolveBillingSchedule((key) => this.configService.get<string>(key));
    await this.queueService.scheduleJob(SCHEDULER_QUEUE, schedule.schedulerCron, {}, {
      tz: schedule.timezone,
    });
    await this.queueService.scheduleJob(OVERDUE_SWEEP_QUEUE, schedule.overdueCron, {}, {
      tz: schedule.timezone,
    });

    this.logger.log('Billing job handlers registered successfully');
  }
}
