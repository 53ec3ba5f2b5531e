import { Test } from '@nestjs/testing';
import { RecurringBillingSchedulerService } from '@invoicing/billing';
import { RecurringInvoiceSchedulerJobHandler } from '../../src/modules/billing/jobs/recurring-invoice-scheduler.job-handler';
import { MATERIALIZE_QUEUE, SCHEDULER_QUEUE } from '../../src/modules/billing/jobs/queue-names';
import { QueueService } from '../../src/modules/queue/queue.service';
import { createBillingServices, recurringInvoiceRow } from '../support/billing-fixtures';

describe('RecurringInvoiceSchedulerJobHandler', () => {
  let services: ReturnType<typeof createBillingServices>;
  let sendJob: jest.Mock;
  let handler: RecurringInvoiceSchedulerJobHandler;

  const job = (asOf: string) => ({ id: `job-${asOf}`, name: SCHEDULER_QUEUE, data: { asOf } });

  beforeEach(async () => {
    services = createBillingServices();
    sendJob = jest.fn().mockResolvedValue('job-materialize');

    const moduleRef = await Test.createTestingModule({
      providers: [
        RecurringInvoiceSchedulerJobHandler,
        { provide: RecurringBillingSchedulerService, useValue: services.scheduler },
        { provide: QueueService, useValue: { sendJob } },
      ],
    }).compile();

    handler = moduleRef.get(RecurringInvoiceSchedulerJobHandler);
  });

  it('queues a materialize job for each generated instance', async () => {
    await services.store.recurringInvoices.create(recurringInvoiceRow());

    const summary = await handler.execute(job('2024-01-31'));

    const instanceId = summary.generated[0].instanceId;
    expect(sendJob).toHaveBeenCalledTimes(1);
    expect(sendJob).toHaveBeenCalledWith(
      MATERIALIZE_QUEUE,
      { instanceId },
      { singletonKey: instanceId, retryLimit: 3, retryBackoff: true },
    );
  });

  it('queues instances again on the retry after a failed enqueue', async () => {
    await services.store.recurringInvoices.create(recurringInvoiceRow());
    sendJob.mockRejectedValueOnce(new Error('queue down'));

    await expect(handler.execute(job('2024-01-31'))).rejects.toThrow(
      '1 of 1 recurring invoice instances could not be queued for invoicing',
    );
    const [stranded] = await services.scheduler.findAwaitingInvoice();
    expect(stranded).toMatchObject({ status: 'scheduled', invoiceId: null });

    const retry = await handler.execute(job('2024-01-31'));

    expect(retry.generated).toEqual([]);
    expect(sendJob).toHaveBeenCalledTimes(2);
    expect(sendJob).toHaveBeenLastCalledWith(
      MATERIALIZE_QUEUE,
      { instanceId: stranded.id },
      { singletonKey: stranded.id, retryLimit: 3, retryBackoff: true },
    );
  });

  it('does not queue instances that already have an invoice', async () => {
    await services.store.recurringInvoices.create(recurringInvoiceRow());
    const first = await handler.execute(job('2024-01-31'));
    await services.invoiceGenerationService.materialize(first.generated[0].instanceId);
    sendJob.mockClear();

    await handler.execute(job('2024-02-01'));

    expect(sendJob).not.toHaveBeenCalled();
  });

  it('rejects a malformed run date', async () => {
    await expect(handler.execute(job('31/01/2024'))).rejects.toEqual([
      expect.objectContaining({ property: 'asOf' }),
    ]);
    expect(sendJob).not.toHaveBeenCalled();
  });
});
