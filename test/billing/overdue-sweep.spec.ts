import { createBillingServices, CUSTOMER_ID } from '../support/billing-fixtures';

describe('OverdueSweepService', () => {
  function createInvoice(
    services: ReturnType<typeof createBillingServices>,
    send: boolean,
    unitPrice = 100,
  ) {
    return services.invoiceService.create({
      customerId: CUSTOMER_ID,
      invoiceDate: '2024-01-31',
      paymentTerms: 'Net 30',
      lineItems: [{ description: 'Monthly service', unitPrice }],
      send,
    });
  }

  it('marks unpaid invoices past their due date', async () => {
    const services = createBillingServices();
    const sent = await createInvoice(services, true);
    const draft = await createInvoice(services, false);

    const onDueDate = await services.overdueSweepService.sweep({ asOf: '2024-03-01' });
    expect(onDueDate.invoicesMarked).toEqual([]);

    const summary = await services.overdueSweepService.sweep({ asOf: '2024-03-02' });

    expect(summary.invoicesMarked).toEqual([sent.id]);
    expect(await services.store.invoices.findById(sent.id)).toMatchObject({
      status: 'overdue',
      overdueDate: '2024-03-02',
    });
    expect((await services.store.invoices.findById(draft.id))?.status).toBe('draft');
  });

  it('leaves paid invoices and earlier sweeps alone', async () => {
    const services = createBillingServices();
    const paid = await createInvoice(services, true);
    await services.invoiceBalanceService.recordPayment(paid.id, {
      amount: 100,
      paymentDate: '2024-02-10',
    });
    const open = await createInvoice(services, true);

    await services.overdueSweepService.sweep({ asOf: '2024-03-02' });
    const repeat = await services.overdueSweepService.sweep({ asOf: '2024-03-03' });

    expect(repeat.invoicesMarked).toEqual([]);
    expect((await services.store.invoices.findById(paid.id))?.status).toBe('paid');
    expect((await services.store.invoices.findById(open.id))?.overdueDate).toBe('2024-03-02');
  });

  it('marks partly paid invoices overdue', async () => {
    const services = createBillingServices();
    const invoice = await createInvoice(services, true);
    await services.invoiceBalanceService.recordPayment(invoice.id, {
      amount: 30,
      paymentDate: '2024-02-10',
    });

    const summary = await services.overdueSweepService.sweep({ asOf: '2024-03-02' });

    expect(summary.invoicesMarked).toEqual([invoice.id]);
    expect(await services.store.invoices.findById(invoice.id)).toMatchObject({
      status: 'overdue',
      balanceDue: 70,
    });
  });

  it('reports a failed invoice and carries on with the rest', async () => {
    const services = createBillingServices();
    const failing = await createInvoice(services, true);
    const healthy = await createInvoice(services, true);
    services.store.failOn('invoices.save', failing.id);

    const summary = await services.overdueSweepService.sweep({ asOf: '2024-03-02' });

    expect(summary.invoicesMarked).toEqual([healthy.id]);
    expect(summary.failed).toEqual([
      {
        entityId: failing.id,
        error: `Failed to persist ${failing.id}: simulated failure in invoices.save for ${failing.id}`,
      },
    ]);
    expect((await services.store.invoices.findById(failing.id))?.status).toBe('sent');
  });

  it('marks late installments and puts the plan past due', async () => {
    const services = createBillingServices();
    const invoice = await createInvoice(services, true, 300);
    const { plan } = await services.paymentPlanService.create({
      invoiceId: invoice.id,
      installmentCount: 3,
      frequency: 'monthly',
      startDate: '2024-01-15',
    });

    const summary = await services.overdueSweepService.sweep({ asOf: '2024-02-20' });

    const { plan: swept, installments } = await services.paymentPlanService.findOne(plan.id);
    expect(summary.installmentsMarked).toEqual([installments[0].id, installments[1].id]);
    expect(summary.plansUpdated).toEqual([plan.id]);
    expect(swept.status).toBe('past_due');
    expect(installments.map((installment) => installment.status)).toEqual([
      'overdue',
      'overdue',
      'pending',
    ]);
    expect(installments[0].overdueDate).toBe('2024-02-20');

    await services.paymentPlanService.payInstallment(plan.id, 1, { amount: 100 });
    const caughtUp = await services.paymentPlanService.payInstallment(plan.id, 2, { amount: 100 });
    expect(caughtUp.plan.status).toBe('active');
  });

  it('leaves the installments of a paid invoice alone', async () => {
    const services = createBillingServices();
    const invoice = await createInvoice(services, true, 300);
    const { plan } = await services.paymentPlanService.create({
      invoiceId: invoice.id,
      installmentCount: 2,
      frequency: 'monthly',
      startDate: '2024-01-15',
    });
    const current = await services.store.invoices.findById(invoice.id);
    if (!current) {
      throw new Error('expected the invoice');
    }
    await services.store.invoices.save({ ...current, status: 'paid', balanceDue: 0 });

    const summary = await services.overdueSweepService.sweep({ asOf: '2024-06-01' });

    expect(summary.installmentsMarked).toEqual([]);
    expect(summary.plansUpdated).toEqual([]);
    const { plan: untouched, installments } = await services.paymentPlanService.findOne(plan.id);
    expect(untouched.status).toBe('active');
    expect(installments.map((installment) => installment.status)).toEqual(['pending', 'pending']);
  });

  it('skips installments of cancelled plans', async () => {
    const services = createBillingServices();
    const invoice = await createInvoice(services, true, 300);
    const { plan } = await services.paymentPlanService.create({
      invoiceId: invoice.id,
      installmentCount: 2,
      frequency: 'monthly',
      startDate: '2024-01-15',
    });
    await services.paymentPlanService.cancel(plan.id);

    const summary = await services.overdueSweepService.sweep({ asOf: '2024-06-01' });

    expect(summary.installmentsMarked).toEqual([]);
    expect(summary.plansUpdated).toEqual([]);
  });
});
