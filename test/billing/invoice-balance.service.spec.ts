import { BadRequestException, NotFoundException } from '@nestjs/common';
import { InvalidScheduleError } from '@invoicing/billing';
import { createBillingServices, CUSTOMER_ID, recurringInvoiceRow } from '../support/billing-fixtures';

describe('InvoiceBalanceService', () => {
  async function sentInvoice() {
    const services = createBillingServices();
    const invoice = await services.invoiceService.create({
      customerId: CUSTOMER_ID,
      invoiceDate: '2024-03-01',
      lineItems: [{ description: 'Consulting', unitPrice: 100 }],
      send: true,
    });
    return { ...services, invoice };
  }

  it('recalculates the balance after each payment', async () => {
    const { invoiceBalanceService, invoice } = await sentInvoice();

    const first = await invoiceBalanceService.recordPayment(invoice.id, {
      amount: 40,
      paymentDate: '2024-03-05',
      paymentMethod: 'card',
    });
    expect(first.payment).toMatchObject({ amount: 40, paymentMethod: 'card', paymentPlanId: null });
    expect(first.invoice).toMatchObject({
      amountPaid: 40,
      balanceDue: 60,
      status: 'partial',
      paidDate: null,
    });

    const second = await invoiceBalanceService.recordPayment(invoice.id, {
      amount: 60,
      paymentDate: '2024-03-10',
    });
    expect(second.invoice).toMatchObject({
      amountPaid: 100,
      balanceDue: 0,
      status: 'paid',
      paidDate: '2024-03-10',
    });
  });

  it('reverts the status as payments are removed', async () => {
    const { invoiceBalanceService, invoice } = await sentInvoice();
    const first = await invoiceBalanceService.recordPayment(invoice.id, {
      amount: 40,
      paymentDate: '2024-03-05',
    });
    const second = await invoiceBalanceService.recordPayment(invoice.id, {
      amount: 60,
      paymentDate: '2024-03-10',
    });

    const afterSecond = await invoiceBalanceService.deletePayment(second.payment.id);
    expect(afterSecond).toMatchObject({ amountPaid: 40, balanceDue: 60, status: 'partial' });

    const afterFirst = await invoiceBalanceService.deletePayment(first.payment.id);
    expect(afterFirst).toMatchObject({ amountPaid: 0, balanceDue: 100, status: 'sent' });
  });

  it('recalculates when a payment amount changes', async () => {
    const { invoiceBalanceService, invoice } = await sentInvoice();
    const { payment } = await invoiceBalanceService.recordPayment(invoice.id, {
      amount: 40,
      paymentDate: '2024-03-05',
    });

    const updated = await invoiceBalanceService.updatePayment(payment.id, {
      amount: 100,
      reference: 'CHK-1001',
    });

    expect(updated.payment).toMatchObject({ amount: 100, reference: 'CHK-1001' });
    expect(updated.invoice).toMatchObject({ status: 'paid', balanceDue: 0, paidDate: '2024-03-05' });
  });

  it('rejects payments on a cancelled invoice', async () => {
    const { store, invoiceBalanceService, invoice } = await sentInvoice();
    await store.invoices.save({ ...invoice, status: 'cancelled' });

    await expect(
      invoiceBalanceService.recordPayment(invoice.id, { amount: 10 }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('rejects invalid amounts without writing anything', async () => {
    const { store, invoiceBalanceService, invoice } = await sentInvoice();

    await expect(
      invoiceBalanceService.recordPayment(invoice.id, { amount: -5 }),
    ).rejects.toBeInstanceOf(InvalidScheduleError);
    expect(await store.invoices.findPayments(invoice.id)).toEqual([]);
  });

  it('rejects payments on an unknown invoice', async () => {
    const { invoiceBalanceService } = createBillingServices();

    await expect(
      invoiceBalanceService.recordPayment('00000000-0000-4000-8000-000000000000', { amount: 10 }),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('refuses to edit a payment that belongs to a payment plan', async () => {
    const { store, invoiceBalanceService, paymentPlanService, invoice } = await sentInvoice();
    const { plan } = await paymentPlanService.create({
      invoiceId: invoice.id,
      downPayment: 20,
      installmentCount: 2,
      frequency: 'monthly',
      startDate: '2024-04-01',
    });
    const [downPayment] = await store.invoices.findPayments(invoice.id);
    expect(downPayment.paymentPlanId).toBe(plan.id);

    await expect(invoiceBalanceService.deletePayment(downPayment.id)).rejects.toThrow(
      `Payment ${downPayment.id} belongs to payment plan ${plan.id} and cannot be changed directly`,
    );
    await expect(
      invoiceBalanceService.updatePayment(downPayment.id, { amount: 5 }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('marks the linked recurring instance paid when its invoice is settled', async () => {
    const services = createBillingServices();
    await services.store.recurringInvoices.create(recurringInvoiceRow());
    const { generated } = await services.scheduler.run({ asOf: '2024-01-31' });
    const { invoice } = await services.invoiceGenerationService.materialize(
      generated[0].instanceId,
    );
    if (!invoice) {
      throw new Error('expected an invoice');
    }
    await services.invoiceService.send(invoice.id);

    await services.invoiceBalanceService.recordPayment(invoice.id, {
      amount: 330,
      paymentDate: '2024-02-15',
    });

    const instance = await services.store.recurringInvoices.findInstanceById(
      generated[0].instanceId,
    );
    expect(instance?.status).toBe('paid');
  });
});
