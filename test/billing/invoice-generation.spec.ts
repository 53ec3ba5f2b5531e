import { createBillingServices, CUSTOMER_ID, recurringInvoiceRow } from '../support/billing-fixtures';

describe('InvoiceGenerationService', () => {
  async function scheduleFirstOccurrence(autoSend = false) {
    const services = createBillingServices();
    const definition = await services.store.recurringInvoices.create(
      recurringInvoiceRow({ autoSend }),
    );
    const { generated } = await services.scheduler.run({ asOf: '2024-01-31' });
    return { ...services, definition, instanceId: generated[0].instanceId };
  }

  it('creates a draft invoice from the definition', async () => {
    const { invoiceGenerationService, instanceId } = await scheduleFirstOccurrence();

    const result = await invoiceGenerationService.materialize(instanceId);

    expect(result.created).toBe(true);
    expect(result.invoice).toMatchObject({
      customerId: CUSTOMER_ID,
      title: 'Recurring Invoice #1',
      invoiceDate: '2024-01-31',
      dueDate: '2024-03-01',
      subtotal: 300,
      taxAmount: 30,
      totalAmount: 330,
      amountPaid: 0,
      balanceDue: 330,
      status: 'draft',
      recurringInstanceId: instanceId,
    });
    expect(result.invoice?.invoiceNumber).toMatch(/^INV-20240131-[0-9A-F]{8}$/);
    expect(result.instance.status).toBe('generated');
    expect(result.instance.invoiceId).toBe(result.invoice?.id);
    expect(result.instance.generatedAt).toBeInstanceOf(Date);
  });

  it('sends the invoice straight away when the definition auto-sends', async () => {
    const { invoiceGenerationService, instanceId } = await scheduleFirstOccurrence(true);

    const result = await invoiceGenerationService.materialize(instanceId);

    expect(result.invoice?.status).toBe('sent');
    expect(result.invoice?.sentAt).toBeInstanceOf(Date);
    expect(result.instance.status).toBe('sent');
  });

  it('returns the existing invoice when called again', async () => {
    const { store, invoiceGenerationService, instanceId } = await scheduleFirstOccurrence();

    const first = await invoiceGenerationService.materialize(instanceId);
    const second = await invoiceGenerationService.materialize(instanceId);

    expect(second.created).toBe(false);
    expect(second.invoice?.id).toBe(first.invoice?.id);
    expect(store.tables.invoices.size).toBe(1);
  });

  it('marks the instance failed and rethrows, then succeeds on retry', async () => {
    const { store, definition, invoiceGenerationService, instanceId } =
      await scheduleFirstOccurrence();
    store.failOn('recurringInvoices.findByIdForUpdate', definition.id);

    await expect(invoiceGenerationService.materialize(instanceId)).rejects.toThrow(
      `simulated failure in recurringInvoices.findByIdForUpdate for ${definition.id}`,
    );

    const failed = await store.recurringInvoices.findInstanceById(instanceId);
    expect(failed?.status).toBe('failed');
    expect(failed?.errorMessage).toBe(
      `simulated failure in recurringInvoices.findByIdForUpdate for ${definition.id}`,
    );
    expect(store.tables.invoices.size).toBe(0);

    store.clearFailures();
    const retry = await invoiceGenerationService.materialize(instanceId);

    expect(retry.created).toBe(true);
    expect(retry.instance.status).toBe('generated');
    expect(retry.instance.errorMessage).toBeNull();
  });

  it('does not invoice a cancelled instance', async () => {
    const { recurringInvoiceService, invoiceGenerationService, definition, instanceId } =
      await scheduleFirstOccurrence();
    await recurringInvoiceService.cancel(definition.id, true);

    const result = await invoiceGenerationService.materialize(instanceId);

    expect(result).toMatchObject({ created: false, invoice: null });
    expect(result.instance.status).toBe('cancelled');
  });

  it('rejects an unknown instance', async () => {
    const { invoiceGenerationService } = createBillingServices();

    await expect(
      invoiceGenerationService.materialize('00000000-0000-4000-8000-000000000000'),
    ).rejects.toThrow('Recurring invoice instance not found: 00000000-0000-4000-8000-000000000000');
  });
});
