import { InvalidScheduleError } from '../errors/billing.errors';
import { addCalendarUnits, DateOnly } from './date-only';
import { fromCents, toCents } from './money';

export interface InvoiceLineItem {
  description: string;
  quantity?: number;
  unitPrice: number;
}

export interface InvoiceTotals {
  subtotal: number;
  taxAmount: number;
  total: number;
}

export function computeInvoiceTotals(
  lineItems: readonly InvoiceLineItem[],
  taxRate: number,
): InvoiceTotals {
  if (taxRate < 0 || taxRate > 100) {
    throw new InvalidScheduleError(`Tax rate must be between 0 and 100, got ${taxRate}`);
  }

  const subtotalCents = lineItems.reduce(
    (sum, item) => sum + Math.round((item.quantity ?? 1) * item.unitPrice * 100),
    0,
  );
  const taxCents = Math.round((subtotalCents * taxRate) / 100);

  return {
    subtotal: fromCents(subtotalCents),
    taxAmount: fromCents(taxCents),
    total: fromCents(subtotalCents + taxCents),
  };
}

const NET_TERMS_PATTERN = /^net\s*(\d{1,3})$/i;
const DUE_ON_RECEIPT_PATTERN = /^(due\s+on\s+receipt|upon\s+receipt)$/i;

/**
 * Days until payment is due for terms such as "Net 15" or "Due on receipt".
 * Unrecognized terms use `defaultDays`.
 */
export function paymentTermDays(terms: string | null, defaultDays: number): number {
  const normalized = (terms ?? '').trim();
  const net = NET_TERMS_PATTERN.exec(normalized);
  if (net) {
    return Number(net[1]);
  }
  if (DUE_ON_RECEIPT_PATTERN.test(normalized)) {
    return 0;
  }
  return defaultDays;
}

export function dueDateForTerms(
  invoiceDate: DateOnly,
  terms: string | null,
  defaultDays: number,
): DateOnly {
  return addCalendarUnits(invoiceDate, 'day', paymentTermDays(terms, defaultDays));
}

/**
 * `INV-YYYYMMDD-XXXXXXXX`, the suffix taken from a random UUID.
 */
export function formatInvoiceNumber(invoiceDate: DateOnly, uuid: string): string {
  const suffix = uuid.replace(/-/g, '').slice(0, 8).toUpperCase();
  return `INV-${invoiceDate.replace(/-/g, '')}-${suffix}`;
}

export function assertMoneyAmount(amount: number, label: string): void {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new InvalidScheduleError(`${label} must be greater than zero`);
  }
  if (Math.abs(amount * 100 - toCents(amount)) > 1e-6) {
    throw new InvalidScheduleError(`${label} has more than two decimal places`);
  }
}
