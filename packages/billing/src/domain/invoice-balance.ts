import { compareDateOnly, DateOnly } from './date-only';
import { fromCents, sumCents, toCents } from './money';

export const INVOICE_STATUSES = [
  'draft',
  'sent',
  'viewed',
  'partial',
  'paid',
  'overdue',
  'cancelled',
] as const;

export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export interface InvoiceBalanceSource {
  totalAmount: number;
  status: InvoiceStatus;
}

export interface PaymentContribution {
  amount: number;
  paymentDate: DateOnly;
}

export interface InvoiceBalance {
  amountPaid: number;
  balanceDue: number;
  status: InvoiceStatus;
  paidDate: DateOnly | null;
}

/**
 * Derives the cached summary fields of an invoice from its payments alone.
 *
 * - paid >= total (and something was paid): `paid`
 * - 0 < paid < total: `partial`
 * - nothing paid: status kept, except `paid`/`partial` which fall back to `sent`
 *
 * Cancelled invoices keep their status whatever the payments say.
 */
export function recomputeInvoiceBalance(
  invoice: InvoiceBalanceSource,
  payments: readonly PaymentContribution[],
): InvoiceBalance {
  const totalCents = toCents(invoice.totalAmount);
  const paidCents = sumCents(payments.map((payment) => payment.amount));
  const balanceCents = Math.max(totalCents - paidCents, 0);

  let status: InvoiceStatus = invoice.status;
  if (invoice.status !== 'cancelled') {
    if (paidCents > 0 && paidCents >= totalCents) {
      status = 'paid';
    } else if (paidCents > 0) {
      status = 'partial';
    } else if (invoice.status === 'paid' || invoice.status === 'partial') {
      status = 'sent';
    }
  }

  return {
    amountPaid: fromCents(paidCents),
    balanceDue: fromCents(balanceCents),
    status,
    paidDate: status === 'paid' ? latestPaymentDate(payments) : null,
  };
}

function latestPaymentDate(
  payments: readonly PaymentContribution[],
): DateOnly | null {
  return payments.reduce<DateOnly | null>(
    (latest, payment) =>
      latest === null || compareDateOnly(payment.paymentDate, latest) > 0
        ? payment.paymentDate
        : latest,
    null,
  );
}
