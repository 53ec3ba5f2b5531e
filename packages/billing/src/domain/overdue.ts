import { compareDateOnly, DateOnly } from './date-only';
import { InvoiceStatus } from './invoice-balance';
import { InstallmentStatus } from './payment-plan';

export const OVERDUE_ELIGIBLE_STATUSES: readonly InvoiceStatus[] = [
  'sent',
  'viewed',
  'partial',
];

export interface OverdueInvoiceCandidate {
  status: InvoiceStatus;
  dueDate: DateOnly | null;
  balanceDue: number;
}

export interface OverdueInstallmentCandidate {
  status: InstallmentStatus;
  dueDate: DateOnly;
}

export function isInvoiceOverdue(
  invoice: OverdueInvoiceCandidate,
  asOf: DateOnly,
): boolean {
  return (
    OVERDUE_ELIGIBLE_STATUSES.includes(invoice.status) &&
    invoice.dueDate !== null &&
    compareDateOnly(invoice.dueDate, asOf) < 0 &&
    invoice.balanceDue > 0
  );
}

export function isInstallmentOverdue(
  installment: OverdueInstallmentCandidate,
  asOf: DateOnly,
): boolean {
  return (
    installment.status === 'pending' &&
    compareDateOnly(installment.dueDate, asOf) < 0
  );
}
