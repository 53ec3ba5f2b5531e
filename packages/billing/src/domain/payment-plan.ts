import { InvalidScheduleError } from '../errors/billing.errors';
import { addCalendarUnits, CalendarUnit, DateOnly } from './date-only';
import { fromCents, toCents } from './money';

export const PAYMENT_PLAN_FREQUENCIES = ['weekly', 'biweekly', 'monthly'] as const;
export type PaymentPlanFrequency = (typeof PAYMENT_PLAN_FREQUENCIES)[number];

export const PAYMENT_PLAN_STATUSES = [
  'active',
  'completed',
  'past_due',
  'cancelled',
] as const;
export type PaymentPlanStatus = (typeof PAYMENT_PLAN_STATUSES)[number];

export const INSTALLMENT_STATUSES = [
  'pending',
  'paid',
  'overdue',
  'cancelled',
] as const;
export type InstallmentStatus = (typeof INSTALLMENT_STATUSES)[number];

export const MIN_INSTALLMENTS = 2;
export const MAX_INSTALLMENTS = 24;

const PLAN_STEPS: Record<PaymentPlanFrequency, { unit: CalendarUnit; amount: number }> = {
  weekly: { unit: 'week', amount: 1 },
  biweekly: { unit: 'week', amount: 2 },
  monthly: { unit: 'month', amount: 1 },
};

export interface InstallmentScheduleInput {
  startDate: DateOnly;
  installmentCount: number;
  frequency: PaymentPlanFrequency;
  financedAmount: number;
}

export interface ScheduledInstallment {
  installmentNumber: number;
  dueDate: DateOnly;
  amount: number;
}

/**
 * Splits `financedAmount` into equal installments. Every due date is counted
 * from the start date (start + i periods) so monthly plans starting on the
 * 31st do not drift after a short month. The last installment takes the
 * rounding remainder.
 */
export function buildInstallmentSchedule(
  input: InstallmentScheduleInput,
): ScheduledInstallment[] {
  const { startDate, installmentCount, frequency, financedAmount } = input;

  if (
    !Number.isInteger(installmentCount) ||
    installmentCount < MIN_INSTALLMENTS ||
    installmentCount > MAX_INSTALLMENTS
  ) {
    throw new InvalidScheduleError(
      `Installment count must be between ${MIN_INSTALLMENTS} and ${MAX_INSTALLMENTS}`,
    );
  }
  if (financedAmount <= 0) {
    throw new InvalidScheduleError('Nothing left to finance after the down payment');
  }

  const financedCents = toCents(financedAmount);
  const baseCents = Math.floor(financedCents / installmentCount);
  const remainderCents = financedCents - baseCents * installmentCount;
  const step = PLAN_STEPS[frequency];

  return Array.from({ length: installmentCount }, (_, index) => ({
    installmentNumber: index + 1,
    dueDate: addCalendarUnits(startDate, step.unit, step.amount * index),
    amount: fromCents(
      index === installmentCount - 1 ? baseCents + remainderCents : baseCents,
    ),
  }));
}

export interface InstallmentPaymentState {
  amount: number;
  paidAmount: number;
  status: InstallmentStatus;
}

export function applyInstallmentPayment(
  installment: InstallmentPaymentState,
  payment: number,
): Pick<InstallmentPaymentState, 'paidAmount' | 'status'> {
  const paidCents = toCents(installment.paidAmount) + toCents(payment);
  return {
    paidAmount: fromCents(paidCents),
    status: paidCents >= toCents(installment.amount) ? 'paid' : installment.status,
  };
}

/**
 * Cancelled and completed plans stay where they are; a plan also completes
 * when its invoice is settled outside the installments.
 */
export function derivePaymentPlanStatus(
  current: PaymentPlanStatus,
  installments: ReadonlyArray<{ status: InstallmentStatus }>,
): PaymentPlanStatus {
  if (current === 'cancelled' || current === 'completed') {
    return current;
  }

  const open = installments.filter((installment) => installment.status !== 'cancelled');
  if (open.length > 0 && open.every((installment) => installment.status === 'paid')) {
    return 'completed';
  }
  if (open.some((installment) => installment.status === 'overdue')) {
    return 'past_due';
  }
  return 'active';
}
