import {
  applyInstallmentPayment,
  buildInstallmentSchedule,
  derivePaymentPlanStatus,
  InvalidScheduleError,
} from '@invoicing/billing';

describe('buildInstallmentSchedule', () => {
  it('splits the amount evenly and puts the remainder on the last installment', () => {
    expect(
      buildInstallmentSchedule({
        startDate: '2024-01-31',
        installmentCount: 3,
        frequency: 'monthly',
        financedAmount: 100,
      }),
    ).toEqual([
      { installmentNumber: 1, dueDate: '2024-01-31', amount: 33.33 },
      { installmentNumber: 2, dueDate: '2024-02-29', amount: 33.33 },
      { installmentNumber: 3, dueDate: '2024-03-31', amount: 33.34 },
    ]);
  });

  it('spaces weekly and biweekly installments from the start date', () => {
    const biweekly = buildInstallmentSchedule({
      startDate: '2024-01-01',
      installmentCount: 2,
      frequency: 'biweekly',
      financedAmount: 50,
    });
    expect(biweekly.map((installment) => installment.dueDate)).toEqual([
      '2024-01-01',
      '2024-01-15',
    ]);

    const weekly = buildInstallmentSchedule({
      startDate: '2024-01-01',
      installmentCount: 4,
      frequency: 'weekly',
      financedAmount: 50,
    });
    expect(weekly.map((installment) => installment.dueDate)).toEqual([
      '2024-01-01',
      '2024-01-08',
      '2024-01-15',
      '2024-01-22',
    ]);
    expect(weekly.map((installment) => installment.amount)).toEqual([12.5, 12.5, 12.5, 12.5]);
  });

  it('enforces between 2 and 24 installments', () => {
    const input = { startDate: '2024-01-01', frequency: 'monthly' as const, financedAmount: 100 };
    expect(() => buildInstallmentSchedule({ ...input, installmentCount: 1 })).toThrow(
      'Installment count must be between 2 and 24',
    );
    expect(() => buildInstallmentSchedule({ ...input, installmentCount: 25 })).toThrow(
      InvalidScheduleError,
    );
  });

  it('rejects a plan with nothing to finance', () => {
    expect(() =>
      buildInstallmentSchedule({
        startDate: '2024-01-01',
        installmentCount: 2,
        frequency: 'monthly',
        financedAmount: 0,
      }),
    ).toThrow('Nothing left to finance after the down payment');
  });
});

describe('applyInstallmentPayment', () => {
  it('marks the installment paid once the full amount is in', () => {
    expect(applyInstallmentPayment({ amount: 50, paidAmount: 20, status: 'pending' }, 30)).toEqual({
      paidAmount: 50,
      status: 'paid',
    });
  });

  it('keeps the status on a partial payment', () => {
    expect(applyInstallmentPayment({ amount: 50, paidAmount: 0, status: 'overdue' }, 10)).toEqual({
      paidAmount: 10,
      status: 'overdue',
    });
  });
});

describe('derivePaymentPlanStatus', () => {
  it('completes when every open installment is paid', () => {
    expect(
      derivePaymentPlanStatus('active', [{ status: 'paid' }, { status: 'paid' }]),
    ).toBe('completed');
  });

  it('is past due while any installment is overdue', () => {
    expect(
      derivePaymentPlanStatus('active', [{ status: 'paid' }, { status: 'overdue' }]),
    ).toBe('past_due');
  });

  it('returns to active once overdue installments are paid', () => {
    expect(
      derivePaymentPlanStatus('past_due', [{ status: 'paid' }, { status: 'pending' }]),
    ).toBe('active');
  });

  it('never leaves cancelled', () => {
    expect(derivePaymentPlanStatus('cancelled', [{ status: 'paid' }])).toBe('cancelled');
  });
});
