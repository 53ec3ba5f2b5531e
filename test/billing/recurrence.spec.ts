import {
  advanceOccurrenceDate,
  advanceRecurrence,
  InvalidScheduleError,
  isRecurrenceDue,
  isSeriesExhausted,
  previewOccurrences,
  RecurrenceState,
} from '@invoicing/billing';

function state(overrides: Partial<RecurrenceState> = {}): RecurrenceState {
  return {
    frequency: 'monthly',
    intervalValue: 1,
    nextOccurrenceDate: '2024-01-31',
    occurrencesGenerated: 0,
    maxOccurrences: null,
    endDate: null,
    status: 'active',
    ...overrides,
  };
}

describe('advanceOccurrenceDate', () => {
  it('clamps month-end dates to the last day of a shorter month', () => {
    expect(advanceOccurrenceDate('2024-01-31', 'monthly')).toBe('2024-02-29');
    expect(advanceOccurrenceDate('2023-01-31', 'monthly')).toBe('2023-02-28');
    expect(advanceOccurrenceDate('2024-11-30', 'quarterly')).toBe('2025-02-28');
    expect(advanceOccurrenceDate('2024-02-29', 'annually')).toBe('2025-02-28');
  });

  it('multiplies the period by the interval', () => {
    expect(advanceOccurrenceDate('2024-01-01', 'weekly', 2)).toBe('2024-01-15');
    expect(advanceOccurrenceDate('2024-01-01', 'biweekly', 2)).toBe('2024-01-29');
    expect(advanceOccurrenceDate('2024-01-15', 'semi_annually')).toBe('2024-07-15');
    expect(advanceOccurrenceDate('2024-12-31', 'daily')).toBe('2025-01-01');
  });

  it('falls back to one month for an unknown frequency', () => {
    expect(advanceOccurrenceDate('2024-03-10', 'fortnightly')).toBe('2024-04-10');
  });

  it('rejects a non-positive interval', () => {
    expect(() => advanceOccurrenceDate('2024-01-01', 'weekly', 0)).toThrow(InvalidScheduleError);
  });
});

describe('advanceRecurrence', () => {
  it('chains the next date from the previous next date', () => {
    const first = advanceRecurrence(state());
    expect(first).toEqual({
      occurrenceNumber: 1,
      scheduledDate: '2024-01-31',
      nextOccurrenceDate: '2024-02-29',
      occurrencesGenerated: 1,
      status: 'active',
      frequencyRecognized: true,
    });

    const second = advanceRecurrence(
      state({ nextOccurrenceDate: first.nextOccurrenceDate, occurrencesGenerated: 1 }),
    );
    expect(second.scheduledDate).toBe('2024-02-29');
    expect(second.nextOccurrenceDate).toBe('2024-03-29');
  });

  it('completes the series on the last allowed occurrence', () => {
    const advance = advanceRecurrence(state({ maxOccurrences: 3, occurrencesGenerated: 2 }));
    expect(advance.occurrenceNumber).toBe(3);
    expect(advance.status).toBe('completed');
  });

  it('completes the series once the next date reaches the end date', () => {
    const advance = advanceRecurrence(
      state({ frequency: 'weekly', nextOccurrenceDate: '2024-01-08', endDate: '2024-01-15' }),
    );
    expect(advance.nextOccurrenceDate).toBe('2024-01-15');
    expect(advance.status).toBe('completed');
  });

  it('flags an unknown frequency', () => {
    expect(advanceRecurrence(state({ frequency: 'fortnightly' })).frequencyRecognized).toBe(false);
  });
});

describe('isRecurrenceDue', () => {
  it('is due on and after the next occurrence date', () => {
    expect(isRecurrenceDue(state(), '2024-01-30')).toBe(false);
    expect(isRecurrenceDue(state(), '2024-01-31')).toBe(true);
    expect(isRecurrenceDue(state(), '2024-03-01')).toBe(true);
  });

  it('is never due when not active', () => {
    expect(isRecurrenceDue(state({ status: 'paused' }), '2024-02-01')).toBe(false);
    expect(isRecurrenceDue(state({ status: 'cancelled' }), '2024-02-01')).toBe(false);
  });

  it('is not due past the end date or the occurrence limit', () => {
    expect(isRecurrenceDue(state({ endDate: '2024-01-30' }), '2024-02-01')).toBe(false);
    expect(isRecurrenceDue(state({ endDate: '2024-01-31' }), '2024-02-01')).toBe(true);
    expect(
      isRecurrenceDue(state({ maxOccurrences: 2, occurrencesGenerated: 2 }), '2024-02-01'),
    ).toBe(false);
  });
});

describe('isSeriesExhausted', () => {
  it('is exhausted when the limit is used up or the next date is past the end', () => {
    expect(isSeriesExhausted(state())).toBe(false);
    expect(isSeriesExhausted(state({ maxOccurrences: 1, occurrencesGenerated: 1 }))).toBe(true);
    expect(isSeriesExhausted(state({ endDate: '2024-01-31' }))).toBe(false);
    expect(isSeriesExhausted(state({ endDate: '2024-01-30' }))).toBe(true);
  });
});

describe('previewOccurrences', () => {
  it('lists upcoming dates with their occurrence numbers', () => {
    expect(previewOccurrences(state(), 3)).toEqual([
      { occurrenceNumber: 1, date: '2024-01-31' },
      { occurrenceNumber: 2, date: '2024-02-29' },
      { occurrenceNumber: 3, date: '2024-03-29' },
    ]);
  });

  it('stops at the occurrence limit', () => {
    const preview = previewOccurrences(
      state({ nextOccurrenceDate: '2024-01-15', maxOccurrences: 3 }),
      10,
    );
    expect(preview.map((occurrence) => occurrence.date)).toEqual([
      '2024-01-15',
      '2024-02-15',
      '2024-03-15',
    ]);
  });

  it('continues numbering after occurrences already generated', () => {
    const preview = previewOccurrences(
      state({ nextOccurrenceDate: '2024-03-15', occurrencesGenerated: 2, maxOccurrences: 3 }),
      5,
    );
    expect(preview).toEqual([{ occurrenceNumber: 3, date: '2024-03-15' }]);
  });

  it('stops before the end date', () => {
    const preview = previewOccurrences(
      state({ frequency: 'weekly', nextOccurrenceDate: '2024-01-01', endDate: '2024-01-15' }),
      5,
    );
    expect(preview.map((occurrence) => occurrence.date)).toEqual(['2024-01-01', '2024-01-08']);
  });

  it('previews a paused series as if it were active', () => {
    expect(previewOccurrences(state({ status: 'paused' }), 1)).toEqual([
      { occurrenceNumber: 1, date: '2024-01-31' },
    ]);
  });

  it('rejects counts outside 1-50', () => {
    expect(() => previewOccurrences(state(), 0)).toThrow(InvalidScheduleError);
    expect(() => previewOccurrences(state(), 51)).toThrow('Preview count must be between 1 and 50');
  });
});
