export const SCHEDULER_QUEUE = 'recurring-invoice-scheduler';
export const OVERDUE_SWEEP_QUEUE = 'invoice-overdue-sweep';
export const MATERIALIZE_QUEUE = 'recurring-invoice-materialize';
