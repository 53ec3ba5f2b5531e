export const BILLING_STORE = 'BILLING_STORE';
export const SCHEDULER_LOCK = 'SCHEDULER_LOCK';
export const BILLING_OPTIONS = 'BILLING_OPTIONS';
