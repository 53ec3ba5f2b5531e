export * from './invoice.service';
export * from './invoice-balance.service';
export * from './invoice-generation.service';
export * from './overdue-sweep.service';
export * from './payment-plan.service';
export * from './recurring-billing-scheduler.service';
export * from './recurring-invoice.service';
