export * from './billing-store.interface';
export * from './invoice-repository.interface';
export * from './payment-plan-repository.interface';
export * from './recurring-invoice-repository.interface';
