// Module
export * from './billing.module';
export * from './billing.tokens';

// Config
export * from './config/billing.config';

// Domain
export * from './domain/date-only';
export * from './domain/instance-status';
export * from './domain/invoice-amounts';
export * from './domain/invoice-balance';
export * from './domain/money';
export * from './domain/overdue';
export * from './domain/payment-plan';
export * from './domain/recurrence';

// Entities
export * from './entities';

// Errors
export * from './errors/billing.errors';
export * from './errors/billing-exception.filter';

// Persistence
export * from './interfaces';
export * from './repositories/invoice.repository';
export * from './repositories/payment-plan.repository';
export * from './repositories/recurring-invoice.repository';
export * from './repositories/typeorm-billing.store';

// Services
export * from './services';
