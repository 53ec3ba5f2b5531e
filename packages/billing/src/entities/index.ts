import { RecurringInvoiceEntity } from './recurring-invoice.entity';
import { RecurringInvoiceInstanceEntity } from './recurring-invoice-instance.entity';
import { InvoiceEntity } from './invoice.entity';
import { InvoicePaymentEntity } from './invoice-payment.entity';
import { PaymentPlanEntity } from './payment-plan.entity';
import { PaymentPlanInstallmentEntity } from './payment-plan-installment.entity';

export * from './recurring-invoice.entity';
export * from './recurring-invoice-instance.entity';
export * from './invoice.entity';
export * from './invoice-payment.entity';
export * from './payment-plan.entity';
export * from './payment-plan-installment.entity';
export * from './decimal.transformer';

export const BILLING_ENTITIES = [
  RecurringInvoiceEntity,
  RecurringInvoiceInstanceEntity,
  InvoiceEntity,
  InvoicePaymentEntity,
  PaymentPlanEntity,
  PaymentPlanInstallmentEntity,
];
