import type { DateOnly } from '../domain/date-only';
import type { PaymentPlanEntity } from '../entities/payment-plan.entity';
import type { PaymentPlanInstallmentEntity } from '../entities/payment-plan-installment.entity';

export type NewPaymentPlan = Omit<PaymentPlanEntity, 'id' | 'createdAt' | 'updatedAt'>;

export type NewInstallment = Pick<
  PaymentPlanInstallmentEntity,
  'installmentNumber' | 'dueDate' | 'amount'
>;

export interface IPaymentPlanRepository {
  findById(id: string): Promise<PaymentPlanEntity | null>;

  findByIdForUpdate(id: string): Promise<PaymentPlanEntity | null>;

  findOpenByInvoiceId(invoiceId: string): Promise<PaymentPlanEntity | null>;

  /**
   * Inserts the plan and its installments (pending, nothing paid)
   */
  create(
    plan: NewPaymentPlan,
    installments: readonly NewInstallment[],
  ): Promise<{ plan: PaymentPlanEntity; installments: PaymentPlanInstallmentEntity[] }>;

  save(plan: PaymentPlanEntity): Promise<PaymentPlanEntity>;

  findInstallments(paymentPlanId: string): Promise<PaymentPlanInstallmentEntity[]>;

  saveInstallment(
    installment: PaymentPlanInstallmentEntity,
  ): Promise<PaymentPlanInstallmentEntity>;

  /**
   * Pending installments due before `asOf`
   */
  findOverdueInstallmentCandidates(asOf: DateOnly): Promise<PaymentPlanInstallmentEntity[]>;
}
