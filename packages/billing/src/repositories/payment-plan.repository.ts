import { EntityManager, In, LessThan, Repository } from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import { PaymentPlanEntity } from '../entities/payment-plan.entity';
import { PaymentPlanInstallmentEntity } from '../entities/payment-plan-installment.entity';
import {
  IPaymentPlanRepository,
  NewInstallment,
  NewPaymentPlan,
} from '../interfaces/payment-plan-repository.interface';

export class PaymentPlanRepository implements IPaymentPlanRepository {
  constructor(private readonly manager: EntityManager) {}

  private get plans(): Repository<PaymentPlanEntity> {
    return this.manager.getRepository(PaymentPlanEntity);
  }

  private get installments(): Repository<PaymentPlanInstallmentEntity> {
    return this.manager.getRepository(PaymentPlanInstallmentEntity);
  }

  async findById(id: string): Promise<PaymentPlanEntity | null> {
    return this.plans.findOne({ where: { id } });
  }

  async findByIdForUpdate(id: string): Promise<PaymentPlanEntity | null> {
    return this.plans.findOne({
      where: { id },
      lock: { mode: 'pessimistic_write' },
    });
  }

  async findOpenByInvoiceId(invoiceId: string): Promise<PaymentPlanEntity | null> {
    return this.plans.findOne({
      where: { invoiceId, status: In(['active', 'past_due']) },
    });
  }

  async create(
    plan: NewPaymentPlan,
    installments: readonly NewInstallment[],
  ): Promise<{ plan: PaymentPlanEntity; installments: PaymentPlanInstallmentEntity[] }> {
    const savedPlan = await this.plans.save(this.plans.create(plan));

    const savedInstallments = await this.installments.save(
      installments.map((installment) =>
        this.installments.create({
          ...installment,
          paymentPlanId: savedPlan.id,
          paidAmount: 0,
          status: 'pending',
          paidDate: null,
          overdueDate: null,
        }),
      ),
    );

    return { plan: savedPlan, installments: savedInstallments };
  }

  async save(plan: PaymentPlanEntity): Promise<PaymentPlanEntity> {
    return this.plans.save(plan);
  }

  async findInstallments(paymentPlanId: string): Promise<PaymentPlanInstallmentEntity[]> {
    return this.installments.find({
      where: { paymentPlanId },
      order: { installmentNumber: 'ASC' },
    });
  }

  async saveInstallment(
    installment: PaymentPlanInstallmentEntity,
  ): Promise<PaymentPlanInstallmentEntity> {
    return this.installments.save(installment);
  }

  async findOverdueInstallmentCandidates(
    asOf: DateOnly,
  ): Promise<PaymentPlanInstallmentEntity[]> {
    return this.installments.find({
      where: { status: 'pending', dueDate: LessThan(asOf) },
      order: { dueDate: 'ASC' },
    });
  }
}
