import { EntityManager, In, LessThan, MoreThan, Repository } from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import { OVERDUE_ELIGIBLE_STATUSES } from '../domain/overdue';
import { InvoiceEntity } from '../entities/invoice.entity';
import { InvoicePaymentEntity } from '../entities/invoice-payment.entity';
import {
  IInvoiceRepository,
  NewInvoice,
  NewInvoicePayment,
} from '../interfaces/invoice-repository.interface';

export class InvoiceRepository implements IInvoiceRepository {
  constructor(private readonly manager: EntityManager) {}

  private get invoices(): Repository<InvoiceEntity> {
    return this.manager.getRepository(InvoiceEntity);
  }

  private get payments(): Repository<InvoicePaymentEntity> {
    return this.manager.getRepository(InvoicePaymentEntity);
  }

  async findById(id: string): Promise<InvoiceEntity | null> {
    return this.invoices.findOne({ where: { id } });
  }

  async findByIdForUpdate(id: string): Promise<InvoiceEntity | null> {
    return this.invoices.findOne({
      where: { id },
      lock: { mode: 'pessimistic_write' },
    });
  }

  async findByIds(ids: readonly string[]): Promise<InvoiceEntity[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.invoices.find({ where: { id: In([...ids]) } });
  }

  async create(data: NewInvoice): Promise<InvoiceEntity> {
    return this.invoices.save(
      this.invoices.create({ ...data, paidDate: null, overdueDate: null }),
    );
  }

  async save(invoice: InvoiceEntity): Promise<InvoiceEntity> {
    return this.invoices.save(invoice);
  }

  async findOverdueCandidates(asOf: DateOnly): Promise<InvoiceEntity[]> {
    return this.invoices.find({
      where: {
        status: In([...OVERDUE_ELIGIBLE_STATUSES]),
        dueDate: LessThan(asOf),
        balanceDue: MoreThan(0),
      },
      order: { dueDate: 'ASC' },
    });
  }

  async findPayments(invoiceId: string): Promise<InvoicePaymentEntity[]> {
    return this.payments.find({
      where: { invoiceId },
      order: { paymentDate: 'ASC', createdAt: 'ASC' },
    });
  }

  async findPaymentById(id: string): Promise<InvoicePaymentEntity | null> {
    return this.payments.findOne({ where: { id } });
  }

  async insertPayment(data: NewInvoicePayment): Promise<InvoicePaymentEntity> {
    return this.payments.save(this.payments.create(data));
  }

  async savePayment(payment: InvoicePaymentEntity): Promise<InvoicePaymentEntity> {
    return this.payments.save(payment);
  }

  async deletePayment(id: string): Promise<void> {
    await this.payments.delete({ id });
  }
}
