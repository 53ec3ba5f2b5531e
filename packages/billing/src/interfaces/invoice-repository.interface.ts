import type { DateOnly } from '../domain/date-only';
import type { InvoiceEntity } from '../entities/invoice.entity';
import type { InvoicePaymentEntity } from '../entities/invoice-payment.entity';

export type NewInvoice = Omit<
  InvoiceEntity,
  'id' | 'createdAt' | 'updatedAt' | 'paidDate' | 'overdueDate'
>;

export type NewInvoicePayment = Omit<InvoicePaymentEntity, 'id' | 'createdAt'>;

export interface IInvoiceRepository {
  findById(id: string): Promise<InvoiceEntity | null>;

  findByIdForUpdate(id: string): Promise<InvoiceEntity | null>;

  findByIds(ids: readonly string[]): Promise<InvoiceEntity[]>;

  create(data: NewInvoice): Promise<InvoiceEntity>;

  save(invoice: InvoiceEntity): Promise<InvoiceEntity>;

  /**
   * Invoices in sent/viewed/partial with a due date before `asOf` and an
   * open balance
   */
  findOverdueCandidates(asOf: DateOnly): Promise<InvoiceEntity[]>;

  findPayments(invoiceId: string): Promise<InvoicePaymentEntity[]>;

  findPaymentById(id: string): Promise<InvoicePaymentEntity | null>;

  insertPayment(data: NewInvoicePayment): Promise<InvoicePaymentEntity>;

  savePayment(payment: InvoicePaymentEntity): Promise<InvoicePaymentEntity>;

  deletePayment(id: string): Promise<void>;
}
