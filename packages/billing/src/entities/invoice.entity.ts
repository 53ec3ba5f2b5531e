import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import type { InvoiceLineItem } from '../domain/invoice-amounts';
import type { InvoiceStatus } from '../domain/invoice-balance';
import { decimalTransformer } from './decimal.transformer';

@Entity('invoices')
@Index(['invoiceNumber'], { unique: true })
@Index(['customerId', 'invoiceDate'])
@Index(['status', 'dueDate'])
@Index(['recurringInstanceId'])
export class InvoiceEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('varchar', { length: 40 })
  invoiceNumber!: string;

  @Column('uuid')
  customerId!: string;

  @Column('uuid', { nullable: true })
  recurringInstanceId!: string | null;

  @Column('varchar', { length: 255, nullable: true })
  title!: string | null;

  @Column('date')
  invoiceDate!: DateOnly;

  @Column('date', { nullable: true })
  dueDate!: DateOnly | null;

  @Column('varchar', { length: 50, default: 'Net 30' })
  paymentTerms!: string;

  @Column('jsonb', { default: () => "'[]'" })
  lineItems!: InvoiceLineItem[];

  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  subtotal!: number;

  @Column('decimal', { precision: 5, scale: 2, default: 0, transformer: decimalTransformer })
  taxRate!: number;

  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  taxAmount!: number;

  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  totalAmount!: number;

  // Cached from invoice_payments; see recomputeInvoiceBalance
  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  amountPaid!: number;

  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  balanceDue!: number;

  @Column('varchar', { length: 20, default: 'draft' })
  status!: InvoiceStatus; // draft, sent, viewed, partial, paid, overdue, cancelled

  @Column('timestamptz', { nullable: true })
  sentAt!: Date | null;

  @Column('date', { nullable: true })
  paidDate!: DateOnly | null;

  @Column('date', { nullable: true })
  overdueDate!: DateOnly | null;

  @Column('text', { nullable: true })
  notes!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
