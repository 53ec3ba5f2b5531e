import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import { decimalTransformer } from './decimal.transformer';

export const PAYMENT_METHODS = ['cash', 'check', 'card', 'ach', 'wire', 'other'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

@Entity('invoice_payments')
@Index(['invoiceId'])
@Index(['paymentPlanId'])
export class InvoicePaymentEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  invoiceId!: string;

  @Column('uuid', { nullable: true })
  paymentPlanId!: string | null;

  @Column('date')
  paymentDate!: DateOnly;

  @Column('decimal', { precision: 12, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Column('varchar', { length: 20, default: 'other' })
  paymentMethod!: PaymentMethod;

  @Column('varchar', { length: 100, nullable: true })
  reference!: string | null;

  @Column('text', { nullable: true })
  notes!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
