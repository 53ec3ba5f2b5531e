import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import type {
  PaymentPlanFrequency,
  PaymentPlanStatus,
} from '../domain/payment-plan';
import { decimalTransformer } from './decimal.transformer';

/**
 * Payment Plan Entity
 * Amortizes an invoice balance into dated installments
 */
@Entity('payment_plans')
@Index(['invoiceId', 'status'])
export class PaymentPlanEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  invoiceId!: string;

  // Invoice balance when the plan was set up
  @Column('decimal', { precision: 12, scale: 2, transformer: decimalTransformer })
  totalAmount!: number;

  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  downPayment!: number;

  @Column('int')
  installmentCount!: number;

  @Column('decimal', { precision: 12, scale: 2, transformer: decimalTransformer })
  installmentAmount!: number;

  @Column('varchar', { length: 20 })
  frequency!: PaymentPlanFrequency;

  @Column('date')
  startDate!: DateOnly;

  @Column('varchar', { length: 20, default: 'active' })
  status!: PaymentPlanStatus;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
