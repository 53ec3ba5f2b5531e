import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import type { InstallmentStatus } from '../domain/payment-plan';
import { decimalTransformer } from './decimal.transformer';

@Entity('payment_plan_installments')
@Index('uq_payment_plan_installments_number', ['paymentPlanId', 'installmentNumber'], {
  unique: true,
})
@Index(['status', 'dueDate'])
export class PaymentPlanInstallmentEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  paymentPlanId!: string;

  @Column('int')
  installmentNumber!: number;

  @Column('date')
  dueDate!: DateOnly;

  @Column('decimal', { precision: 12, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Column('decimal', { precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  paidAmount!: number;

  @Column('varchar', { length: 20, default: 'pending' })
  status!: InstallmentStatus; // pending, paid, overdue, cancelled

  @Column('date', { nullable: true })
  paidDate!: DateOnly | null;

  @Column('date', { nullable: true })
  overdueDate!: DateOnly | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
