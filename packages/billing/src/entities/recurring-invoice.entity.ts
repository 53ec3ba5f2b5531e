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
import type { RecurrenceStatus } from '../domain/recurrence';
import { decimalTransformer } from './decimal.transformer';

/**
 * Recurring Invoice Entity
 * A standing instruction to bill a customer on a fixed cadence
 */
@Entity('recurring_invoices')
@Index(['status', 'nextOccurrenceDate'])
@Index(['customerId'])
export class RecurringInvoiceEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  customerId!: string;

  @Column('uuid', { nullable: true })
  templateId!: string | null;

  // Kept as text: rows written before the enum existed may hold other values
  @Column('varchar', { length: 20 })
  frequency!: string;

  @Column('int', { default: 1 })
  intervalValue!: number;

  @Column('date')
  startDate!: DateOnly;

  @Column('date', { nullable: true })
  endDate!: DateOnly | null;

  @Column('int', { nullable: true })
  maxOccurrences!: number | null;

  @Column('int', { default: 0 })
  occurrencesGenerated!: number;

  @Column('date')
  nextOccurrenceDate!: DateOnly;

  @Column('varchar', { length: 20, default: 'active' })
  status!: RecurrenceStatus;

  @Column('jsonb', { default: () => "'[]'" })
  lineItems!: InvoiceLineItem[];

  @Column('decimal', {
    precision: 5,
    scale: 2,
    default: 0,
    transformer: decimalTransformer,
  })
  taxRate!: number;

  @Column('varchar', { length: 50, default: 'Net 30' })
  paymentTerms!: string;

  @Column('text', { nullable: true })
  notes!: string | null;

  @Column('boolean', { default: false })
  autoSend!: boolean;

  @Column('jsonb', { nullable: true })
  metadata!: Record<string, unknown> | null;

  // Last scheduler attempt that failed; cleared on the next success
  @Column('timestamptz', { nullable: true })
  lastAttemptAt!: Date | null;

  @Column('text', { nullable: true })
  lastError!: string | null;

  @Column('int', { default: 0 })
  failedAttempts!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
