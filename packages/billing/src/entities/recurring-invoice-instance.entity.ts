import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import type { InstanceStatus } from '../domain/instance-status';

@Entity('recurring_invoice_instances')
@Index('uq_recurring_invoice_instances_occurrence', ['recurringInvoiceId', 'occurrenceNumber'], {
  unique: true,
})
@Index(['status'])
export class RecurringInvoiceInstanceEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  recurringInvoiceId!: string;

  @Column('uuid', { nullable: true })
  invoiceId!: string | null;

  @Column('int')
  occurrenceNumber!: number;

  @Column('date')
  scheduledDate!: DateOnly;

  @Column('timestamptz', { nullable: true })
  generatedAt!: Date | null;

  @Column('timestamptz', { nullable: true })
  sentAt!: Date | null;

  @Column('varchar', { length: 20, default: 'scheduled' })
  status!: InstanceStatus;

  @Column('text', { nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
