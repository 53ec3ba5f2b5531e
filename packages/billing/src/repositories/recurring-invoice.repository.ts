import { EntityManager, FindOptionsWhere, IsNull, Repository } from 'typeorm';
import type { DateOnly } from '../domain/date-only';
import { RecurringInvoiceEntity } from '../entities/recurring-invoice.entity';
import { RecurringInvoiceInstanceEntity } from '../entities/recurring-invoice-instance.entity';
import {
  IRecurringInvoiceRepository,
  InstanceListFilter,
  NewRecurringInvoice,
  NewRecurringInvoiceInstance,
  RecurringInvoiceListFilter,
} from '../interfaces/recurring-invoice-repository.interface';

/**
 * Recurring Invoice Repository Implementation
 * Bound to an EntityManager so the same code runs inside or outside a transaction
 */
export class RecurringInvoiceRepository implements IRecurringInvoiceRepository {
  constructor(private readonly manager: EntityManager) {}

  private get definitions(): Repository<RecurringInvoiceEntity> {
    return this.manager.getRepository(RecurringInvoiceEntity);
  }

  private get instances(): Repository<RecurringInvoiceInstanceEntity> {
    return this.manager.getRepository(RecurringInvoiceInstanceEntity);
  }

  async findDue(asOf: DateOnly, limit: number): Promise<RecurringInvoiceEntity[]> {
    return this.definitions
      .createQueryBuilder('ri')
      .where('ri.status = :status', { status: 'active' })
      .andWhere('ri.nextOccurrenceDate <= :asOf', { asOf })
      .andWhere('(ri.endDate IS NULL OR ri.nextOccurrenceDate <= ri.endDate)')
      .andWhere(
        '(ri.maxOccurrences IS NULL OR ri.occurrencesGenerated < ri.maxOccurrences)',
      )
      .orderBy('ri.failedAttempts', 'ASC')
      .addOrderBy('ri.nextOccurrenceDate', 'ASC')
      .addOrderBy('ri.id', 'ASC')
      .take(limit)
      .getMany();
  }

  async findById(id: string): Promise<RecurringInvoiceEntity | null> {
    return this.definitions.findOne({ where: { id } });
  }

  async findByIdForUpdate(id: string): Promise<RecurringInvoiceEntity | null> {
    return this.definitions.findOne({
      where: { id },
      lock: { mode: 'pessimistic_write' },
    });
  }

  async list(
    filter: RecurringInvoiceListFilter,
  ): Promise<{ items: RecurringInvoiceEntity[]; total: number }> {
    const where: FindOptionsWhere<RecurringInvoiceEntity> = {};
    if (filter.customerId) where.customerId = filter.customerId;
    if (filter.status) where.status = filter.status;
    if (filter.frequency) where.frequency = filter.frequency;

    const [items, total] = await this.definitions.findAndCount({
      where,
      order: { createdAt: 'DESC' },
      take: filter.limit,
      skip: filter.offset,
    });

    return { items, total };
  }

  async create(data: NewRecurringInvoice): Promise<RecurringInvoiceEntity> {
    return this.definitions.save(this.definitions.create(data));
  }

  async save(definition: RecurringInvoiceEntity): Promise<RecurringInvoiceEntity> {
    return this.definitions.save(definition);
  }

  async recordAttemptFailure(
    id: string,
    message: string,
    attemptedAt: Date,
  ): Promise<void> {
    await this.definitions
      .createQueryBuilder()
      .update(RecurringInvoiceEntity)
      .set({
        lastError: message,
        lastAttemptAt: attemptedAt,
        failedAttempts: () => 'failed_attempts + 1',
      })
      .where('id = :id', { id })
      .execute();
  }

  async findInstances(
    recurringInvoiceId: string,
    filter: InstanceListFilter,
  ): Promise<RecurringInvoiceInstanceEntity[]> {
    return this.instances.find({
      where: filter.status
        ? { recurringInvoiceId, status: filter.status }
        : { recurringInvoiceId },
      order: { occurrenceNumber: 'DESC' },
      take: filter.limit,
    });
  }

  async findAwaitingInvoice(limit: number): Promise<RecurringInvoiceInstanceEntity[]> {
    return this.instances.find({
      where: { status: 'scheduled', invoiceId: IsNull() },
      order: { scheduledDate: 'ASC', createdAt: 'ASC' },
      take: limit,
    });
  }

  async findInstanceById(id: string): Promise<RecurringInvoiceInstanceEntity | null> {
    return this.instances.findOne({ where: { id } });
  }

  async insertInstance(
    data: NewRecurringInvoiceInstance,
  ): Promise<RecurringInvoiceInstanceEntity> {
    return this.instances.save(
      this.instances.create({
        ...data,
        invoiceId: null,
        generatedAt: null,
        sentAt: null,
        errorMessage: null,
      }),
    );
  }

  async saveInstance(
    instance: RecurringInvoiceInstanceEntity,
  ): Promise<RecurringInvoiceInstanceEntity> {
    return this.instances.save(instance);
  }

  async cancelScheduledInstances(recurringInvoiceId: string): Promise<number> {
    const result = await this.instances.update(
      { recurringInvoiceId, status: 'scheduled' },
      { status: 'cancelled' },
    );
    return result.affected ?? 0;
  }
}
