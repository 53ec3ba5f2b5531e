/**
 * Base class for errors raised by the billing domain.
 */
export class BillingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A schedule, date or amount that can never be valid. Raised before anything
 * is written.
 */
export class InvalidScheduleError extends BillingError {}

/**
 * A single row could not be written during a batch job (lock contention,
 * constraint violation, lost connection). The row keeps its previous state and
 * is picked up again by the next run.
 */
export class TransientPersistenceError extends BillingError {
  readonly entityId: string;
  readonly originalError: unknown;

  constructor(entityId: string, cause: unknown) {
    super(
      `Failed to persist ${entityId}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.entityId = entityId;
    this.originalError = cause;
  }
}
