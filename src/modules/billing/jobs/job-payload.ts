import { plainToInstance, ClassConstructor } from 'class-transformer';
import { validateOrReject } from 'class-validator';

/**
 * Job data comes back from the queue as plain JSON; validate it with the
 * same DTO classes the HTTP layer uses
 */
export async function parseJobPayload<T extends object>(
  dto: ClassConstructor<T>,
  data: Record<string, unknown>,
): Promise<T> {
  const payload = plainToInstance(dto, data);
  await validateOrReject(payload);
  return payload;
}
