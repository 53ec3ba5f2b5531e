import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { BillingError, TransientPersistenceError } from './billing.errors';

/**
 * Maps domain errors to HTTP responses. Invalid input is a 400; a failed
 * write is a 503 the caller may retry.
 */
@Catch(BillingError)
export class BillingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(BillingExceptionFilter.name);

  catch(exception: BillingError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode =
      exception instanceof TransientPersistenceError
        ? HttpStatus.SERVICE_UNAVAILABLE
        : HttpStatus.BAD_REQUEST;

    if (statusCode === HttpStatus.SERVICE_UNAVAILABLE) {
      this.logger.error(exception.message);
    }

    response.status(statusCode).json({
      statusCode,
      error: exception.name,
      message: exception.message,
    });
  }
}
