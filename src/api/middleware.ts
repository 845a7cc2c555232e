/**
 * API middleware: error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { TypedError, apiError, toTypedError } from '../domain/errors';
import { logger } from '../logger';

/** HTTP status for a typed error. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.startsWith('VALIDATION.NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'RECORD.DUPLICATE') return 409;
  return 500;
}

/** Final error handler: answers with the typed error envelope. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const typedError = toTypedError(err);
  const status = getHttpStatus(typedError);

  if (status >= 500) {
    logger.error('Request failed', {
      code: typedError.code,
      message: typedError.message,
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn('Request error', { code: typedError.code, status });
  }

  res.status(status).json(apiError(typedError));
}
