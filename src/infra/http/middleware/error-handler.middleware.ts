import { NextFunction, Request, Response } from 'express';
import { AppError } from '../../../shared/errors/base.error';
import { ValidationError } from '../../../shared/errors/validation.error';
import { logger } from '../../logger';

function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
  });
}

/**
 * Serializes errors as `{ error: { code, message, fields? } }`.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error('Request failed', {
        requestId: req.requestId,
        code: error.code,
        error: error.message,
      });
    }

    res.status(error.statusCode).json({
      error: {
        code: error.code,
        message: error.message,
        ...(error instanceof ValidationError && error.fields ? { fields: error.fields } : {}),
      },
    });
    return;
  }

  if (isBodyParserError(error) && error.status < 500) {
    res.status(error.status).json({ error: { code: 'BAD_REQUEST', message: error.message } });
    return;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  logger.error('Unhandled exception occurred', {
    requestId: req.requestId,
    error: err.message,
    stack: err.stack,
  });
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal Server Error' } });
}
