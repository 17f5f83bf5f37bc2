import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors/AppError.js';
import { buildRequestLogContext, logger, logStructuredError } from '../utils/logger.js';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('App error', { message: err.message, code: err.code, details: err.details });
    }

    return res.status(err.statusCode).json({
      error: {
        code: err.code ?? 'APP_ERROR',
        message: err.message,
        details: err.details
      }
    });
  }

  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ error: { code: 'MALFORMED_JSON', message: 'Request body is not valid JSON' } });
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  logStructuredError({
    ...buildRequestLogContext(req),
    status: 500,
    error: message
  });
  return res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}
