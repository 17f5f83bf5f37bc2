import type { NextFunction, Request, Response } from 'express';
import { buildRequestLogContext, logger } from '../utils/logger.js';
import { readNormalizedError } from '../utils/response.js';

export function auditLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  res.on('finish', () => {
    const context = buildRequestLogContext(req);
    logger.info('request.completed', {
      ...context,
      status: res.statusCode,
      error_code: readNormalizedError(res)?.code ?? null,
      duration_ms: Date.now() - startedAt
    });
  });

  return next();
}
