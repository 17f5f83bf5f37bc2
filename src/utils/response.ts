import type { Request, Response } from 'express';

export type ErrorPayload = {
  code: string;
  message: string;
  details?: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function normalizeError(body: unknown): ErrorPayload {
  if (isRecord(body)) {
    const error = body.error;
    if (isRecord(error) && error.code) {
      return {
        code: String(error.code ?? 'ERROR'),
        message: String(error.message ?? 'Unexpected error'),
        details: error.details
      };
    }

    if (typeof body.code === 'string' && typeof error === 'string') {
      return {
        code: body.code,
        message: error,
        details: body.details
      };
    }

    if (typeof error === 'string') {
      return {
        code: String(body.code ?? 'ERROR'),
        message: error,
        details: body.details
      };
    }

    if (isRecord(error)) {
      return {
        code: 'VALIDATION_ERROR',
        message: 'Invalid payload',
        details: error
      };
    }
  }

  if (typeof body === 'string') {
    return { code: 'ERROR', message: body };
  }

  return { code: 'ERROR', message: 'Unexpected error' };
}

export function readNormalizedError(res: Response): ErrorPayload | undefined {
  const value: unknown = res.locals.normalizedError;
  if (isRecord(value) && typeof value.code === 'string' && typeof value.message === 'string') {
    return { code: value.code, message: value.message, details: value.details };
  }
  return undefined;
}

export function wrapJsonResponse(req: Request, res: Response, body: unknown) {
  const requestId = req.requestId ?? req.traceId ?? null;
  if (isRecord(body) && 'request_id' in body) {
    return body;
  }

  if (res.statusCode >= 400) {
    const error = normalizeError(body);
    res.locals.normalizedError = error;
    return { request_id: requestId, error };
  }

  return { request_id: requestId, data: body };
}
