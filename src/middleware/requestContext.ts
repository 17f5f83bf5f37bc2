import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { wrapJsonResponse } from '../utils/response.js';

function headerValue(req: Request, name: string) {
  const value = req.header(name)?.trim();
  return value ? value : undefined;
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const traceHeader = headerValue(req, 'x-trace-id');
  const requestId = headerValue(req, 'x-request-id') ?? traceHeader ?? crypto.randomUUID();
  const traceId = traceHeader ?? requestId;

  req.requestId = requestId;
  req.traceId = traceId;
  res.setHeader('x-trace-id', traceId);
  res.setHeader('x-request-id', requestId);
  return next();
}

/** Wraps every JSON body as `{ request_id, data }` or `{ request_id, error }`. */
export function responseWrapper(req: Request, res: Response, next: NextFunction) {
  const originalJson = res.json.bind(res);
  res.json = (body: unknown) => originalJson(wrapJsonResponse(req, res, body));
  return next();
}
