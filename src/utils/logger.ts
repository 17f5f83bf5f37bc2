import winston from 'winston';
import type { Request } from 'express';
import { currentSpan } from '../observability/tracing.js';

const traceCorrelationFormat = winston.format((info) => {
  const span = currentSpan();
  if (span) {
    info.trace_id = span.traceId;
    info.span_id = span.spanId;
    info.span = span.name;
    if (span.parentSpanId) {
      info.parent_span_id = span.parentSpanId;
    }
  }
  return info;
});

interface StructuredErrorLog {
  trace_id: string | null;
  endpoint: string;
  status: number;
  error: string;
  [key: string]: unknown;
}

const isTest = process.env.NODE_ENV === 'test';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: isTest,
  format: winston.format.combine(
    traceCorrelationFormat(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: isTest
    ? [new winston.transports.Console()]
    : [
      new winston.transports.File({ filename: 'error.log', level: 'error' }),
      new winston.transports.File({ filename: 'combined.log' })
    ]
});

if (process.env.NODE_ENV !== 'production' && !isTest) {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), winston.format.simple())
  }));
}

export function buildRequestLogContext(req: Request) {
  return {
    trace_id: req.traceId ?? null,
    request_id: req.requestId ?? null,
    endpoint: req.originalUrl,
    method: req.method
  };
}

export function logStructuredError(payload: StructuredErrorLog) {
  logger.error('request.error', payload);
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : 'unknown';
}
