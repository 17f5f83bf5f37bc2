import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { nowMs, recordDependencyMetric } from './metrics.js';

/** External systems the pipeline reads from or writes to. */
export type Collaborator = 'history-store' | 'observation-store' | 'observation-source' | 'alert-topic' | 'artifact-sink';

export type PipelineSpan = {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  /** `http.request`, `job.<name>` or `<collaborator>.<operation>`. */
  name: string;
};

const TRACEPARENT = /^00-([0-9a-f]{32})-([0-9a-f]{16})-[0-9a-f]{2}$/;

const spans = new AsyncLocalStorage<PipelineSpan>();

function newTraceId() {
  return crypto.randomBytes(16).toString('hex');
}

function newSpanId() {
  return crypto.randomBytes(8).toString('hex');
}

export function currentSpan() {
  return spans.getStore();
}

export function formatTraceparent(span: Pick<PipelineSpan, 'traceId' | 'spanId'>) {
  return `00-${span.traceId}-${span.spanId}-01`;
}

/**
 * Opens the `http.request` span. A well-formed W3C `traceparent` header joins
 * the caller's trace; anything else starts a new one.
 */
export function createRequestSpanMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = TRACEPARENT.exec(req.header('traceparent') ?? '');
    const span: PipelineSpan = {
      traceId: incoming?.[1] ?? newTraceId(),
      spanId: newSpanId(),
      parentSpanId: incoming?.[2],
      name: 'http.request'
    };
    res.setHeader('traceparent', formatTraceparent(span));
    spans.run(span, next);
  };
}

/** Queue jobs and scheduled exports run under their own root span. */
export function traceJob<T>(jobName: string, fn: () => Promise<T>): Promise<T> {
  return spans.run({ traceId: newTraceId(), spanId: newSpanId(), name: `job.${jobName}` }, fn);
}

/**
 * Runs one call to a collaborator in a child span and records its latency and
 * outcome under the collaborator's dependency window.
 */
export async function traceCollaborator<T>(collaborator: Collaborator, operation: string, fn: () => Promise<T>): Promise<T> {
  const parent = spans.getStore();
  const span: PipelineSpan = {
    traceId: parent?.traceId ?? newTraceId(),
    spanId: newSpanId(),
    parentSpanId: parent?.spanId,
    name: `${collaborator}.${operation}`
  };
  const start = nowMs();

  return spans.run(span, async () => {
    try {
      const output = await fn();
      recordDependencyMetric(collaborator, operation, nowMs() - start, false);
      return output;
    } catch (error) {
      recordDependencyMetric(collaborator, operation, nowMs() - start, true);
      throw error;
    }
  });
}
