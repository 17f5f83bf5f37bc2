import { Queue, Worker, type Job, type JobsOptions } from 'bullmq';
import type { Redis } from 'ioredis';
import { traceJob } from '../observability/tracing.js';
import type { EnrichmentPipeline } from '../services/enrichment/enrichmentPipeline.js';
import type { ExportService } from '../services/reporting/exportService.js';
import { logger } from './logger.js';

export const OBSERVATION_QUEUE = 'weather-observations';
export const PROCESS_BATCH_JOB = 'process-batch';
export const EXPORT_REPORTS_JOB = 'export-reports';

const ENQUEUE_CHUNK_SIZE = 100;

export type ProcessBatchPayload = { observations: unknown[] };

type BulkJob = { name: string; data: ProcessBatchPayload };

/** The parts of a BullMQ queue the producers use. */
export interface ObservationQueue {
  addBulk(jobs: BulkJob[]): Promise<unknown>;
  add(name: string, data: object, opts?: JobsOptions): Promise<unknown>;
}

export interface JobHandlers {
  pipeline: Pick<EnrichmentPipeline, 'processBatch'>;
  exporter: Pick<ExportService, 'exportSince'>;
}

export function createObservationQueue(connection: Redis) {
  return new Queue(OBSERVATION_QUEUE, { connection });
}

export async function enqueueObservations(queue: Pick<ObservationQueue, 'addBulk'>, observations: readonly unknown[]) {
  const jobs: BulkJob[] = [];
  for (let i = 0; i < observations.length; i += ENQUEUE_CHUNK_SIZE) {
    jobs.push({ name: PROCESS_BATCH_JOB, data: { observations: observations.slice(i, i + ENQUEUE_CHUNK_SIZE) } });
  }
  if (jobs.length === 0) {
    return 0;
  }
  await queue.addBulk(jobs);
  return jobs.length;
}

export async function ensureExportSchedule(queue: Pick<ObservationQueue, 'add'>, intervalMinutes: number) {
  if (intervalMinutes <= 0) {
    logger.warn('exports.scheduler.disabled', { intervalMinutes });
    return;
  }

  await queue.add(EXPORT_REPORTS_JOB, {}, {
    repeat: { every: intervalMinutes * 60_000 },
    jobId: 'cron-export-reports'
  });
  logger.info('exports.scheduler.started', { intervalMinutes });
}

function readObservations(data: unknown): unknown[] {
  if (data && typeof data === 'object' && 'observations' in data && Array.isArray(data.observations)) {
    return data.observations;
  }
  return [];
}

export async function routeJob(job: Pick<Job, 'name' | 'data' | 'id'>, handlers: JobHandlers) {
  if (job.name === PROCESS_BATCH_JOB) {
    const { summary } = await handlers.pipeline.processBatch(readObservations(job.data));
    return summary;
  }

  if (job.name === EXPORT_REPORTS_JOB) {
    return handlers.exporter.exportSince();
  }

  logger.warn('Unhandled job name', { jobName: job.name, jobId: job.id });
  return null;
}

export function createPipelineWorker(connection: Redis, handlers: JobHandlers, concurrency: number) {
  const worker = new Worker(
    OBSERVATION_QUEUE,
    async (job) => traceJob(job.name, () => routeJob(job, handlers)),
    { connection, concurrency }
  );

  worker.on('failed', (job, err) => {
    logger.error('Pipeline job failed', { jobId: job?.id, jobName: job?.name, error: err.message });
  });

  return worker;
}
