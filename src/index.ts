import type { Queue, Worker } from 'bullmq';
import type { Redis } from 'ioredis';
import { createApp } from './app.js';
import { buildExportConfig, buildPipelineConfig, loadEnv } from './config/env.js';
import { createFirebaseMessaging } from './config/firebase.js';
import { createRedisConnection } from './config/redis.js';
import { createSupabaseAdmin } from './config/supabase.js';
import { SupabaseArtifactStorage } from './repositories/artifactStorage.js';
import { SupabaseObservationRepository } from './repositories/observationRepository.js';
import { FirebaseAlertDispatcher } from './services/alertDispatcher.js';
import { EnrichmentPipeline } from './services/enrichment/enrichmentPipeline.js';
import { ExportService } from './services/reporting/exportService.js';
import { errorMessage, logger } from './utils/logger.js';
import { createObservationQueue, createPipelineWorker, enqueueObservations, ensureExportSchedule } from './utils/queue.js';

const env = loadEnv();
const pipelineConfig = buildPipelineConfig(env);

const supabase = createSupabaseAdmin(env);
const repository = new SupabaseObservationRepository(supabase, env.OBSERVATIONS_TABLE);
const storage = new SupabaseArtifactStorage(supabase, env.EXPORT_BUCKET);
const dispatcher = new FirebaseAlertDispatcher(createFirebaseMessaging(env));

const pipeline = new EnrichmentPipeline(
  { historyStore: repository, observationStore: repository, dispatcher },
  pipelineConfig
);
const exporter = new ExportService({ sink: storage, source: repository }, buildExportConfig(env));

let redis: Redis | undefined;
let queue: Queue | undefined;
let worker: Worker | undefined;

if (env.REDIS_URL) {
  redis = createRedisConnection(env);
  queue = createObservationQueue(redis);
  worker = createPipelineWorker(redis, { pipeline, exporter }, env.QUEUE_CONCURRENCY);
  await ensureExportSchedule(queue, env.EXPORT_INTERVAL_MINUTES);
} else {
  logger.warn('queue.disabled', { reason: 'REDIS_URL not set' });
}

const activeQueue = queue;
const app = createApp({
  pipeline,
  pipelineConfig,
  exporter,
  ingestApiKey: env.INGEST_API_KEY,
  corsOrigin: env.FRONTEND_URL,
  enqueue: activeQueue ? (observations) => enqueueObservations(activeQueue, observations) : undefined
});

const server = app.listen(Number(env.PORT), () => {
  logger.info('Server started', {
    port: env.PORT,
    severity_policy: pipelineConfig.severityPolicy,
    risk_policy: pipelineConfig.riskPolicy
  });
});

async function shutdown(signal: string) {
  logger.info('Shutting down', { signal });
  server.close();
  try {
    await worker?.close();
    await queue?.close();
    await redis?.quit();
  } catch (error) {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  }
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM']) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}
