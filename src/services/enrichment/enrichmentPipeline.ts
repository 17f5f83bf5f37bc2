import { AppError } from '../../errors/AppError.js';
import { incrementCounter } from '../../observability/metrics.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { AlertComposer, type DispatchOutcome } from './alertComposer.js';
import { AnomalyDetector, type AnomalyAssessment } from './anomalyDetector.js';
import { deriveMetrics } from './metricDeriver.js';
import { parseObservation } from './observationSchema.js';
import { categorizeRisk } from './riskClassifier.js';
import { scoreSeverity } from './severityScorer.js';
import type {
  AlertDispatcher,
  BatchResult,
  BatchSummary,
  EnrichedObservation,
  HistoryStore,
  Observation,
  ObservationStore,
  PipelineConfig,
  RecordFailure
} from './types.js';

export interface PipelineDependencies {
  historyStore: HistoryStore;
  observationStore: ObservationStore;
  dispatcher: AlertDispatcher;
  clock?: () => Date;
}

type RecordOutcome =
  | { ok: true; enriched: EnrichedObservation; stored: boolean; dispatch: DispatchOutcome; historyUnavailable: boolean }
  | { ok: false; failure: RecordFailure };

export function assertCompatiblePolicies(config: Pick<PipelineConfig, 'severityPolicy' | 'riskPolicy'>) {
  if (config.severityPolicy === 'bounded100' && config.riskPolicy === 'bounded10') {
    throw new AppError('The bounded10 risk table cannot classify bounded100 severity scores', 500, {
      code: 'INCOMPATIBLE_SCORING_POLICY',
      details: config
    });
  }
}

export function buildEnrichedObservation(
  observation: Observation,
  assessment: Pick<AnomalyAssessment, 'anomalyDetected' | 'anomalyScore' | 'alertCategory'>,
  config: Pick<PipelineConfig, 'severityPolicy' | 'riskPolicy'>,
  processedAt: Date
): EnrichedObservation {
  const metrics = deriveMetrics(observation);
  const severity = scoreSeverity(observation, config.severityPolicy);
  const riskInput = config.riskPolicy === 'zscore' ? assessment.anomalyScore : severity.score;

  return Object.freeze({
    ...observation,
    ...metrics,
    severity: Object.freeze(severity),
    riskCategory: categorizeRisk(riskInput, config.riskPolicy),
    anomalyDetected: assessment.anomalyDetected,
    anomalyScore: Number(assessment.anomalyScore.toFixed(4)),
    alertCategory: assessment.alertCategory,
    processedAt: processedAt.toISOString()
  });
}

export class EnrichmentPipeline {
  private readonly detector: AnomalyDetector;

  private readonly composer: AlertComposer;

  private readonly clock: () => Date;

  constructor(private readonly deps: PipelineDependencies, private readonly config: PipelineConfig) {
    assertCompatiblePolicies(config);
    this.detector = new AnomalyDetector(deps.historyStore, config.anomaly);
    this.composer = new AlertComposer(deps.dispatcher, { target: config.alertTopic, minRisk: config.alertMinRisk });
    this.clock = deps.clock ?? (() => new Date());
  }

  async enrich(observation: Observation): Promise<{ enriched: EnrichedObservation; assessment: AnomalyAssessment }> {
    const now = this.clock();
    const assessment = await this.detector.detect(observation, now);
    return { enriched: buildEnrichedObservation(observation, assessment, this.config, now), assessment };
  }

  async processBatch(records: readonly unknown[]): Promise<BatchResult> {
    const outcomes = await Promise.all(records.map((record, index) => this.processRecord(record, index)));

    const summary: BatchSummary = {
      received: records.length,
      processed: 0,
      failed: 0,
      stored: 0,
      storeFailures: 0,
      alertsPublished: 0,
      dispatchFailures: 0,
      anomaliesDetected: 0,
      historyFailures: 0
    };
    const enriched: EnrichedObservation[] = [];
    const failures: RecordFailure[] = [];

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        summary.failed += 1;
        failures.push(outcome.failure);
        continue;
      }

      summary.processed += 1;
      enriched.push(outcome.enriched);
      if (outcome.stored) summary.stored += 1;
      else summary.storeFailures += 1;
      if (outcome.dispatch === 'published') summary.alertsPublished += 1;
      if (outcome.dispatch === 'failed') summary.dispatchFailures += 1;
      if (outcome.enriched.anomalyDetected) summary.anomaliesDetected += 1;
      if (outcome.historyUnavailable) summary.historyFailures += 1;
    }

    incrementCounter('observations_processed', summary.processed);
    incrementCounter('observations_failed', summary.failed);
    incrementCounter('anomalies_detected', summary.anomaliesDetected);
    incrementCounter('alerts_published', summary.alertsPublished);
    incrementCounter('dispatch_failures', summary.dispatchFailures);
    incrementCounter('store_failures', summary.storeFailures);

    logger.info('pipeline.batch.completed', { ...summary });
    return { summary, enriched, failures };
  }

  private async processRecord(record: unknown, index: number): Promise<RecordOutcome> {
    let observation: Observation;
    try {
      observation = parseObservation(record);
    } catch (error) {
      logger.warn('pipeline.record.rejected', { index, error: errorMessage(error) });
      return { ok: false, failure: toFailure(index, error) };
    }

    try {
      const { enriched, assessment } = await this.enrich(observation);
      const stored = await this.store(enriched);
      const dispatch = await this.composer.dispatch(enriched);
      return { ok: true, enriched, stored, dispatch, historyUnavailable: assessment.historyUnavailable };
    } catch (error) {
      logger.error('pipeline.record.failed', { index, city: observation.city, error: errorMessage(error) });
      return { ok: false, failure: toFailure(index, error) };
    }
  }

  private async store(observation: EnrichedObservation) {
    try {
      const stored = await this.deps.observationStore.store(observation);
      if (!stored) {
        logger.warn('pipeline.store.rejected', { city: observation.city, timestamp: observation.timestamp });
      }
      return stored;
    } catch (error) {
      logger.error('pipeline.store.failed', { city: observation.city, error: errorMessage(error) });
      return false;
    }
  }
}

function toFailure(index: number, error: unknown): RecordFailure {
  if (error instanceof AppError) {
    const field = error.details && typeof error.details === 'object' && 'field' in error.details
      ? String(error.details.field)
      : undefined;
    return {
      index,
      code: error.code ?? 'APP_ERROR',
      message: error.message,
      ...(field ? { field } : {})
    };
  }
  return { index, code: 'PROCESSING_FAILED', message: errorMessage(error) };
}
