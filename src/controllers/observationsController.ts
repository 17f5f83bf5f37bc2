import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { AnomalyDetector } from '../services/enrichment/anomalyDetector.js';
import { buildEnrichedObservation, type EnrichmentPipeline } from '../services/enrichment/enrichmentPipeline.js';
import { toObservationRecord } from '../services/enrichment/observationRecord.js';
import { parseObservation } from '../services/enrichment/observationSchema.js';
import type { HistorySample, PipelineConfig } from '../services/enrichment/types.js';

const MAX_BATCH_SIZE = 500;

const batchSchema = z.object({
  observations: z.array(z.unknown()).min(1).max(MAX_BATCH_SIZE)
});

const enrichSchema = z.object({
  observation: z.unknown(),
  history: z.array(z.object({
    timestamp: z.string().min(1),
    temperature_celsius: z.number().finite()
  })).max(500).default([])
});

export interface ObservationsControllerDeps {
  pipeline: Pick<EnrichmentPipeline, 'processBatch'>;
  pipelineConfig: PipelineConfig;
  enqueue?: (observations: unknown[]) => Promise<number>;
}

export function createObservationsController(deps: ObservationsControllerDeps) {
  async function processObservations(req: Request, res: Response, next: NextFunction) {
    const parsed = batchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    try {
      const result = await deps.pipeline.processBatch(parsed.data.observations);
      return res.json({
        summary: result.summary,
        failures: result.failures,
        observations: result.enriched.map(toObservationRecord)
      });
    } catch (error) {
      return next(error);
    }
  }

  async function enqueueObservations(req: Request, res: Response, next: NextFunction) {
    const parsed = batchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    if (!deps.enqueue) {
      return res.status(503).json({ error: { code: 'QUEUE_UNAVAILABLE', message: 'Observation queue is not configured' } });
    }

    try {
      const jobs = await deps.enqueue(parsed.data.observations);
      return res.status(202).json({ jobs, observations: parsed.data.observations.length });
    } catch (error) {
      return next(error);
    }
  }

  /** Enriches one observation against an inline history; nothing is stored or dispatched. */
  async function enrichObservation(req: Request, res: Response, next: NextFunction) {
    const parsed = enrichSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    try {
      const observation = parseObservation(parsed.data.observation);
      const history: HistorySample[] = parsed.data.history.map((sample) => ({
        timestamp: sample.timestamp,
        temperatureCelsius: sample.temperature_celsius
      }));
      const detector = new AnomalyDetector({ fetchHistory: async () => history }, deps.pipelineConfig.anomaly);
      const now = new Date();
      const assessment = await detector.detect(observation, now);
      const enriched = buildEnrichedObservation(observation, assessment, deps.pipelineConfig, now);

      return res.json({
        observation: toObservationRecord(enriched),
        anomaly: {
          bounds: assessment.bounds,
          deviation: assessment.deviation
        }
      });
    } catch (error) {
      return next(error);
    }
  }

  return { processObservations, enqueueObservations, enrichObservation };
}
