import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { fromObservationRecord } from '../services/enrichment/observationRecord.js';
import type { EnrichedObservation, PipelineConfig } from '../services/enrichment/types.js';
import { buildReports, selectPolicy } from '../services/reporting/aggregator.js';
import type { ExportService } from '../services/reporting/exportService.js';
import { errorMessage } from '../utils/logger.js';

const previewSchema = z.object({
  observations: z.array(z.unknown()).max(5000)
});

export interface ExportsControllerDeps {
  exporter: Pick<ExportService, 'exportSince'>;
  pipelineConfig: Pick<PipelineConfig, 'severityPolicy'>;
}

export function createExportsController(deps: ExportsControllerDeps) {
  async function runExport(_req: Request, res: Response, next: NextFunction) {
    try {
      const result = await deps.exporter.exportSince();
      return res.json(result);
    } catch (error) {
      return next(error);
    }
  }

  function previewReports(req: Request, res: Response) {
    const parsed = previewSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    const observations: EnrichedObservation[] = [];
    const rejected: Array<{ index: number; message: string }> = [];
    parsed.data.observations.forEach((row, index) => {
      try {
        observations.push(fromObservationRecord(row));
      } catch (error) {
        rejected.push({ index, message: errorMessage(error) });
      }
    });

    const { selected, skipped } = selectPolicy(observations, deps.pipelineConfig.severityPolicy);
    return res.json({ reports: buildReports(selected), rejected, skipped });
  }

  return { runExport, previewReports };
}
