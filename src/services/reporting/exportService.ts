import { CollaboratorUnavailableError } from '../../errors/AppError.js';
import { incrementCounter } from '../../observability/metrics.js';
import { renderCsv } from '../../utils/csv.js';
import { errorMessage, logger } from '../../utils/logger.js';
import { fromObservationRecord } from '../enrichment/observationRecord.js';
import type { EnrichedObservation } from '../enrichment/types.js';
import { buildReports, selectPolicy } from './aggregator.js';
import type { ArtifactName, ArtifactSink, ExportConfig, ExportResult, ObservationSource, ReportTable } from './types.js';

const CSV_CONTENT_TYPE = 'text/csv';

/** UTC minute stamp, e.g. `2024-08-07-14-05`. */
export function formatArtifactTimestamp(date: Date) {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)}-${iso.slice(11, 13)}-${iso.slice(14, 16)}`;
}

export function artifactKey(name: ArtifactName, date: Date) {
  return `exports/${name}/${name}-${formatArtifactTimestamp(date)}.csv`;
}

export interface ExportDependencies {
  sink: ArtifactSink;
  source: ObservationSource;
  clock?: () => Date;
}

export class ExportService {
  private readonly clock: () => Date;

  constructor(private readonly deps: ExportDependencies, private readonly config: ExportConfig) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async exportSince(now: Date = this.clock()): Promise<ExportResult> {
    const since = new Date(now.getTime() - this.config.lookbackHours * 3_600_000).toISOString();
    let rows: unknown[];
    try {
      rows = await this.deps.source.listSince(since);
    } catch (error) {
      throw new CollaboratorUnavailableError('observation-source', errorMessage(error), error);
    }

    const observations: EnrichedObservation[] = [];
    let malformed = 0;
    rows.forEach((row, index) => {
      try {
        observations.push(fromObservationRecord(row));
      } catch (error) {
        malformed += 1;
        logger.warn('exports.row.skipped', { index, error: errorMessage(error) });
      }
    });

    const result = await this.exportBatch(observations, now);
    return { ...result, skipped: result.skipped + malformed };
  }

  /** Writes the four reports for a closed batch. An empty batch writes nothing. */
  async exportBatch(batch: readonly EnrichedObservation[], now: Date = this.clock()): Promise<ExportResult> {
    const { selected: observations, skipped } = selectPolicy(batch, this.config.severityPolicy);
    if (skipped > 0) {
      logger.warn('exports.policy.mismatch', { skipped, policy: this.config.severityPolicy });
    }
    incrementCounter('export_rows_skipped', skipped);

    if (observations.length === 0) {
      logger.info('exports.batch.empty', { skipped });
      return { artifacts: [], observations: 0, skipped };
    }

    const reports = buildReports(observations);
    const planned: Array<[ArtifactName, ReportTable]> = [
      ['raw-data', reports.raw],
      ['city-summary', reports.citySummary],
      ['alerts', reports.alerts],
      ['trends', reports.trends]
    ];

    const artifacts: ExportResult['artifacts'] = [];
    const failed: string[] = [];

    for (const [name, table] of planned) {
      if (table.rows.length === 0) {
        logger.info('exports.artifact.empty', { artifact: name });
        continue;
      }

      const key = artifactKey(name, now);
      try {
        await this.deps.sink.writeArtifact(key, renderCsv(table), CSV_CONTENT_TYPE);
        artifacts.push({ name, key, rows: table.rows.length });
        incrementCounter('export_artifacts_written');
        logger.info('exports.artifact.written', { artifact: name, key, rows: table.rows.length });
      } catch (error) {
        failed.push(name);
        logger.error('exports.artifact.failed', { artifact: name, key, error: errorMessage(error) });
      }
    }

    if (failed.length > 0) {
      throw new CollaboratorUnavailableError('artifact-sink', `failed to write ${failed.join(', ')}`);
    }

    return { artifacts, observations: observations.length, skipped };
  }
}
