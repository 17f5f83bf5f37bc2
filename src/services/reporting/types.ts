import type { SeverityPolicy } from '../enrichment/types.js';

export type CsvValue = string | number | boolean | null | undefined;

export type CsvRow = Record<string, CsvValue>;

export interface ReportTable {
  columns: string[];
  rows: CsvRow[];
}

export interface CityRollup {
  city: string;
  province: string;
  region: string;
  recordCount: number;
  meanTemperature: number;
  minTemperature: number;
  maxTemperature: number;
  meanSeverity: number;
  maxSeverity: number;
  alertCount: number;
  latestTimestamp: string;
}

export interface TrendPoint {
  timestamp: string;
  city: string;
  temperature: number;
  movingAverage: number;
}

export type ArtifactName = 'raw-data' | 'city-summary' | 'alerts' | 'trends';

export interface WeatherReports {
  raw: ReportTable;
  citySummary: ReportTable;
  alerts: ReportTable;
  trends: ReportTable;
}

export interface ArtifactSink {
  writeArtifact(key: string, content: string, contentType: string): Promise<void>;
}

export interface ObservationSource {
  /** Stored rows with `timestamp > since`, unvalidated. */
  listSince(since: string): Promise<unknown[]>;
}

export interface ExportConfig {
  severityPolicy: SeverityPolicy;
  lookbackHours: number;
}

export interface ExportResult {
  artifacts: Array<{ name: ArtifactName; key: string; rows: number }>;
  observations: number;
  skipped: number;
}
