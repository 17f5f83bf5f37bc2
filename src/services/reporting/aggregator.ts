import { round } from '../enrichment/metricDeriver.js';
import { toObservationRecord } from '../enrichment/observationRecord.js';
import { DEFAULT_PRESSURE_HPA } from '../enrichment/severityScorer.js';
import type { EnrichedObservation, SeverityPolicy } from '../enrichment/types.js';
import type { CityRollup, CsvRow, ReportTable, TrendPoint, WeatherReports } from './types.js';

const TREND_WINDOW = 3;

export const CITY_SUMMARY_COLUMNS = [
  'city',
  'province',
  'region',
  'record_count',
  'avg_temperature',
  'min_temperature',
  'max_temperature',
  'avg_severity',
  'max_severity',
  'alert_count',
  'latest_timestamp'
];

export const ALERT_LOG_COLUMNS = [
  'timestamp',
  'city',
  'province',
  'alert_type',
  'temperature',
  'feels_like',
  'humidity',
  'wind_speed',
  'severity_score',
  'weather_condition'
];

export const TREND_COLUMNS = [
  'timestamp',
  'city',
  'province',
  'region',
  'temperature',
  'temp_trend_3pt',
  'feels_like',
  'humidity',
  'pressure',
  'wind_speed',
  'severity_score',
  'weather_condition',
  'alert_count'
];

/** Splits a batch into rows scored under `policy` and the count of the rest. */
export function selectPolicy(observations: readonly EnrichedObservation[], policy: SeverityPolicy) {
  const selected = observations.filter((observation) => observation.severity.policy === policy);
  return { selected, skipped: observations.length - selected.length };
}

export function buildRawExport(observations: readonly EnrichedObservation[]): ReportTable {
  const rows: CsvRow[] = observations.map((observation) => {
    const record = toObservationRecord(observation);
    return { ...record, alert_flags: record.alert_flags.join(', ') };
  });
  const columns = [...new Set(rows.flatMap((row) => Object.keys(row)))].sort();
  return { columns, rows };
}

/** Folds one observation into a city's running aggregate. */
export function foldCityRollup(current: CityRollup | undefined, observation: EnrichedObservation): CityRollup {
  const temp = observation.temperatureCelsius;
  const severity = observation.severity.score;

  if (!current) {
    return {
      city: observation.city,
      province: observation.province,
      region: observation.region ?? '',
      recordCount: 1,
      meanTemperature: temp,
      minTemperature: temp,
      maxTemperature: temp,
      meanSeverity: severity,
      maxSeverity: severity,
      alertCount: observation.alertFlags.length,
      latestTimestamp: observation.timestamp
    };
  }

  const n = current.recordCount + 1;
  return {
    ...current,
    recordCount: n,
    meanTemperature: (current.meanTemperature * (n - 1) + temp) / n,
    minTemperature: Math.min(current.minTemperature, temp),
    maxTemperature: Math.max(current.maxTemperature, temp),
    meanSeverity: (current.meanSeverity * (n - 1) + severity) / n,
    maxSeverity: Math.max(current.maxSeverity, severity),
    alertCount: current.alertCount + observation.alertFlags.length,
    latestTimestamp: observation.timestamp > current.latestTimestamp ? observation.timestamp : current.latestTimestamp
  };
}

export function buildCityRollups(observations: readonly EnrichedObservation[]): CityRollup[] {
  const byCity = new Map<string, CityRollup>();
  for (const observation of observations) {
    byCity.set(observation.city, foldCityRollup(byCity.get(observation.city), observation));
  }
  return [...byCity.values()];
}

export function buildCitySummary(observations: readonly EnrichedObservation[]): ReportTable {
  const rows = buildCityRollups(observations).map((rollup) => ({
    city: rollup.city,
    province: rollup.province,
    region: rollup.region,
    record_count: rollup.recordCount,
    avg_temperature: round(rollup.meanTemperature),
    min_temperature: rollup.minTemperature,
    max_temperature: rollup.maxTemperature,
    avg_severity: round(rollup.meanSeverity),
    max_severity: rollup.maxSeverity,
    alert_count: rollup.alertCount,
    latest_timestamp: rollup.latestTimestamp
  }));
  return { columns: CITY_SUMMARY_COLUMNS, rows };
}

export function buildAlertLog(observations: readonly EnrichedObservation[]): ReportTable {
  const rows = observations.flatMap((observation) => observation.alertFlags.map((flag) => ({
    timestamp: observation.timestamp,
    city: observation.city,
    province: observation.province,
    alert_type: flag,
    temperature: observation.temperatureCelsius,
    feels_like: observation.feelsLike,
    humidity: observation.humidityPercent,
    wind_speed: observation.windSpeedKmh,
    severity_score: observation.severity.score,
    weather_condition: observation.weatherCondition ?? ''
  })));
  return { columns: ALERT_LOG_COLUMNS, rows };
}

function sortByTimestamp(observations: readonly EnrichedObservation[]) {
  return [...observations].sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    return 0;
  });
}

/** Pairs each observation, in timestamp order, with its city's trailing 3-point average. */
export function buildTrendPoints(observations: readonly EnrichedObservation[]) {
  const windows = new Map<string, number[]>();

  return sortByTimestamp(observations).map((observation) => {
    const window = windows.get(observation.city) ?? [];
    window.push(observation.temperatureCelsius);
    if (window.length > TREND_WINDOW) {
      window.shift();
    }
    windows.set(observation.city, window);

    const point: TrendPoint = {
      timestamp: observation.timestamp,
      city: observation.city,
      temperature: observation.temperatureCelsius,
      movingAverage: round(window.reduce((sum, value) => sum + value, 0) / window.length)
    };
    return { point, observation };
  });
}

export function buildTrendSeries(observations: readonly EnrichedObservation[]): TrendPoint[] {
  return buildTrendPoints(observations).map(({ point }) => point);
}

export function buildTrendTable(observations: readonly EnrichedObservation[]): ReportTable {
  const rows = buildTrendPoints(observations).map(({ point, observation }) => ({
    timestamp: point.timestamp,
    city: point.city,
    province: observation.province,
    region: observation.region ?? '',
    temperature: point.temperature,
    temp_trend_3pt: point.movingAverage,
    feels_like: observation.feelsLike,
    humidity: observation.humidityPercent,
    pressure: observation.pressureHpa ?? DEFAULT_PRESSURE_HPA,
    wind_speed: observation.windSpeedKmh,
    severity_score: observation.severity.score,
    weather_condition: observation.weatherCondition ?? '',
    alert_count: observation.alertFlags.length
  }));
  return { columns: TREND_COLUMNS, rows };
}

export function buildReports(observations: readonly EnrichedObservation[]): WeatherReports {
  return {
    raw: buildRawExport(observations),
    citySummary: buildCitySummary(observations),
    alerts: buildAlertLog(observations),
    trends: buildTrendTable(observations)
  };
}
