import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  buildAlertLog,
  buildCityRollups,
  buildCitySummary,
  buildRawExport,
  buildReports,
  buildTrendSeries,
  buildTrendTable,
  selectPolicy
} from '../src/services/reporting/aggregator.js';
import { enrichedObservation } from './helpers/fixtures.js';

const ottawaMorning = enrichedObservation({ temperature_celsius: 10, timestamp: '2024-08-07T10:00:00Z', alert_flags: ['fog'] });
const torontoMorning = enrichedObservation({ city: 'Toronto', region: 'GTA', temperature_celsius: 25, timestamp: '2024-08-07T10:30:00Z' });
const ottawaNoon = enrichedObservation({ temperature_celsius: 20, timestamp: '2024-08-07T11:00:00Z' });
const ottawaAfternoon = enrichedObservation({ temperature_celsius: 30, timestamp: '2024-08-07T12:00:00Z' });

const batch = [ottawaMorning, torontoMorning, ottawaNoon, ottawaAfternoon];

test('City rollups', async (t) => {
  await t.test('running mean matches the arithmetic mean', () => {
    const [ottawa] = buildCityRollups(batch);
    assert.ok(ottawa);
    assert.equal(ottawa.recordCount, 3);
    assert.equal(ottawa.meanTemperature, 20);
    assert.equal(ottawa.minTemperature, 10);
    assert.equal(ottawa.maxTemperature, 30);
  });

  await t.test('summary rows follow first appearance', () => {
    const summary = buildCitySummary(batch);

    assert.deepEqual(summary.rows.map((row) => row.city), ['Ottawa', 'Toronto']);
    assert.deepEqual(summary.rows[0], {
      city: 'Ottawa',
      province: 'ON',
      region: 'Eastern Ontario',
      record_count: 3,
      avg_temperature: 20,
      min_temperature: 10,
      max_temperature: 30,
      avg_severity: 0.8,
      max_severity: 2,
      alert_count: 1,
      latest_timestamp: '2024-08-07T12:00:00Z'
    });
    assert.equal(summary.rows[1]?.record_count, 1);
  });

  await t.test('no observations, no rows', () => {
    assert.deepEqual(buildCitySummary([]).rows, []);
  });
});

test('Alert log', async (t) => {
  await t.test('one row per active flag', () => {
    const log = buildAlertLog(batch);
    assert.equal(log.rows.length, 1);
    assert.deepEqual(log.rows[0], {
      timestamp: '2024-08-07T10:00:00Z',
      city: 'Ottawa',
      province: 'ON',
      alert_type: 'fog',
      temperature: 10,
      feels_like: ottawaMorning.feelsLike,
      humidity: 50,
      wind_speed: 10,
      severity_score: 0.5,
      weather_condition: ''
    });
  });
});

test('Trend series', async (t) => {
  await t.test('3-point moving average per city in timestamp order', () => {
    const readings = [
      enrichedObservation({ temperature_celsius: 16, timestamp: '2024-08-07T12:00:00Z' }),
      enrichedObservation({ temperature_celsius: 10, timestamp: '2024-08-07T10:00:00Z' }),
      enrichedObservation({ city: 'Toronto', temperature_celsius: 40, timestamp: '2024-08-07T10:30:00Z' }),
      enrichedObservation({ temperature_celsius: 20, timestamp: '2024-08-07T13:00:00Z' }),
      enrichedObservation({ temperature_celsius: 14, timestamp: '2024-08-07T11:00:00Z' })
    ];
    const series = buildTrendSeries(readings);
    const ottawa = series.filter((point) => point.city === 'Ottawa');

    assert.deepEqual(ottawa.map((point) => point.movingAverage), [10, 12, 13.3, 16.7]);
    assert.deepEqual(series.map((point) => point.city), ['Ottawa', 'Toronto', 'Ottawa', 'Ottawa', 'Ottawa']);
    assert.equal(series[1]?.movingAverage, 40);
  });

  await t.test('trend rows default missing pressure', () => {
    const table = buildTrendTable([ottawaMorning]);
    assert.equal(table.rows[0]?.pressure, 1013);
    assert.equal(table.rows[0]?.temp_trend_3pt, 10);
    assert.equal(table.rows[0]?.alert_count, 1);
  });
});

test('Raw export', async (t) => {
  await t.test('columns are the sorted union of record keys', () => {
    const raw = buildRawExport([ottawaMorning, enrichedObservation({ pressure_hpa: 1001 })]);

    assert.equal(raw.columns.includes('pressure_hpa'), true);
    assert.deepEqual(raw.columns, [...raw.columns].sort());
    assert.equal(raw.rows[0]?.alert_flags, 'fog');
    assert.equal(raw.rows[0]?.pressure_hpa, undefined);
  });

  await t.test('buildReports builds all four tables', () => {
    const reports = buildReports(batch);
    assert.equal(reports.raw.rows.length, 4);
    assert.equal(reports.citySummary.rows.length, 2);
    assert.equal(reports.alerts.rows.length, 1);
    assert.equal(reports.trends.rows.length, 4);
  });
});

test('Policy selection', async (t) => {
  await t.test('rows scored under another policy are counted, not kept', () => {
    const hundred = enrichedObservation({ city: 'Toronto' }, {}, { severityPolicy: 'bounded100', riskPolicy: 'zscore' });
    const { selected, skipped } = selectPolicy([ottawaMorning, hundred, torontoMorning], 'bounded10');
    assert.deepEqual(selected, [ottawaMorning, torontoMorning]);
    assert.equal(skipped, 1);
  });

  await t.test('a uniform batch is kept whole', () => {
    assert.equal(selectPolicy([ottawaMorning], 'bounded10').skipped, 0);
    assert.equal(selectPolicy([ottawaMorning], 'bounded100').selected.length, 0);
  });
});
