import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ZodError } from 'zod';
import { buildExportConfig, buildPipelineConfig, loadEnv } from '../src/config/env.js';

const baseEnv = {
  NODE_ENV: 'test',
  SUPABASE_URL: 'https://example.supabase.co',
  SUPABASE_SERVICE_ROLE_KEY: 'service_role_key_minimum_length',
  FIREBASE_PROJECT_ID: 'test-project',
  INGEST_API_KEY: 'test-secret'
};

test('Environment loading', async (t) => {
  await t.test('applies defaults', () => {
    const env = loadEnv(baseEnv);

    assert.equal(env.PORT, '3000');
    assert.equal(env.SEVERITY_POLICY, 'bounded10');
    assert.equal(env.RISK_POLICY, 'bounded10');
    assert.equal(env.ANOMALY_Z_THRESHOLD, 2);
    assert.equal(env.ALERT_MIN_RISK, 'HIGH');
    assert.equal(env.OBSERVATIONS_TABLE, 'weather_observations');
  });

  await t.test('coerces numeric settings', () => {
    const env = loadEnv({ ...baseEnv, ANOMALY_Z_THRESHOLD: '2.5', HISTORY_MAX_SAMPLES: '20', EXPORT_LOOKBACK_HOURS: '6' });

    assert.deepEqual(buildPipelineConfig(env).anomaly, {
      zThreshold: 2.5,
      minHistorySamples: 3,
      preferredHistorySamples: 10,
      historyLookbackDays: 7,
      historyMaxSamples: 20
    });
    assert.deepEqual(buildExportConfig(env), { severityPolicy: 'bounded10', lookbackHours: 6 });
  });

  await t.test('rejects bounded100 severity with the bounded10 risk table', () => {
    assert.throws(() => loadEnv({ ...baseEnv, SEVERITY_POLICY: 'bounded100' }), ZodError);
    assert.equal(loadEnv({ ...baseEnv, SEVERITY_POLICY: 'bounded100', RISK_POLICY: 'zscore' }).RISK_POLICY, 'zscore');
  });

  await t.test('rejects placeholder secrets', () => {
    assert.throws(() => loadEnv({ ...baseEnv, INGEST_API_KEY: 'placeholder' }), ZodError);
  });

  await t.test('production requires a Firebase service account', () => {
    assert.throws(() => loadEnv({ ...baseEnv, NODE_ENV: 'production' }), ZodError);
  });

  await t.test('preferred history cannot be below the minimum', () => {
    assert.throws(() => loadEnv({ ...baseEnv, HISTORY_MIN_SAMPLES: '5', HISTORY_PREFERRED_SAMPLES: '4' }), ZodError);
  });

  await t.test('requires the Supabase connection', () => {
    const { SUPABASE_URL: _omitted, ...rest } = baseEnv;
    assert.throws(() => loadEnv(rest), ZodError);
  });
});
