import dotenv from 'dotenv';
import { z } from 'zod';
import type { PipelineConfig } from '../services/enrichment/types.js';
import type { ExportConfig } from '../services/reporting/types.js';

dotenv.config();

const riskCategory = z.enum(['MINIMAL', 'LOW', 'MODERATE', 'HIGH', 'EXTREME']);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.string().default('3000'),
  FRONTEND_URL: z.string().url().optional(),
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(10),
  OBSERVATIONS_TABLE: z.string().min(1).default('weather_observations'),
  EXPORT_BUCKET: z.string().min(1).default('weather-exports'),
  FIREBASE_PROJECT_ID: z.string().min(1),
  FCM_SERVICE_ACCOUNT_JSON: z.string().min(10).optional(),
  REDIS_URL: z.string().min(10).optional(),
  INGEST_API_KEY: z.string().min(8),
  SEVERITY_POLICY: z.enum(['bounded10', 'bounded100']).default('bounded10'),
  RISK_POLICY: z.enum(['bounded10', 'zscore']).default('bounded10'),
  ANOMALY_Z_THRESHOLD: z.coerce.number().positive().default(2),
  HISTORY_MIN_SAMPLES: z.coerce.number().int().min(2).default(3),
  HISTORY_PREFERRED_SAMPLES: z.coerce.number().int().min(2).default(10),
  HISTORY_LOOKBACK_DAYS: z.coerce.number().positive().default(7),
  HISTORY_MAX_SAMPLES: z.coerce.number().int().positive().default(50),
  ALERT_TOPIC: z.string().min(1).default('weather-alerts'),
  ALERT_MIN_RISK: riskCategory.default('HIGH'),
  EXPORT_LOOKBACK_HOURS: z.coerce.number().positive().default(24),
  EXPORT_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(24 * 60),
  QUEUE_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4)
}).refine((data) => !(data.SEVERITY_POLICY === 'bounded100' && data.RISK_POLICY === 'bounded10'), {
  message: 'RISK_POLICY=bounded10 cannot classify bounded100 severity scores; use zscore',
  path: ['RISK_POLICY']
}).refine((data) => data.NODE_ENV !== 'production' || Boolean(data.FCM_SERVICE_ACCOUNT_JSON), {
  message: 'Missing Firebase service account JSON',
  path: ['FCM_SERVICE_ACCOUNT_JSON']
}).refine((data) => data.HISTORY_PREFERRED_SAMPLES >= data.HISTORY_MIN_SAMPLES, {
  message: 'HISTORY_PREFERRED_SAMPLES must be at least HISTORY_MIN_SAMPLES',
  path: ['HISTORY_PREFERRED_SAMPLES']
}).refine((data) => {
  const blockedValues = new Set(['changeme', 'replace-me', 'dummy', 'placeholder']);
  return [data.SUPABASE_SERVICE_ROLE_KEY, data.INGEST_API_KEY]
    .every((value) => !blockedValues.has(value.trim().toLowerCase()));
}, {
  message: 'One or more secrets are using placeholder values',
  path: ['INGEST_API_KEY']
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export function buildPipelineConfig(env: Env): PipelineConfig {
  return {
    severityPolicy: env.SEVERITY_POLICY,
    riskPolicy: env.RISK_POLICY,
    anomaly: {
      zThreshold: env.ANOMALY_Z_THRESHOLD,
      minHistorySamples: env.HISTORY_MIN_SAMPLES,
      preferredHistorySamples: env.HISTORY_PREFERRED_SAMPLES,
      historyLookbackDays: env.HISTORY_LOOKBACK_DAYS,
      historyMaxSamples: env.HISTORY_MAX_SAMPLES
    },
    alertTopic: env.ALERT_TOPIC,
    alertMinRisk: env.ALERT_MIN_RISK
  };
}

export function buildExportConfig(env: Env): ExportConfig {
  return {
    severityPolicy: env.SEVERITY_POLICY,
    lookbackHours: env.EXPORT_LOOKBACK_HOURS
  };
}
