import { z } from 'zod';
import { InvalidObservationError } from '../../errors/AppError.js';
import { parseObservation } from './observationSchema.js';
import type { EnrichedObservation } from './types.js';

/** Row shape of the `weather_observations` table. */
export type ObservationRecord = {
  city: string;
  province: string;
  region?: string;
  timestamp: string;
  temperature_celsius: number;
  humidity_percent: number;
  wind_speed_kmh: number;
  pressure_hpa?: number;
  visibility_km?: number;
  weather_condition?: string;
  alert_flags: string[];
  feels_like: number;
  wind_chill: number;
  heat_index: number;
  comfort_index: number;
  severity_score: number;
  severity_policy: EnrichedObservation['severity']['policy'];
  risk_category: EnrichedObservation['riskCategory'];
  anomaly_detected: boolean;
  anomaly_score: number;
  alert_category: EnrichedObservation['alertCategory'];
  processed_at: string;
};

const derivedSchema = z.object({
  feels_like: z.number().finite(),
  wind_chill: z.number().finite(),
  heat_index: z.number().finite(),
  comfort_index: z.number().finite(),
  severity_score: z.number().finite(),
  severity_policy: z.enum(['bounded10', 'bounded100']),
  risk_category: z.enum(['MINIMAL', 'LOW', 'MODERATE', 'HIGH', 'EXTREME']),
  anomaly_detected: z.boolean(),
  anomaly_score: z.number().finite(),
  alert_category: z.enum(['cold_extreme', 'heat_extreme', 'wind_extreme', 'humidity_extreme', 'severe_weather', 'moderate_alert']),
  processed_at: z.string()
});

export function toObservationRecord(observation: EnrichedObservation): ObservationRecord {
  return {
    city: observation.city,
    province: observation.province,
    ...(observation.region !== undefined ? { region: observation.region } : {}),
    timestamp: observation.timestamp,
    temperature_celsius: observation.temperatureCelsius,
    humidity_percent: observation.humidityPercent,
    wind_speed_kmh: observation.windSpeedKmh,
    ...(observation.pressureHpa !== undefined ? { pressure_hpa: observation.pressureHpa } : {}),
    ...(observation.visibilityKm !== undefined ? { visibility_km: observation.visibilityKm } : {}),
    ...(observation.weatherCondition !== undefined ? { weather_condition: observation.weatherCondition } : {}),
    alert_flags: [...observation.alertFlags],
    feels_like: observation.feelsLike,
    wind_chill: observation.windChill,
    heat_index: observation.heatIndex,
    comfort_index: observation.comfortIndex,
    severity_score: observation.severity.score,
    severity_policy: observation.severity.policy,
    risk_category: observation.riskCategory,
    anomaly_detected: observation.anomalyDetected,
    anomaly_score: observation.anomalyScore,
    alert_category: observation.alertCategory,
    processed_at: observation.processedAt
  };
}

/** Rebuilds an enriched observation from a stored row; throws on malformed rows. */
export function fromObservationRecord(raw: unknown): EnrichedObservation {
  const observation = parseObservation(raw);
  const derived = derivedSchema.safeParse(raw);
  if (!derived.success) {
    throw new InvalidObservationError('Stored observation is missing derived fields', derived.error.flatten().fieldErrors);
  }

  const data = derived.data;
  return Object.freeze({
    ...observation,
    feelsLike: data.feels_like,
    windChill: data.wind_chill,
    heatIndex: data.heat_index,
    comfortIndex: data.comfort_index,
    severity: Object.freeze({ policy: data.severity_policy, score: data.severity_score }),
    riskCategory: data.risk_category,
    anomalyDetected: data.anomaly_detected,
    anomalyScore: data.anomaly_score,
    alertCategory: data.alert_category,
    processedAt: data.processed_at
  });
}
