import { incrementCounter } from '../../observability/metrics.js';
import { errorMessage, logger } from '../../utils/logger.js';
import type { AlertCategory, AnomalyConfig, HistorySample, HistoryStore, Observation } from './types.js';

export const TEMPERATURE_BOUNDS = { min: -50, max: 45 } as const;
export const HUMIDITY_BOUNDS = { min: 0, max: 100 } as const;
export const MAX_WIND_SPEED_KMH = 150;
export const STORM_PRESSURE_BOUNDS = { min: 980, max: 1040 } as const;
export const MIN_VISIBILITY_KM = 1;

export const DEFAULT_ANOMALY_CONFIG: AnomalyConfig = {
  zThreshold: 2.0,
  minHistorySamples: 3,
  preferredHistorySamples: 10,
  historyLookbackDays: 7,
  historyMaxSamples: 50
};

export interface BoundsCheck {
  temperatureLow: boolean;
  temperatureHigh: boolean;
  humidity: boolean;
  wind: boolean;
}

export interface DeviationResult {
  anomalyScore: number;
  anomalous: boolean;
  sampleCount: number;
  mean: number | null;
  stdDev: number | null;
  confidence: 'none' | 'low' | 'high';
}

export interface AnomalyAssessment {
  bounds: BoundsCheck;
  deviation: DeviationResult;
  anomalyDetected: boolean;
  anomalyScore: number;
  alertCategory: AlertCategory;
  historyUnavailable: boolean;
}

export function checkAbsoluteBounds(observation: Pick<Observation, 'temperatureCelsius' | 'humidityPercent' | 'windSpeedKmh'>): BoundsCheck {
  return {
    temperatureLow: observation.temperatureCelsius < TEMPERATURE_BOUNDS.min,
    temperatureHigh: observation.temperatureCelsius > TEMPERATURE_BOUNDS.max,
    humidity: observation.humidityPercent < HUMIDITY_BOUNDS.min || observation.humidityPercent > HUMIDITY_BOUNDS.max,
    wind: observation.windSpeedKmh > MAX_WIND_SPEED_KMH
  };
}

export function isAnomalous(observation: Pick<Observation, 'temperatureCelsius' | 'humidityPercent' | 'windSpeedKmh'>) {
  const bounds = checkAbsoluteBounds(observation);
  return bounds.temperatureLow || bounds.temperatureHigh || bounds.humidity || bounds.wind;
}

function mean(values: number[]) {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sampleStdDev(values: number[], avg: number) {
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * z-score of the current temperature against the trailing window. Too few
 * samples or a flat window yield a zero score.
 */
export function scoreDeviation(
  currentTemperature: number,
  samples: readonly HistorySample[],
  options: Pick<AnomalyConfig, 'zThreshold' | 'minHistorySamples' | 'preferredHistorySamples'> = DEFAULT_ANOMALY_CONFIG
): DeviationResult {
  const temperatures = samples
    .map((sample) => sample.temperatureCelsius)
    .filter((value) => Number.isFinite(value));
  const sampleCount = temperatures.length;

  if (sampleCount < Math.max(2, options.minHistorySamples)) {
    return { anomalyScore: 0, anomalous: false, sampleCount, mean: null, stdDev: null, confidence: 'none' };
  }

  const avg = mean(temperatures);
  const stdDev = sampleStdDev(temperatures, avg);
  const confidence = sampleCount >= options.preferredHistorySamples ? 'high' : 'low';

  if (stdDev === 0) {
    return { anomalyScore: 0, anomalous: false, sampleCount, mean: avg, stdDev, confidence };
  }

  const anomalyScore = Math.abs(currentTemperature - avg) / stdDev;
  return {
    anomalyScore,
    anomalous: anomalyScore > options.zThreshold,
    sampleCount,
    mean: avg,
    stdDev,
    confidence
  };
}

/**
 * Signals without a dedicated alert label. Two or more of them at once make
 * an observation `severe_weather`.
 */
export interface SecondarySignals {
  deviation: boolean;
  pressure: boolean;
  visibility: boolean;
}

export function secondarySignals(observation: Observation, deviation: Pick<DeviationResult, 'anomalous'>): SecondarySignals {
  const pressure = observation.pressureHpa;
  const visibility = observation.visibilityKm;
  return {
    deviation: deviation.anomalous,
    pressure: pressure !== undefined && (pressure < STORM_PRESSURE_BOUNDS.min || pressure > STORM_PRESSURE_BOUNDS.max),
    visibility: visibility !== undefined && visibility < MIN_VISIBILITY_KM
  };
}

export function classifyAlertCategory(
  bounds: BoundsCheck,
  secondary: SecondarySignals = { deviation: false, pressure: false, visibility: false }
): AlertCategory {
  if (bounds.temperatureLow) return 'cold_extreme';
  if (bounds.temperatureHigh) return 'heat_extreme';
  if (bounds.wind) return 'wind_extreme';
  if (bounds.humidity) return 'humidity_extreme';

  const simultaneous = [secondary.deviation, secondary.pressure, secondary.visibility].filter(Boolean).length;
  if (simultaneous >= 2) return 'severe_weather';

  return 'moderate_alert';
}

export class AnomalyDetector {
  constructor(
    private readonly historyStore: HistoryStore,
    private readonly config: AnomalyConfig = DEFAULT_ANOMALY_CONFIG
  ) {}

  async detect(observation: Observation, now: Date = new Date()): Promise<AnomalyAssessment> {
    const bounds = checkAbsoluteBounds(observation);
    const { samples, unavailable } = await this.loadHistory(observation.city, now);
    const deviation = scoreDeviation(observation.temperatureCelsius, samples, this.config);
    const anyBound = bounds.temperatureLow || bounds.temperatureHigh || bounds.humidity || bounds.wind;

    return {
      bounds,
      deviation,
      anomalyDetected: anyBound || deviation.anomalous,
      anomalyScore: deviation.anomalyScore,
      alertCategory: classifyAlertCategory(bounds, secondarySignals(observation, deviation)),
      historyUnavailable: unavailable
    };
  }

  private async loadHistory(city: string, now: Date) {
    const since = new Date(now.getTime() - this.config.historyLookbackDays * 86_400_000).toISOString();
    try {
      const samples = await this.historyStore.fetchHistory(city, since, this.config.historyMaxSamples);
      return { samples: samples.slice(-this.config.historyMaxSamples), unavailable: false };
    } catch (error) {
      incrementCounter('history_failures');
      logger.warn('anomaly.history.unavailable', { city, error: errorMessage(error) });
      return { samples: [], unavailable: true };
    }
  }
}
