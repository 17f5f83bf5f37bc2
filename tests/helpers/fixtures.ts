import { buildEnrichedObservation } from '../../src/services/enrichment/enrichmentPipeline.js';
import { parseObservation } from '../../src/services/enrichment/observationSchema.js';
import type {
  AlertCategory,
  AlertDispatcher,
  EnrichedObservation,
  HistorySample,
  HistoryStore,
  ObservationStore,
  PipelineConfig
} from '../../src/services/enrichment/types.js';

export const FIXED_NOW = new Date('2024-08-07T12:00:00.000Z');

export const testPipelineConfig: PipelineConfig = {
  severityPolicy: 'bounded10',
  riskPolicy: 'bounded10',
  anomaly: {
    zThreshold: 2,
    minHistorySamples: 3,
    preferredHistorySamples: 10,
    historyLookbackDays: 7,
    historyMaxSamples: 50
  },
  alertTopic: 'weather-alerts',
  alertMinRisk: 'HIGH'
};

export function rawObservation(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    city: 'Ottawa',
    province: 'ON',
    region: 'Eastern Ontario',
    timestamp: '2024-08-07T10:00:00Z',
    temperature_celsius: 21,
    humidity_percent: 50,
    wind_speed_kmh: 10,
    alert_flags: [],
    ...overrides
  };
}

export function enrichedObservation(
  overrides: Record<string, unknown> = {},
  assessment: { anomalyDetected?: boolean; anomalyScore?: number; alertCategory?: AlertCategory } = {},
  config: Pick<PipelineConfig, 'severityPolicy' | 'riskPolicy'> = testPipelineConfig
): EnrichedObservation {
  return buildEnrichedObservation(
    parseObservation(rawObservation(overrides)),
    {
      anomalyDetected: assessment.anomalyDetected ?? false,
      anomalyScore: assessment.anomalyScore ?? 0,
      alertCategory: assessment.alertCategory ?? 'moderate_alert'
    },
    config,
    FIXED_NOW
  );
}

export class FakeHistoryStore implements HistoryStore {
  readonly calls: Array<{ city: string; since: string; maxSamples: number }> = [];

  constructor(private readonly byCity: Record<string, HistorySample[]> = {}, private readonly failure?: Error) {}

  async fetchHistory(city: string, since: string, maxSamples: number) {
    this.calls.push({ city, since, maxSamples });
    if (this.failure) {
      throw this.failure;
    }
    return this.byCity[city] ?? [];
  }
}

export class FakeObservationStore implements ObservationStore {
  readonly stored: EnrichedObservation[] = [];

  constructor(private readonly accept = true) {}

  async store(observation: EnrichedObservation) {
    if (this.accept) {
      this.stored.push(observation);
    }
    return this.accept;
  }
}

export class FakeDispatcher implements AlertDispatcher {
  readonly published: Array<{ message: string; subject: string; target: string }> = [];

  constructor(private readonly behaviour: 'accept' | 'reject' | 'throw' = 'accept') {}

  async publish(message: string, subject: string, target: string) {
    if (this.behaviour === 'throw') {
      throw new Error('dispatcher offline');
    }
    if (this.behaviour === 'reject') {
      return false;
    }
    this.published.push({ message, subject, target });
    return true;
  }
}

export function historyOf(temperatures: number[]): HistorySample[] {
  return temperatures.map((temperatureCelsius, index) => ({
    timestamp: `2024-07-${String(10 + index).padStart(2, '0')}T12:00:00Z`,
    temperatureCelsius
  }));
}
