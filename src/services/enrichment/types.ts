export type SeverityPolicy = 'bounded10' | 'bounded100';

export type RiskPolicy = 'bounded10' | 'zscore';

export type RiskCategory = 'MINIMAL' | 'LOW' | 'MODERATE' | 'HIGH' | 'EXTREME';

export type AlertCategory =
  | 'cold_extreme'
  | 'heat_extreme'
  | 'wind_extreme'
  | 'humidity_extreme'
  | 'severe_weather'
  | 'moderate_alert';

export interface Observation {
  readonly city: string;
  readonly province: string;
  readonly region?: string;
  readonly timestamp: string;
  readonly temperatureCelsius: number;
  readonly humidityPercent: number;
  readonly windSpeedKmh: number;
  readonly pressureHpa?: number;
  readonly visibilityKm?: number;
  readonly weatherCondition?: string;
  readonly alertFlags: readonly string[];
}

export interface DerivedMetrics {
  feelsLike: number;
  windChill: number;
  heatIndex: number;
  comfortIndex: number;
}

export interface SeverityScore {
  policy: SeverityPolicy;
  score: number;
}

export interface EnrichedObservation extends Observation {
  readonly feelsLike: number;
  readonly windChill: number;
  readonly heatIndex: number;
  readonly comfortIndex: number;
  readonly severity: Readonly<SeverityScore>;
  readonly riskCategory: RiskCategory;
  readonly anomalyDetected: boolean;
  readonly anomalyScore: number;
  readonly alertCategory: AlertCategory;
  readonly processedAt: string;
}

export interface HistorySample {
  timestamp: string;
  temperatureCelsius: number;
}

export interface HistoryStore {
  /** Oldest first. Rejects when the store cannot be read. */
  fetchHistory(city: string, since: string, maxSamples: number): Promise<HistorySample[]>;
}

export interface ObservationStore {
  store(observation: EnrichedObservation): Promise<boolean>;
}

export interface AlertDispatcher {
  publish(message: string, subject: string, target: string): Promise<boolean>;
}

export interface AnomalyConfig {
  zThreshold: number;
  minHistorySamples: number;
  preferredHistorySamples: number;
  historyLookbackDays: number;
  historyMaxSamples: number;
}

export interface PipelineConfig {
  severityPolicy: SeverityPolicy;
  riskPolicy: RiskPolicy;
  anomaly: AnomalyConfig;
  alertTopic: string;
  alertMinRisk: RiskCategory;
}

export interface RecordFailure {
  index: number;
  code: string;
  message: string;
  field?: string;
}

export interface BatchSummary {
  received: number;
  processed: number;
  failed: number;
  stored: number;
  storeFailures: number;
  alertsPublished: number;
  dispatchFailures: number;
  anomaliesDetected: number;
  historyFailures: number;
}

export interface BatchResult {
  summary: BatchSummary;
  enriched: EnrichedObservation[];
  failures: RecordFailure[];
}
