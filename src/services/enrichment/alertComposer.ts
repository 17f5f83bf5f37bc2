import { errorMessage, logger } from '../../utils/logger.js';
import { compareRisk } from './riskClassifier.js';
import type { AlertDispatcher, EnrichedObservation, RiskCategory } from './types.js';

export interface AlertBatch {
  subject: string;
  target: string;
  lines: string[];
  body: string;
}

export type DispatchOutcome = 'skipped' | 'published' | 'failed';

function formatNumber(value: number) {
  return Number.isInteger(value) ? value.toFixed(0) : value.toFixed(1);
}

function formatSeverity(observation: EnrichedObservation) {
  const max = observation.severity.policy === 'bounded10' ? 10 : 100;
  return `${formatNumber(observation.severity.score)}/${max}`;
}

export function composeAlertMessage(observation: EnrichedObservation): string {
  const temp = formatNumber(observation.temperatureCelsius);
  const humidity = formatNumber(observation.humidityPercent);
  const wind = formatNumber(observation.windSpeedKmh);
  const severity = formatSeverity(observation);

  switch (observation.alertCategory) {
    case 'heat_extreme':
      return `🔥 Extreme heat in ${observation.city}: ${temp}°C with ${humidity}% humidity and ${wind} km/h wind. Severity ${severity}.`;
    case 'cold_extreme':
      return `🥶 Extreme cold in ${observation.city}: ${temp}°C, wind ${wind} km/h, humidity ${humidity}%. Severity ${severity}.`;
    case 'wind_extreme':
      return `💨 Extreme wind in ${observation.city}: ${wind} km/h at ${temp}°C, humidity ${humidity}%. Severity ${severity}.`;
    default:
      return `⚠️ Weather alert for ${observation.city}: ${temp}°C, ${humidity}% humidity, ${wind} km/h wind. Severity ${severity} (${observation.riskCategory}).`;
  }
}

export function shouldAlert(observation: EnrichedObservation, minRisk: RiskCategory) {
  return observation.anomalyDetected || compareRisk(observation.riskCategory, minRisk) >= 0;
}

export function composeAlertBatch(observation: EnrichedObservation, target: string): AlertBatch {
  const lines = [composeAlertMessage(observation)];
  for (const flag of observation.alertFlags) {
    lines.push(`Active flag: ${flag}`);
  }
  if (observation.anomalyScore > 0) {
    lines.push(`Deviation from recent norm: z=${observation.anomalyScore.toFixed(2)}`);
  }

  const location = observation.province ? `${observation.city}, ${observation.province}` : observation.city;
  return {
    subject: `[${observation.riskCategory}] Weather alert: ${location}`,
    target,
    lines,
    body: lines.join('\n')
  };
}

export class AlertComposer {
  constructor(
    private readonly dispatcher: AlertDispatcher,
    private readonly options: { target: string; minRisk: RiskCategory }
  ) {}

  /** One publish call per qualifying observation; delivery policy is the dispatcher's concern. */
  async dispatch(observation: EnrichedObservation): Promise<DispatchOutcome> {
    if (!shouldAlert(observation, this.options.minRisk)) {
      return 'skipped';
    }

    const batch = composeAlertBatch(observation, this.options.target);
    try {
      const delivered = await this.dispatcher.publish(batch.body, batch.subject, batch.target);
      if (!delivered) {
        logger.warn('alerts.dispatch.rejected', { city: observation.city, target: batch.target });
        return 'failed';
      }
      logger.info('alerts.dispatch.published', {
        city: observation.city,
        alert_category: observation.alertCategory,
        risk_category: observation.riskCategory
      });
      return 'published';
    } catch (error) {
      logger.error('alerts.dispatch.failed', { city: observation.city, error: errorMessage(error) });
      return 'failed';
    }
  }
}
