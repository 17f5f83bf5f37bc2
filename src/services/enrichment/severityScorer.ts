import { round } from './metricDeriver.js';
import type { Observation, SeverityPolicy, SeverityScore } from './types.js';

export const DEFAULT_PRESSURE_HPA = 1013;
export const DEFAULT_VISIBILITY_KM = 10;

export interface Bounded100Breakdown {
  temperature: number;
  humidity: number;
  wind: number;
  total: number;
}

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

function temperaturePoints(temp: number) {
  if (temp <= -35) return 4;
  if (temp <= -25) return 3;
  if (temp <= -15) return 2;
  if (temp <= -5) return 1;
  if (temp >= 40) return 4;
  if (temp >= 35) return 3;
  if (temp >= 30) return 2;
  return 0;
}

function windPoints(wind: number) {
  if (wind >= 40) return 3;
  if (wind >= 25) return 2;
  if (wind >= 15) return 1;
  return 0;
}

function pressurePoints(pressure: number) {
  if (pressure < 980 || pressure > 1040) return 2;
  if (pressure < 990 || pressure > 1030) return 1;
  return 0;
}

function visibilityPoints(visibility: number) {
  if (visibility < 1) return 2;
  if (visibility < 5) return 1;
  return 0;
}

/**
 * Additive multi-factor score tuned to Canadian climate bands, clamped to [0, 10].
 */
export function scoreBounded10(observation: Observation): number {
  const temp = observation.temperatureCelsius;
  const humidity = observation.humidityPercent;
  const wind = observation.windSpeedKmh;
  const pressure = observation.pressureHpa ?? DEFAULT_PRESSURE_HPA;
  const visibility = observation.visibilityKm ?? DEFAULT_VISIBILITY_KM;

  let severity = temperaturePoints(temp)
    + windPoints(wind)
    + pressurePoints(pressure)
    + visibilityPoints(visibility);

  // blizzard
  if (temp < -20 && wind > 20) {
    severity += 2;
  }

  if (temp > 30 && humidity > 80) {
    severity += 2;
  }

  severity += observation.alertFlags.length * 0.5;

  return clamp(round(severity), 0, 10);
}

export function bounded100Breakdown(observation: Observation): Bounded100Breakdown {
  const temp = observation.temperatureCelsius;
  const humidity = observation.humidityPercent;
  const wind = observation.windSpeedKmh;

  let temperature = 0;
  if (temp <= -30 || temp >= 40) temperature = 40;
  else if (temp <= -20 || temp >= 35) temperature = 30;
  else if (temp <= -10 || temp >= 30) temperature = 20;
  else if (temp <= 0 || temp >= 27) temperature = 10;

  let humidityScore = 0;
  if (humidity <= 10 || humidity >= 90) humidityScore = 25;
  else if (humidity <= 20 || humidity >= 80) humidityScore = 15;
  else if (humidity <= 30 || humidity >= 70) humidityScore = 5;

  let windScore = 0;
  if (wind >= 90) windScore = 35;
  else if (wind >= 60) windScore = 25;
  else if (wind >= 40) windScore = 15;
  else if (wind >= 25) windScore = 8;

  return {
    temperature,
    humidity: humidityScore,
    wind: windScore,
    total: clamp(Math.round(temperature + humidityScore + windScore), 0, 100)
  };
}

export function scoreBounded100(observation: Observation): number {
  return bounded100Breakdown(observation).total;
}

export function scoreSeverity(observation: Observation, policy: SeverityPolicy): SeverityScore {
  const score = policy === 'bounded10' ? scoreBounded10(observation) : scoreBounded100(observation);
  return { policy, score };
}
