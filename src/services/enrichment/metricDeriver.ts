import type { DerivedMetrics, Observation } from './types.js';

export function round(value: number, digits = 1) {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Apparent temperature without the wind term: T + 0.33·e − 4, with e the
 * water vapour pressure (hPa) from relative humidity.
 */
export function feelsLike(temperature: number, humidity: number): number {
  const vapourPressure = (humidity / 100) * 6.105 * Math.exp((17.27 * temperature) / (237.7 + temperature));
  return round(temperature + 0.33 * vapourPressure - 4);
}

export function windChill(temperature: number, windSpeedKmh: number): number {
  if (temperature > 10 || windSpeedKmh <= 4.8) {
    return temperature;
  }

  const windFactor = windSpeedKmh ** 0.16;
  return round(13.12 + 0.6215 * temperature - 11.37 * windFactor + 0.3965 * temperature * windFactor);
}

/**
 * Rothfusz regression. Below 20°C, and below the regression's 80°F floor,
 * the air temperature is returned as is.
 */
export function heatIndex(temperature: number, humidity: number): number {
  if (temperature <= 20) {
    return temperature;
  }

  const tempF = (temperature * 9) / 5 + 32;
  if (tempF < 80) {
    return temperature;
  }

  const hi = -42.379
    + 2.04901523 * tempF
    + 10.14333127 * humidity
    - 0.22475541 * tempF * humidity
    - 6.83783e-3 * tempF ** 2
    - 5.481717e-2 * humidity ** 2
    + 1.22874e-3 * tempF ** 2 * humidity
    + 8.5282e-4 * tempF * humidity ** 2
    - 1.99e-6 * tempF ** 2 * humidity ** 2;

  return round(((hi - 32) * 5) / 9);
}

export function comfortIndex(temperature: number, humidity: number, windSpeedKmh: number): number {
  let score = 10;

  // optimal band 18-24°C
  if (temperature < -10 || temperature > 35) {
    score -= 4;
  } else if (temperature < 5 || temperature > 30) {
    score -= 3;
  } else if (temperature < 15 || temperature > 27) {
    score -= 2;
  } else if (temperature < 18 || temperature > 24) {
    score -= 1;
  }

  // optimal band 40-60%
  if (humidity > 80 || humidity < 20) {
    score -= 2;
  } else if (humidity > 70 || humidity < 30) {
    score -= 1;
  }

  if (windSpeedKmh > 25) {
    score -= 2;
  } else if (windSpeedKmh > 15) {
    score -= 1;
  } else if (windSpeedKmh < 5) {
    score -= 0.5;
  }

  return Math.max(0, round(score));
}

export function deriveMetrics(observation: Observation): DerivedMetrics {
  const { temperatureCelsius: temp, humidityPercent: humidity, windSpeedKmh: wind } = observation;
  return {
    feelsLike: feelsLike(temp, humidity),
    windChill: windChill(temp, wind),
    heatIndex: heatIndex(temp, humidity),
    comfortIndex: comfortIndex(temp, humidity, wind)
  };
}
