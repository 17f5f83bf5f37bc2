import { test } from 'node:test';
import assert from 'node:assert/strict';
import { comfortIndex, deriveMetrics, feelsLike, heatIndex, round, windChill } from '../src/services/enrichment/metricDeriver.js';
import { parseObservation } from '../src/services/enrichment/observationSchema.js';
import { rawObservation } from './helpers/fixtures.js';

const TEMPERATURES = [-45, -30, -20, -10.5, -5, 0, 4.9, 10, 15, 18, 21, 24.5, 27, 30, 35, 40, 48];
const HUMIDITIES = [0, 5, 10, 19.9, 25, 40, 50, 60, 70, 80, 90, 100];
const WIND_SPEEDS = [0, 4.8, 4.9, 10, 15, 20, 25, 40, 60, 90, 150];

test('Metric derivation', async (t) => {
  await t.test('round keeps one decimal by default', () => {
    assert.equal(round(13.333), 13.3);
    assert.equal(round(16.666), 16.7);
    assert.equal(round(1.23456, 3), 1.235);
  });

  await t.test('feels like adds the vapour pressure term', () => {
    assert.equal(feelsLike(20, 50), 19.8);
    assert.equal(feelsLike(21, 50), 21.1);
    assert.equal(feelsLike(30, 70), 35.8);
  });

  await t.test('wind chill only applies to cold windy air', () => {
    assert.equal(windChill(15, 20), 15);
    assert.equal(windChill(-10, 3), -10);
    assert.equal(windChill(-10, 4.8), -10);
    assert.equal(windChill(-10, 20), -17.9);
  });

  await t.test('heat index only applies above 20°C and 80°F', () => {
    assert.equal(heatIndex(15, 90), 15);
    assert.equal(heatIndex(25, 50), 25);
    assert.equal(heatIndex(35, 60), 45.1);
  });

  await t.test('comfort index is 10 in the optimal bands', () => {
    assert.equal(comfortIndex(21, 50, 5), 10);
    assert.equal(comfortIndex(21, 50, 10), 10);
  });

  await t.test('comfort index deducts per axis', () => {
    assert.equal(comfortIndex(21, 50, 2), 9.5);
    assert.equal(comfortIndex(16, 75, 20), 7);
    assert.equal(comfortIndex(-15, 90, 30), 2);
    assert.equal(comfortIndex(-40, 5, 60), 2);
  });

  await t.test('deriveMetrics combines all four metrics', () => {
    const observation = parseObservation(rawObservation({ temperature_celsius: -10, humidity_percent: 50, wind_speed_kmh: 20 }));
    const metrics = deriveMetrics(observation);

    assert.equal(metrics.windChill, -17.9);
    assert.equal(metrics.heatIndex, -10);
    // -10 → -3, humidity ok, wind 20 → -1
    assert.equal(metrics.comfortIndex, 6);
  });

  await t.test('feels like never drops as humidity rises', () => {
    for (const temperature of TEMPERATURES) {
      let previous = -Infinity;
      for (const humidity of HUMIDITIES) {
        const value = feelsLike(temperature, humidity);
        assert.ok(value >= previous, `feelsLike(${temperature}, ${humidity}) = ${value} < ${previous}`);
        previous = value;
      }
    }
  });

  await t.test('wind chill never exceeds the air temperature in cold windy air', () => {
    for (const temperature of TEMPERATURES.filter((value) => value <= 10)) {
      for (const wind of WIND_SPEEDS.filter((value) => value > 4.8)) {
        const value = windChill(temperature, wind);
        assert.ok(value <= temperature, `windChill(${temperature}, ${wind}) = ${value}`);
      }
    }
  });

  await t.test('comfort index stays within 0 to 10', () => {
    for (const temperature of TEMPERATURES) {
      for (const humidity of HUMIDITIES) {
        for (const wind of WIND_SPEEDS) {
          const value = comfortIndex(temperature, humidity, wind);
          assert.ok(value >= 0 && value <= 10, `comfortIndex(${temperature}, ${humidity}, ${wind}) = ${value}`);
        }
      }
    }
  });
});
