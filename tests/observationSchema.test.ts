import { test } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidObservationError, MissingFieldError } from '../src/errors/AppError.js';
import { fromObservationRecord, toObservationRecord } from '../src/services/enrichment/observationRecord.js';
import { findMissingField, parseObservation } from '../src/services/enrichment/observationSchema.js';
import { enrichedObservation, rawObservation } from './helpers/fixtures.js';

test('Observation parsing', async (t) => {
  await t.test('maps the wire shape to an observation', () => {
    const observation = parseObservation(rawObservation({ pressure_hpa: 1008.5, alert_flags: ['fog'] }));

    assert.deepEqual(observation, {
      city: 'Ottawa',
      province: 'ON',
      region: 'Eastern Ontario',
      timestamp: '2024-08-07T10:00:00Z',
      temperatureCelsius: 21,
      humidityPercent: 50,
      windSpeedKmh: 10,
      pressureHpa: 1008.5,
      alertFlags: ['fog']
    });
    assert.equal(Object.isFrozen(observation), true);
  });

  await t.test('alert flags default to empty and null optionals are dropped', () => {
    const raw = rawObservation({ pressure_hpa: null, visibility_km: null });
    delete raw.alert_flags;
    const observation = parseObservation(raw);

    assert.deepEqual(observation.alertFlags, []);
    assert.equal('pressureHpa' in observation, false);
    assert.equal('visibilityKm' in observation, false);
  });

  await t.test('missing temperature is reported by name', () => {
    const raw = rawObservation();
    delete raw.temperature_celsius;

    assert.equal(findMissingField(raw), 'temperature');
    assert.throws(() => parseObservation(raw), (error: unknown) => {
      assert.ok(error instanceof MissingFieldError);
      assert.equal(error.field, 'temperature');
      assert.equal(error.statusCode, 422);
      assert.equal(error.message, 'Missing required field: temperature');
      return true;
    });
  });

  await t.test('null humidity counts as missing', () => {
    assert.equal(findMissingField(rawObservation({ humidity_percent: null })), 'humidity');
  });

  await t.test('non-objects are invalid', () => {
    assert.throws(() => parseObservation('Ottawa'), InvalidObservationError);
    assert.throws(() => parseObservation([rawObservation()]), InvalidObservationError);
  });

  await t.test('type mismatches are invalid', () => {
    assert.throws(() => parseObservation(rawObservation({ wind_speed_kmh: 'fast' })), (error: unknown) => {
      assert.ok(error instanceof InvalidObservationError);
      assert.equal(error.code, 'INVALID_OBSERVATION');
      return true;
    });
  });

  await t.test('unparseable timestamps are invalid', () => {
    assert.throws(() => parseObservation(rawObservation({ timestamp: 'yesterday' })), InvalidObservationError);
  });
});

test('Observation records', async (t) => {
  await t.test('stored rows round-trip to the same enriched observation', () => {
    const enriched = enrichedObservation({ alert_flags: ['fog'], visibility_km: 0.8 });
    const record = toObservationRecord(enriched);

    assert.equal(record.visibility_km, 0.8);
    assert.equal('pressure_hpa' in record, false);
    assert.equal(record.severity_policy, 'bounded10');
    assert.deepEqual(fromObservationRecord(record), enriched);
  });

  await t.test('rows without derived fields are rejected', () => {
    assert.throws(() => fromObservationRecord(rawObservation()), InvalidObservationError);
  });
});
