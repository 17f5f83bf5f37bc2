import { z } from 'zod';
import { InvalidObservationError, MissingFieldError } from '../../errors/AppError.js';
import type { Observation } from './types.js';

const REQUIRED_FIELDS = ['city', 'province', 'timestamp', 'temperature_celsius', 'humidity_percent', 'wind_speed_kmh'] as const;

const FIELD_NAMES: Record<string, string> = {
  temperature_celsius: 'temperature',
  humidity_percent: 'humidity',
  wind_speed_kmh: 'wind_speed'
};

const timestampSchema = z.string().min(1).refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'timestamp must be an ISO-8601 date'
});

/** Wire shape produced by the ingestion stream. */
export const rawObservationSchema = z.object({
  city: z.string().trim().min(1),
  province: z.string().trim().min(1),
  region: z.string().optional(),
  timestamp: timestampSchema,
  temperature_celsius: z.number().finite(),
  humidity_percent: z.number().finite(),
  wind_speed_kmh: z.number().finite(),
  pressure_hpa: z.number().finite().optional(),
  visibility_km: z.number().finite().optional(),
  weather_condition: z.string().optional(),
  alert_flags: z.array(z.string()).default([])
});

export type RawObservation = z.input<typeof rawObservationSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First required field that is absent or null, in declaration order. */
export function findMissingField(raw: unknown): string | null {
  if (!isRecord(raw)) {
    return null;
  }
  const missing = REQUIRED_FIELDS.find((field) => raw[field] === undefined || raw[field] === null);
  return missing ? FIELD_NAMES[missing] ?? missing : null;
}

function stripNulls(raw: Record<string, unknown>) {
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== null));
}

export function parseObservation(raw: unknown): Observation {
  if (!isRecord(raw)) {
    throw new InvalidObservationError('Observation must be an object');
  }

  const missing = findMissingField(raw);
  if (missing) {
    throw new MissingFieldError(missing);
  }

  const parsed = rawObservationSchema.safeParse(stripNulls(raw));
  if (!parsed.success) {
    throw new InvalidObservationError('Observation failed validation', parsed.error.flatten().fieldErrors);
  }

  const data = parsed.data;
  return Object.freeze({
    city: data.city,
    province: data.province,
    ...(data.region !== undefined ? { region: data.region } : {}),
    timestamp: data.timestamp,
    temperatureCelsius: data.temperature_celsius,
    humidityPercent: data.humidity_percent,
    windSpeedKmh: data.wind_speed_kmh,
    ...(data.pressure_hpa !== undefined ? { pressureHpa: data.pressure_hpa } : {}),
    ...(data.visibility_km !== undefined ? { visibilityKm: data.visibility_km } : {}),
    ...(data.weather_condition !== undefined ? { weatherCondition: data.weather_condition } : {}),
    alertFlags: Object.freeze([...data.alert_flags])
  });
}
