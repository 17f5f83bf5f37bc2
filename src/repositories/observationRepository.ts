import type { SupabaseClient } from '@supabase/supabase-js';
import { traceCollaborator } from '../observability/tracing.js';
import { logger } from '../utils/logger.js';
import { toObservationRecord } from '../services/enrichment/observationRecord.js';
import type { EnrichedObservation, HistorySample, HistoryStore, ObservationStore } from '../services/enrichment/types.js';
import type { ObservationSource } from '../services/reporting/types.js';

const PAGE_SIZE = 1000;

type HistoryRow = {
  timestamp: unknown;
  temperature_celsius: unknown;
};

function toHistorySample(row: HistoryRow): HistorySample | null {
  const temperature = Number(row.temperature_celsius);
  if (typeof row.timestamp !== 'string' || !Number.isFinite(temperature)) {
    return null;
  }
  return { timestamp: row.timestamp, temperatureCelsius: temperature };
}

/**
 * Supabase-backed history reads, enriched-observation writes and export reads
 * over the observations table.
 */
export class SupabaseObservationRepository implements HistoryStore, ObservationStore, ObservationSource {
  constructor(private readonly client: SupabaseClient, private readonly table = 'weather_observations') {}

  async fetchHistory(city: string, since: string, maxSamples: number): Promise<HistorySample[]> {
    const { data, error } = await traceCollaborator('history-store', 'fetch', async () => this.client
      .from(this.table)
      .select('timestamp, temperature_celsius')
      .eq('city', city)
      .gt('timestamp', since)
      .order('timestamp', { ascending: false })
      .limit(maxSamples));

    if (error) {
      throw new Error(error.message);
    }

    const rows: HistoryRow[] = data ?? [];
    return rows
      .map(toHistorySample)
      .filter((sample): sample is HistorySample => sample !== null)
      .reverse();
  }

  async store(observation: EnrichedObservation): Promise<boolean> {
    const { error } = await traceCollaborator('observation-store', 'insert', async () => this.client
      .from(this.table)
      .insert(toObservationRecord(observation)));

    if (error) {
      logger.error('observations.store.failed', { city: observation.city, error: error.message });
      return false;
    }
    return true;
  }

  async listSince(since: string): Promise<unknown[]> {
    const rows: unknown[] = [];
    let offset = 0;

    for (;;) {
      const { data, error } = await traceCollaborator('observation-source', 'scan', async () => this.client
        .from(this.table)
        .select('*')
        .gt('timestamp', since)
        .order('timestamp', { ascending: true })
        .range(offset, offset + PAGE_SIZE - 1));

      if (error) {
        throw new Error(error.message);
      }

      const page: unknown[] = data ?? [];
      rows.push(...page);
      if (page.length < PAGE_SIZE) {
        return rows;
      }
      offset += PAGE_SIZE;
    }
  }
}
