import type { SupabaseClient } from '@supabase/supabase-js';
import { traceCollaborator } from '../observability/tracing.js';
import type { ArtifactSink } from '../services/reporting/types.js';

export class SupabaseArtifactStorage implements ArtifactSink {
  constructor(private readonly client: SupabaseClient, private readonly bucket: string) {}

  async writeArtifact(key: string, content: string, contentType: string): Promise<void> {
    const { error } = await traceCollaborator('artifact-sink', 'upload', async () => this.client.storage
      .from(this.bucket)
      .upload(key, content, { contentType, upsert: true }));

    if (error) {
      throw new Error(error.message);
    }
  }
}
