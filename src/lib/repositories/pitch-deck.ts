import type { SupabaseClient } from '@supabase/supabase-js';
import { RepositoryError } from '@/lib/errors';
import type { PitchDeckRow } from '@/types/database';
import type { RemoteObject, SubmissionState } from '@/types/pitch-deck';

export interface PitchDeckRecord {
  id: string;
  objects: RemoteObject[];
  /** Index-aligned with objects; null where the row predates original_names */
  originalNames: (string | null)[];
  submission: SubmissionState;
}

export interface SubmitPitchDeckParams {
  userId: string;
  pitchDeckId: string | null;
  objects: RemoteObject[];
  originalNames: string[];
  submittedAt: string;
}

export interface PitchDeckRepository {
  load(userId: string): Promise<PitchDeckRecord | null>;
  /** Inserts or updates the user's record as submitted; returns its id. */
  saveSubmission(params: SubmitPitchDeckParams): Promise<string>;
}

/**
 * A row flagged as submitted always yields a submission date:
 * submission_date, else updated_at, else created_at.
 */
export function toSubmissionState(row: PitchDeckRow): SubmissionState {
  if (!row.is_submitted) return { isSubmitted: false, submittedAt: null };
  const submittedAt =
    row.submission_date ?? row.updated_at ?? row.created_at ?? new Date(0).toISOString();
  return { isSubmitted: true, submittedAt };
}

export function toPitchDeckRecord(row: PitchDeckRow): PitchDeckRecord {
  const urls = row.file_urls ?? [];
  const paths = row.file_names ?? [];
  const originals = row.original_names ?? [];

  return {
    id: row.id,
    objects: urls.map((url, i) => ({ url, storagePath: paths[i] ?? '' })),
    originalNames: urls.map((_, i) => originals[i] ?? null),
    submission: toSubmissionState(row),
  };
}

export function createSupabasePitchDeckRepository(client: SupabaseClient): PitchDeckRepository {
  return {
    async load(userId) {
      const { data, error } = await client
        .from('pitch_decks')
        .select('*')
        .eq('user_id', userId)
        .maybeSingle<PitchDeckRow>();

      if (error) throw new RepositoryError(`Failed to load pitch deck: ${error.message}`);
      return data ? toPitchDeckRecord(data) : null;
    },

    async saveSubmission({ userId, pitchDeckId, objects, originalNames, submittedAt }) {
      const payload = {
        file_urls: objects.map((o) => o.url),
        file_names: objects.map((o) => o.storagePath),
        original_names: originalNames,
        file_count: objects.length,
        is_submitted: true,
        submission_date: submittedAt,
        updated_at: submittedAt,
      };

      if (pitchDeckId) {
        const { error } = await client.from('pitch_decks').update(payload).eq('id', pitchDeckId);
        if (error) throw new RepositoryError(`Failed to update pitch deck: ${error.message}`);
        return pitchDeckId;
      }

      const { data, error } = await client
        .from('pitch_decks')
        .insert({ ...payload, user_id: userId, created_at: submittedAt })
        .select('id')
        .single<{ id: string }>();

      if (error) throw new RepositoryError(`Failed to create pitch deck: ${error.message}`);
      return data.id;
    },
  };
}
