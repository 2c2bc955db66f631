import type { SupabaseClient } from '@supabase/supabase-js';
import { FUNDING_PHASES } from '@/lib/constants';
import { RepositoryError } from '@/lib/errors';
import type { StartupProfileRow } from '@/types/database';
import type { FundingPhase, ProfileFields } from '@/types/profile';

export interface ProfileRepository {
  load(userId: string): Promise<ProfileFields | null>;
  /** Upserts only the given fields, keyed by startup_id. */
  save(userId: string, patch: Partial<ProfileFields>): Promise<void>;
}

export const EMPTY_PROFILE: ProfileFields = {
  companyName: '',
  tagline: '',
  industry: '',
  region: '',
  ideaDescription: '',
  fundingGoal: null,
  fundingPhase: null,
  avatarUrl: null,
};

export function isFundingPhase(value: unknown): value is FundingPhase {
  return typeof value === 'string' && FUNDING_PHASES.some((phase) => phase === value);
}

export function toProfileFields(row: StartupProfileRow): ProfileFields {
  return {
    companyName: row.company_name ?? '',
    tagline: row.tagline ?? '',
    industry: row.industry ?? '',
    region: row.region ?? '',
    ideaDescription: row.idea_description ?? '',
    fundingGoal: row.funding_goal,
    fundingPhase: isFundingPhase(row.funding_stage) ? row.funding_stage : null,
    avatarUrl: row.avatar_url,
  };
}

/** Text fields are trimmed on the way out, matching what validation sees. */
export function toProfileColumns(patch: Partial<ProfileFields>): Partial<StartupProfileRow> {
  const columns: Partial<StartupProfileRow> = {};
  if (patch.companyName !== undefined) columns.company_name = patch.companyName.trim();
  if (patch.tagline !== undefined) columns.tagline = patch.tagline.trim();
  if (patch.industry !== undefined) columns.industry = patch.industry.trim();
  if (patch.region !== undefined) columns.region = patch.region.trim();
  if (patch.ideaDescription !== undefined) columns.idea_description = patch.ideaDescription.trim();
  if (patch.fundingGoal !== undefined) columns.funding_goal = patch.fundingGoal;
  if (patch.fundingPhase !== undefined) columns.funding_stage = patch.fundingPhase;
  if (patch.avatarUrl !== undefined) columns.avatar_url = patch.avatarUrl;
  return columns;
}

export function createSupabaseProfileRepository(client: SupabaseClient): ProfileRepository {
  return {
    async load(userId) {
      const { data, error } = await client
        .from('startup_profiles')
        .select(
          'startup_id, company_name, tagline, industry, region, idea_description, funding_goal, funding_stage, avatar_url, updated_at',
        )
        .eq('startup_id', userId)
        .maybeSingle<StartupProfileRow>();

      if (error) throw new RepositoryError(`Failed to load startup profile: ${error.message}`);
      return data ? toProfileFields(data) : null;
    },

    async save(userId, patch) {
      const { error } = await client.from('startup_profiles').upsert(
        {
          startup_id: userId,
          ...toProfileColumns(patch),
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'startup_id' },
      );

      if (error) throw new RepositoryError(`Failed to save startup profile: ${error.message}`);
    },
  };
}
