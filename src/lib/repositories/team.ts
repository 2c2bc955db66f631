import type { SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_AVATAR_URL } from '@/lib/constants';
import { RepositoryError } from '@/lib/errors';
import type { TeamMemberRow } from '@/types/database';
import type { TeamMember, TeamMemberInput } from '@/types/team';

export interface TeamRepository {
  /** Newest first */
  list(userId: string): Promise<TeamMember[]>;
  insert(userId: string, input: TeamMemberInput): Promise<TeamMember>;
  insertMany(userId: string, inputs: TeamMemberInput[]): Promise<TeamMember[]>;
  update(id: string, patch: Partial<TeamMemberInput>): Promise<TeamMember>;
  remove(id: string): Promise<void>;
}

const MEMBER_COLUMNS = 'id, user_id, name, role, linkedin_url, avatar_url, created_at, updated_at';

export function toTeamMember(row: TeamMemberRow): TeamMember {
  return {
    id: row.id,
    name: row.name,
    role: row.role,
    linkedinUrl: row.linkedin_url ?? '',
    avatarUrl: row.avatar_url || DEFAULT_AVATAR_URL,
    createdAt: row.created_at,
  };
}

function toColumns(input: Partial<TeamMemberInput>) {
  const columns: Partial<Pick<TeamMemberRow, 'name' | 'role' | 'linkedin_url' | 'avatar_url'>> = {};
  if (input.name !== undefined) columns.name = input.name;
  if (input.role !== undefined) columns.role = input.role;
  if (input.linkedinUrl !== undefined) columns.linkedin_url = input.linkedinUrl || null;
  if (input.avatarUrl !== undefined) columns.avatar_url = input.avatarUrl || null;
  return columns;
}

export function createSupabaseTeamRepository(client: SupabaseClient): TeamRepository {
  return {
    async list(userId) {
      const { data, error } = await client
        .from('team_members')
        .select(MEMBER_COLUMNS)
        .eq('user_id', userId)
        .order('created_at', { ascending: false })
        .returns<TeamMemberRow[]>();

      if (error) throw new RepositoryError(`Failed to load team members: ${error.message}`);
      return (data ?? []).map(toTeamMember);
    },

    async insert(userId, input) {
      const { data, error } = await client
        .from('team_members')
        .insert({ ...toColumns(input), user_id: userId, created_at: new Date().toISOString() })
        .select(MEMBER_COLUMNS)
        .single<TeamMemberRow>();

      if (error) throw new RepositoryError(`Failed to add team member: ${error.message}`);
      return toTeamMember(data);
    },

    async insertMany(userId, inputs) {
      if (inputs.length === 0) return [];
      const now = new Date().toISOString();

      const { data, error } = await client
        .from('team_members')
        .insert(inputs.map((input) => ({ ...toColumns(input), user_id: userId, created_at: now, updated_at: now })))
        .select(MEMBER_COLUMNS)
        .returns<TeamMemberRow[]>();

      if (error) throw new RepositoryError(`Failed to import team members: ${error.message}`);
      return (data ?? []).map(toTeamMember);
    },

    async update(id, patch) {
      const { data, error } = await client
        .from('team_members')
        .update({ ...toColumns(patch), updated_at: new Date().toISOString() })
        .eq('id', id)
        .select(MEMBER_COLUMNS)
        .single<TeamMemberRow>();

      if (error) throw new RepositoryError(`Failed to update team member: ${error.message}`);
      return toTeamMember(data);
    },

    async remove(id) {
      const { error } = await client.from('team_members').delete().eq('id', id);
      if (error) throw new RepositoryError(`Failed to remove team member: ${error.message}`);
    },
  };
}
