import { IDEAL_TEAM_SIZE, LEADERSHIP_ROLES, LINKEDIN_PROFILE_PATTERN } from './constants';
import type { TeamExport, TeamMember, TeamMemberInput, TeamSummary } from '@/types/team';

export interface TeamMemberErrors {
  name: string | null;
  role: string | null;
  linkedinUrl: string | null;
}

export function validateMemberName(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return 'Name is required';
  if (trimmed.length < 2) return 'Name must be at least 2 characters';
  return null;
}

export function validateMemberRole(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return 'Role is required';
  if (trimmed.length < 2) return 'Role must be at least 2 characters';
  return null;
}

/** Optional field: blank is valid. */
export function validateLinkedinUrl(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  return LINKEDIN_PROFILE_PATTERN.test(trimmed) ? null : 'Please enter a valid LinkedIn profile URL';
}

export function validateMember(input: TeamMemberInput): TeamMemberErrors {
  return {
    name: validateMemberName(input.name),
    role: validateMemberRole(input.role),
    linkedinUrl: validateLinkedinUrl(input.linkedinUrl ?? ''),
  };
}

export function hasErrors(errors: TeamMemberErrors): boolean {
  return errors.name !== null || errors.role !== null || errors.linkedinUrl !== null;
}

export function normalizeMemberInput(input: TeamMemberInput): TeamMemberInput {
  const linkedinUrl = input.linkedinUrl?.trim();
  return {
    name: input.name.trim(),
    role: input.role.trim(),
    ...(linkedinUrl ? { linkedinUrl } : {}),
    ...(input.avatarUrl ? { avatarUrl: input.avatarUrl } : {}),
  };
}

/** Case-insensitive on the trimmed name; `exceptId` skips the member being edited. */
export function isDuplicateName(members: TeamMember[], name: string, exceptId?: string): boolean {
  const needle = name.trim().toLowerCase();
  return members.some((m) => m.id !== exceptId && m.name.trim().toLowerCase() === needle);
}

export function isLeadershipRole(role: string): boolean {
  const lower = role.toLowerCase();
  return LEADERSHIP_ROLES.some((title) => lower.includes(title));
}

export function leadershipTeam(members: TeamMember[]): TeamMember[] {
  return members.filter((m) => isLeadershipRole(m.role));
}

export function membersByRole(members: TeamMember[], term: string): TeamMember[] {
  const needle = term.trim().toLowerCase();
  return members.filter((m) => m.role.toLowerCase().includes(needle));
}

export function summarizeTeam(members: TeamMember[]): TeamSummary {
  const roleDistribution: Record<string, number> = {};
  for (const member of members) {
    roleDistribution[member.role] = (roleDistribution[member.role] ?? 0) + 1;
  }

  return {
    totalMembers: members.length,
    leadershipCount: leadershipTeam(members).length,
    roleDistribution,
    hasFounder: members.some((m) => m.role.toLowerCase().includes('founder')),
  };
}

/** Percentage, capped at 100 once the team reaches the ideal size */
export function teamCompletion(members: TeamMember[]): number {
  return Math.min(members.length / IDEAL_TEAM_SIZE, 1) * 100;
}

export function exportTeam(members: TeamMember[], now: Date = new Date()): TeamExport {
  return {
    teamMembers: members,
    teamCount: members.length,
    leadershipCount: leadershipTeam(members).length,
    exportedAt: now.toISOString(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Reads an exported team file: either a bare array of members or an object
 * with a `teamMembers` array. Throws on malformed JSON or an unknown shape.
 */
export function parseTeamImport(json: string): TeamMemberInput[] {
  const data: unknown = JSON.parse(json);
  const list = Array.isArray(data) ? data : isRecord(data) ? data.teamMembers : undefined;
  if (!Array.isArray(list)) {
    throw new Error('Expected a list of team members');
  }

  return list.filter(isRecord).map((item) => ({
    name: readString(item, 'name'),
    role: readString(item, 'role'),
    linkedinUrl: readString(item, 'linkedinUrl') || readString(item, 'linkedin'),
  }));
}
