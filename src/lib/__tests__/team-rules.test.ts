import { describe, it, expect } from 'vitest';
import {
  exportTeam,
  hasErrors,
  isDuplicateName,
  normalizeMemberInput,
  parseTeamImport,
  summarizeTeam,
  teamCompletion,
  validateMember,
} from '../team-rules';
import type { TeamMember } from '@/types/team';

function member(id: string, name: string, role: string): TeamMember {
  return {
    id,
    name,
    role,
    avatarUrl: 'https://avatars.test/default.png',
    linkedinUrl: '',
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}

const TEAM = [
  member('1', 'Ada Lovelace', 'CEO & Co-Founder'),
  member('2', 'Grace Hopper', 'Engineer'),
  member('3', 'Alan Turing', 'Engineer'),
];

describe('validateMember', () => {
  it('reports each invalid field', () => {
    const errors = validateMember({ name: 'A', role: '', linkedinUrl: 'https://example.test/me' });
    expect(errors).toEqual({
      name: 'Name must be at least 2 characters',
      role: 'Role is required',
      linkedinUrl: 'Please enter a valid LinkedIn profile URL',
    });
    expect(hasErrors(errors)).toBe(true);
  });

  it('treats a blank LinkedIn URL as valid', () => {
    expect(hasErrors(validateMember({ name: 'Ada', role: 'CEO', linkedinUrl: '  ' }))).toBe(false);
  });

  it('accepts a profile URL', () => {
    const errors = validateMember({ name: 'Ada', role: 'CEO', linkedinUrl: 'https://www.linkedin.com/in/ada-l/' });
    expect(errors.linkedinUrl).toBeNull();
  });
});

describe('normalizeMemberInput', () => {
  it('trims and drops an empty LinkedIn URL', () => {
    expect(normalizeMemberInput({ name: ' Ada ', role: ' CEO', linkedinUrl: ' ' })).toEqual({
      name: 'Ada',
      role: 'CEO',
    });
  });
});

describe('isDuplicateName', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(isDuplicateName(TEAM, '  grace HOPPER ')).toBe(true);
  });

  it('skips the member being edited', () => {
    expect(isDuplicateName(TEAM, 'Grace Hopper', '2')).toBe(false);
  });
});

describe('summarizeTeam', () => {
  it('counts leadership and roles', () => {
    expect(summarizeTeam(TEAM)).toEqual({
      totalMembers: 3,
      leadershipCount: 1,
      roleDistribution: { 'CEO & Co-Founder': 1, Engineer: 2 },
      hasFounder: true,
    });
  });

  it('caps completion at a team of three', () => {
    expect(teamCompletion(TEAM.slice(0, 1))).toBeCloseTo(33.333, 2);
    expect(teamCompletion([...TEAM, member('4', 'Edsger', 'CTO')])).toBe(100);
  });

  it('exports with counts and a timestamp', () => {
    const exported = exportTeam(TEAM, new Date('2024-05-01T12:00:00.000Z'));
    expect(exported.teamCount).toBe(3);
    expect(exported.leadershipCount).toBe(1);
    expect(exported.exportedAt).toBe('2024-05-01T12:00:00.000Z');
  });
});

describe('parseTeamImport', () => {
  it('reads an exported file', () => {
    const json = JSON.stringify({
      teamMembers: [{ name: 'Ada', role: 'CEO', linkedin: 'https://linkedin.com/in/ada' }],
    });
    expect(parseTeamImport(json)).toEqual([
      { name: 'Ada', role: 'CEO', linkedinUrl: 'https://linkedin.com/in/ada' },
    ]);
  });

  it('reads a bare array and skips non-objects', () => {
    expect(parseTeamImport('[{"name":"Ada","role":"CEO"}, 5]')).toEqual([
      { name: 'Ada', role: 'CEO', linkedinUrl: '' },
    ]);
  });

  it('rejects other shapes', () => {
    expect(() => parseTeamImport('{"members":[]}')).toThrow('Expected a list of team members');
  });
});
