import { canvasCompletion, completedSections } from './canvas-rules';
import { CANVAS_SECTION_KEYS } from './constants';
import { formatThousands } from './format';
import { fundingCompletion, overviewCompletion } from './profile-rules';
import { leadershipTeam, teamCompletion } from './team-rules';
import type { CanvasSections } from '@/types/canvas';
import type { PitchDeckEntry, SubmissionState } from '@/types/pitch-deck';
import type { ProfileFields } from '@/types/profile';
import type { TeamMember } from '@/types/team';

export type PitchDeckStatus = 'empty' | 'staged' | 'submitted';

export interface DashboardSummary {
  company: {
    name: string;
    tagline: string;
    industry: string;
    region: string;
    avatarUrl: string | null;
  };
  funding: {
    goalLabel: string;
    phaseLabel: string;
  };
  pitchDeck: {
    fileCount: number;
    pendingCount: number;
    status: PitchDeckStatus;
    submittedAt: string | null;
  };
  team: {
    count: number;
    leadershipCount: number;
    hasFounder: boolean;
    preview: TeamMember[];
  };
  canvas: {
    completedSections: number;
    totalSections: number;
    /** 0–100 */
    percent: number;
  };
  /** 0–100, mean of the five section completions */
  profileCompletion: number;
}

export interface DashboardInput {
  profile: ProfileFields;
  pitchDeck: { entries: PitchDeckEntry[]; submission: SubmissionState };
  team: TeamMember[];
  canvas: CanvasSections;
}

const TEAM_PREVIEW_SIZE = 3;

function orPlaceholder(value: string, placeholder: string): string {
  const trimmed = value.trim();
  return trimmed || placeholder;
}

export function pitchDeckStatus(entries: PitchDeckEntry[], submission: SubmissionState): PitchDeckStatus {
  if (submission.isSubmitted) return 'submitted';
  return entries.length > 0 ? 'staged' : 'empty';
}

/**
 * Read-only composition of the four session stores. Nothing here reaches
 * into another store's state; callers pass plain snapshots.
 */
export function buildDashboardSummary({ profile, pitchDeck, team, canvas }: DashboardInput): DashboardSummary {
  const completions = [
    overviewCompletion(profile),
    fundingCompletion(profile),
    pitchDeck.entries.length > 0 ? 1 : 0,
    teamCompletion(team) / 100,
    canvasCompletion(canvas),
  ];
  const mean = completions.reduce((sum, c) => sum + c, 0) / completions.length;

  return {
    company: {
      name: orPlaceholder(profile.companyName, 'Your Company'),
      tagline: orPlaceholder(profile.tagline, 'Add a tagline to describe your startup'),
      industry: orPlaceholder(profile.industry, 'Industry not set'),
      region: orPlaceholder(profile.region, 'Region not set'),
      avatarUrl: profile.avatarUrl,
    },
    funding: {
      goalLabel: profile.fundingGoal === null ? 'Not set' : formatThousands(profile.fundingGoal),
      phaseLabel: profile.fundingPhase ?? 'Not set',
    },
    pitchDeck: {
      fileCount: pitchDeck.entries.length,
      pendingCount: pitchDeck.entries.filter((e) => e.remote === null).length,
      status: pitchDeckStatus(pitchDeck.entries, pitchDeck.submission),
      submittedAt: pitchDeck.submission.submittedAt,
    },
    team: {
      count: team.length,
      leadershipCount: leadershipTeam(team).length,
      hasFounder: team.some((m) => m.role.toLowerCase().includes('founder')),
      preview: team.slice(0, TEAM_PREVIEW_SIZE),
    },
    canvas: {
      completedSections: completedSections(canvas),
      totalSections: CANVAS_SECTION_KEYS.length,
      percent: Math.round(canvasCompletion(canvas) * 100),
    },
    profileCompletion: Math.round(mean * 100),
  };
}
