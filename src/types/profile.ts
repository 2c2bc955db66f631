import type { FUNDING_PHASES } from '@/lib/constants';

export type FundingPhase = (typeof FUNDING_PHASES)[number];

export interface ProfileFields {
  companyName: string;
  tagline: string;
  industry: string;
  region: string;
  ideaDescription: string;
  fundingGoal: number | null;
  fundingPhase: FundingPhase | null;
  avatarUrl: string | null;
}

export type ProfileField = keyof ProfileFields;

/** Fields the founder edits directly; avatarUrl is written by the upload flow */
export type EditableProfileField = Exclude<ProfileField, 'avatarUrl'>;
