import { FUNDING_PHASES, MIN_FUNDING_GOAL } from './constants';
import type { EditableProfileField, ProfileFields } from '@/types/profile';

/** Returns the message to show under the field, or null when valid. */
export type FieldValidator = (value: string) => string | null;

function requireText(label: string, minLength: number): FieldValidator {
  return (value) => {
    const trimmed = value.trim();
    if (!trimmed) return `${label} is required`;
    if (trimmed.length < minLength) return `${label} must be at least ${minLength} characters`;
    return null;
  };
}

/** Strips thousands separators; null unless the result is a positive integer. */
export function parseFundingGoal(input: string): number | null {
  const digits = input.trim().replace(/,/g, '');
  if (!/^\d+$/.test(digits)) return null;
  const amount = Number(digits);
  return amount > 0 ? amount : null;
}

export const PROFILE_VALIDATORS: Record<EditableProfileField, FieldValidator> = {
  companyName: requireText('Company name', 2),
  tagline: requireText('Tagline', 10),
  industry: (value) => (value.trim() ? null : 'Industry is required'),
  region: (value) => (value.trim() ? null : 'Region is required'),
  ideaDescription: (value) => {
    const trimmed = value.trim();
    if (!trimmed) return 'Please describe your startup idea';
    if (trimmed.length < 10) {
      return 'Please provide a more detailed description (at least 10 characters)';
    }
    return null;
  },
  fundingGoal: (value) => {
    if (!value.trim()) return 'Please enter your funding goal';
    const amount = parseFundingGoal(value);
    if (amount === null) return 'Please enter a valid funding amount';
    if (amount < MIN_FUNDING_GOAL) return 'Funding goal should be at least $1,000';
    return null;
  },
  fundingPhase: (value) =>
    FUNDING_PHASES.some((phase) => phase === value) ? null : 'Please select a valid funding phase',
};

export function validateProfileField(field: EditableProfileField, value: string): string | null {
  return PROFILE_VALIDATORS[field](value);
}

function filled(value: string | number | null): boolean {
  if (value === null) return false;
  return typeof value === 'string' ? value.trim().length > 0 : true;
}

function ratio(values: (string | number | null)[]): number {
  return values.filter(filled).length / values.length;
}

/** 0–1 share of the overview fields that are filled in */
export function overviewCompletion(fields: ProfileFields): number {
  return ratio([fields.companyName, fields.tagline, fields.industry, fields.region]);
}

/** 0–1 share of idea, goal, phase and avatar that are set */
export function fundingCompletion(fields: ProfileFields): number {
  return ratio([fields.ideaDescription, fields.fundingGoal, fields.fundingPhase, fields.avatarUrl]);
}
