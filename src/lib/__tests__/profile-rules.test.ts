import { describe, it, expect } from 'vitest';
import {
  fundingCompletion,
  overviewCompletion,
  parseFundingGoal,
  validateProfileField,
} from '../profile-rules';
import { EMPTY_PROFILE } from '../repositories/profile';

describe('parseFundingGoal', () => {
  it('strips thousands separators', () => {
    expect(parseFundingGoal('1,500,000')).toBe(1500000);
  });

  it('rejects decimals, negatives and zero', () => {
    expect(parseFundingGoal('12.5')).toBeNull();
    expect(parseFundingGoal('-100')).toBeNull();
    expect(parseFundingGoal('0')).toBeNull();
  });
});

describe('validateProfileField', () => {
  it('requires a company name of two characters', () => {
    expect(validateProfileField('companyName', '  ')).toBe('Company name is required');
    expect(validateProfileField('companyName', 'A')).toBe('Company name must be at least 2 characters');
    expect(validateProfileField('companyName', 'Acme')).toBeNull();
  });

  it('requires a ten character tagline', () => {
    expect(validateProfileField('tagline', 'Too short')).toBe('Tagline must be at least 10 characters');
  });

  it('checks the funding goal floor', () => {
    expect(validateProfileField('fundingGoal', '')).toBe('Please enter your funding goal');
    expect(validateProfileField('fundingGoal', 'lots')).toBe('Please enter a valid funding amount');
    expect(validateProfileField('fundingGoal', '999')).toBe('Funding goal should be at least $1,000');
    expect(validateProfileField('fundingGoal', '1,000')).toBeNull();
  });

  it('only accepts known funding phases', () => {
    expect(validateProfileField('fundingPhase', 'Series A')).toBeNull();
    expect(validateProfileField('fundingPhase', 'Series Z')).toBe('Please select a valid funding phase');
  });
});

describe('profile completion', () => {
  it('counts filled overview fields', () => {
    const fields = { ...EMPTY_PROFILE, companyName: 'Acme', industry: ' ', region: 'EU' };
    expect(overviewCompletion(fields)).toBe(0.5);
  });

  it('counts a goal and a phase as funding progress', () => {
    const fields = { ...EMPTY_PROFILE, fundingGoal: 50000, fundingPhase: 'Seed' as const };
    expect(fundingCompletion(fields)).toBe(0.5);
  });
});
