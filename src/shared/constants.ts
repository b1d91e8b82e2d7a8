export const API_PREFIX = '/api';

export const PROGRAM_CATEGORIES = [
  'food',
  'housing',
  'healthcare',
  'financial',
  'childcare',
  'employment',
  'legal',
  'senior',
  'disability',
  'veteran',
  'education',
  'transportation',
] as const;

export const CRITERION_TYPES = [
  'income',
  'household',
  'categorical',
  'geographic',
  'situational',
] as const;

// Scoring buckets. Categorical criteria are scored inside `household`.
export const SCORE_CATEGORIES = [
  'income',
  'household',
  'need',
  'situational',
  'geographic',
] as const;

export const CATEGORICAL_STATUSES = [
  'elderly',
  'veteran',
  'disability',
  'pregnant',
] as const;

export const CRISIS_SITUATIONS = [
  'eviction',
  'homelessness',
  'utility_shutoff',
  'food_emergency',
  'domestic_violence',
  'job_loss',
  'medical_emergency',
  'disaster',
] as const;

// Display order of checklist groups.
export const DOCUMENT_TYPES = [
  'identification',
  'income',
  'residence',
  'financial',
  'legal',
  'medical',
  'other',
] as const;

export const BENEFIT_FREQUENCIES = ['monthly', 'one-time', 'annual', 'varies'] as const;

export const ELDERLY_AGE = 60;
export const ADULT_AGE = 18;
export const MAX_HOUSEHOLD_SIZE = 20;

export const ESTIMATE_DISCLAIMER =
  'This is an estimate only. It is not an eligibility determination; actual benefits are decided by the administering agency.';
