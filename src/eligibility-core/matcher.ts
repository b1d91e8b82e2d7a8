// src/eligibility-core/matcher.ts
// Ranks every active program in a catalog snapshot for one profile.

import type { CatalogSnapshot, Program } from './catalog';
import type { BenefitRegistry } from './benefits/registry';
import type { BenefitInput, BenefitResult } from './benefits/types';
import type { CriterionEvaluation } from './criteria';
import { DEFAULT_MATCHING_POLICY, type MatchingPolicy } from './policy';
import {
  deriveHouseholdFacts,
  validateProfile,
  type HouseholdFacts,
  type UserProfile,
} from './profile';
import { scoreProgram, type ScoreBreakdown } from './scorer';

// ── Types ────────────────────────────────────────────────────────────────────

export type BenefitOutcome =
  | { status: 'estimated'; result: BenefitResult }
  | { status: 'no_calculator'; family: string }
  | { status: 'insufficient_data'; reason: string }
  | { status: 'not_applicable' };

export interface ProgramMatch {
  programId: string;
  programName: string;
  category: Program['category'];
  score: number;
  matchPercent: number;
  breakdown: ScoreBreakdown;
  evaluations: CriterionEvaluation[];
  reasons: string[];
  isEmergency: boolean;
  confidenceScore: number;
  benefitRange?: Program['benefitRange'];
  benefit: BenefitOutcome;
  applicationUrl?: string;
  contactPhone?: string;
}

export interface ExcludedProgram {
  programId: string;
  programName: string;
  kind: 'required_criterion' | 'malformed';
  reason: string;
}

export interface MatchReport {
  asOf: string;
  matches: ProgramMatch[];
  /** Ids of matched emergency programs, in rank order. */
  emergency: string[];
  excluded: ExcludedProgram[];
  belowThreshold: number;
}

export type MatchCatalog = Pick<CatalogSnapshot, 'programs' | 'fpl'>;

/** An invalid profile is refused before any program is scored. */
export type MatchOutcome =
  | { success: true; profile: UserProfile; report: MatchReport }
  | { success: false; error: string };

export interface MatchOptions {
  asOf?: Date;
  policy?: MatchingPolicy;
  registry?: BenefitRegistry;
}

// ── Benefit estimate ─────────────────────────────────────────────────────────

export function benefitInputFromProfile(
  profile: UserProfile,
  facts: HouseholdFacts,
): BenefitInput | null {
  const income = profile.monthlyIncome;
  if (income === undefined || income === null) return null;
  return {
    householdSize: profile.householdSize,
    grossMonthlyIncome: income,
    rent: profile.shelterCosts?.rent ?? 0,
    utilities: profile.shelterCosts?.utilities ?? 0,
    hasElderlyOrDisabled: facts.hasElderly === true || facts.hasDisability === true,
  };
}

function benefitFor(
  program: Program,
  input: BenefitInput | null,
  registry: BenefitRegistry | undefined,
): BenefitOutcome {
  const family = program.benefitFamily;
  if (!family) return { status: 'not_applicable' };

  const calculator = registry?.get(family.toLowerCase());
  if (!calculator) return { status: 'no_calculator', family };
  if (!input) {
    return { status: 'insufficient_data', reason: 'Monthly income is needed for an estimate' };
  }
  return { status: 'estimated', result: calculator(input) };
}

// ── Ranking ──────────────────────────────────────────────────────────────────

function compareMatches(a: ProgramMatch, b: ProgramMatch): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.confidenceScore !== b.confidenceScore) return b.confidenceScore - a.confidenceScore;
  if (a.programId === b.programId) return 0;
  return a.programId < b.programId ? -1 : 1;
}

function rankPrograms(
  profile: UserProfile,
  catalog: MatchCatalog,
  options: MatchOptions,
): MatchReport {
  const asOf = options.asOf ?? new Date();
  const policy = options.policy ?? DEFAULT_MATCHING_POLICY;
  const facts = deriveHouseholdFacts(profile);
  const benefitInput = benefitInputFromProfile(profile, facts);

  const matches: ProgramMatch[] = [];
  const excluded: ExcludedProgram[] = [];
  let belowThreshold = 0;

  for (const program of catalog.programs) {
    if (!program.isActive) continue;

    const scored = scoreProgram(program, { profile, facts, fpl: catalog.fpl, asOf, policy });

    if (scored.status === 'malformed') {
      excluded.push({
        programId: program.id,
        programName: program.name,
        kind: 'malformed',
        reason: scored.reason,
      });
      continue;
    }
    if (scored.status === 'excluded') {
      excluded.push({
        programId: program.id,
        programName: program.name,
        kind: 'required_criterion',
        reason: scored.reason,
      });
      continue;
    }
    if (scored.score < policy.minimumScore) {
      belowThreshold++;
      continue;
    }

    matches.push({
      programId: program.id,
      programName: program.name,
      category: program.category,
      score: scored.score,
      matchPercent: Math.round(scored.score * 100),
      breakdown: scored.breakdown,
      evaluations: scored.evaluations,
      reasons: scored.reasons,
      isEmergency: program.isEmergency,
      confidenceScore: program.confidenceScore,
      benefitRange: program.benefitRange,
      benefit: benefitFor(program, benefitInput, options.registry),
      applicationUrl: program.applicationUrl,
      contactPhone: program.contactPhone,
    });
  }

  matches.sort(compareMatches);

  return {
    asOf: asOf.toISOString().slice(0, 10),
    matches,
    emergency: matches.filter((m) => m.isEmergency).map((m) => m.programId),
    excluded,
    belowThreshold,
  };
}

/**
 * Validates the profile, then scores each active program, drops hard
 * exclusions and low scores, and returns the rest sorted by score, then
 * confidence, then id.
 */
export function match(
  input: unknown,
  catalog: MatchCatalog,
  options: MatchOptions = {},
): MatchOutcome {
  const profile = validateProfile(input);
  if (!profile.success) {
    return { success: false, error: profile.error };
  }
  return { success: true, profile: profile.data, report: rankPrograms(profile.data, catalog, options) };
}
