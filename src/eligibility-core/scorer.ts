// src/eligibility-core/scorer.ts
// Match scorer: weighted category scoring for a single program.
// No shared state, so programs can be scored in any order or in parallel.

import { SCORE_CATEGORIES } from '@shared/constants';
import type { EligibilityCriterion, FplReference, Program } from './catalog';
import { evaluateCriterion, type CriterionEvaluation } from './criteria';
import type { MatchingPolicy, ScoreCategory } from './policy';
import type { HouseholdFacts, UserProfile } from './profile';

// ── Types ────────────────────────────────────────────────────────────────────

export interface CategoryScore {
  weight: number;
  satisfaction: number;
  contribution: number;
  criteriaCount: number;
}

export type ScoreBreakdown = Record<ScoreCategory, CategoryScore>;

export interface ScoredProgram {
  status: 'scored';
  score: number;
  breakdown: ScoreBreakdown;
  evaluations: CriterionEvaluation[];
  reasons: string[];
}

export interface HardExcludedProgram {
  status: 'excluded';
  criterionName: string;
  reason: string;
}

export interface MalformedProgram {
  status: 'malformed';
  reason: string;
}

export type ProgramScore = ScoredProgram | HardExcludedProgram | MalformedProgram;

export interface ScoringContext {
  profile: UserProfile;
  facts: HouseholdFacts;
  fpl: FplReference;
  asOf: Date;
  policy: MatchingPolicy;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

const BUCKET: Record<EligibilityCriterion['type'], ScoreCategory> = {
  income: 'income',
  household: 'household',
  categorical: 'household',
  situational: 'situational',
  geographic: 'geographic',
};

function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ── Scoring ──────────────────────────────────────────────────────────────────

export function scoreProgram(program: Program, ctx: ScoringContext): ProgramScore {
  const evaluations: CriterionEvaluation[] = [];

  for (const criterion of program.criteria) {
    const result = evaluateCriterion(criterion, { ...ctx, program });
    if (!result.ok) {
      return { status: 'malformed', reason: result.error };
    }
    evaluations.push(result.evaluation);
  }

  // Hard gate: a definite miss on a required criterion drops the program
  const gate = evaluations.find((e) => e.isRequired && e.outcome === 'unmet');
  if (gate) {
    return { status: 'excluded', criterionName: gate.criterionName, reason: gate.reason };
  }

  const satisfactions: Record<ScoreCategory, number[]> = {
    income: [],
    household: [],
    need: [],
    situational: [],
    geographic: [],
  };
  for (const evaluation of evaluations) {
    satisfactions[BUCKET[evaluation.type]].push(evaluation.satisfaction);
  }

  // Need match is a direct category comparison, not a criterion
  const needMet = ctx.profile.needs.includes(program.category);
  satisfactions.need.push(needMet ? 1 : 0);

  const scoreCategory = (category: ScoreCategory): CategoryScore => {
    const weight = ctx.policy.weights[category];
    const values = satisfactions[category];
    // No requirement in a category is never a penalty
    const satisfaction = values.length === 0 ? 1 : average(values);
    return {
      weight,
      satisfaction: roundScore(satisfaction),
      contribution: roundScore(weight * satisfaction),
      criteriaCount: category === 'need' ? 0 : values.length,
    };
  };

  const breakdown: ScoreBreakdown = {
    income: scoreCategory('income'),
    household: scoreCategory('household'),
    need: scoreCategory('need'),
    situational: scoreCategory('situational'),
    geographic: scoreCategory('geographic'),
  };
  const total = SCORE_CATEGORIES.reduce((sum, c) => sum + breakdown[c].contribution, 0);

  const reasons = [
    ...(needMet ? [`Addresses your need for ${program.category} help`] : []),
    ...evaluations.map((e) => e.reason),
  ];

  return {
    status: 'scored',
    score: roundScore(Math.min(1, Math.max(0, total))),
    breakdown,
    evaluations,
    reasons,
  };
}
