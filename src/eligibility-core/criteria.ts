// src/eligibility-core/criteria.ts
// Criterion evaluator: one structured criterion against one profile, yielding
// a satisfaction in [0, 1] rather than a pass/fail.

import { z } from 'zod';
import {
  ADULT_AGE,
  CATEGORICAL_STATUSES,
  CRISIS_SITUATIONS,
  ELDERLY_AGE,
} from '@shared/constants';
import type { EligibilityCriterion, FplReference, Program } from './catalog';
import { resolveIncomeLimit } from './income-limits';
import { formatUsd, percentToBasisPoints, toCents } from './money';
import type { MatchingPolicy } from './policy';
import type { HouseholdFacts, UserProfile } from './profile';

// ── Types ────────────────────────────────────────────────────────────────────

export type CategoricalStatus = (typeof CATEGORICAL_STATUSES)[number];

/** `unknown` is missing profile data; only `unmet` can trip a hard gate. */
export type CriterionOutcome = 'met' | 'partial' | 'unknown' | 'unmet';

export interface CriterionEvaluation {
  criterionName: string;
  type: EligibilityCriterion['type'];
  isRequired: boolean;
  outcome: CriterionOutcome;
  satisfaction: number;
  reason: string;
}

export type EvaluationResult =
  | { ok: true; evaluation: CriterionEvaluation }
  | { ok: false; error: string };

export interface EvaluationContext {
  program: Program;
  profile: UserProfile;
  facts: HouseholdFacts;
  fpl: FplReference;
  asOf: Date;
  policy: MatchingPolicy;
}

interface Verdict {
  outcome: CriterionOutcome;
  reason: string;
}

type Evaluator = (value: unknown, ctx: EvaluationContext) => Verdict | { error: string };

// ── Value schemas ────────────────────────────────────────────────────────────

const incomeValueSchema = z
  .object({ fpl_percentage: z.number().positive().optional() })
  .nullish();

const householdValueSchema = z
  .object({
    has_children: z.boolean().optional(),
    min_size: z.number().int().positive().optional(),
    max_size: z.number().int().positive().optional(),
  })
  .refine((v) => Object.values(v).some((x) => x !== undefined), {
    message: 'household criterion needs at least one predicate',
  });

const categoricalValueSchema = z
  .object({
    status: z.enum(CATEGORICAL_STATUSES).optional(),
    any_of: z.array(z.enum(CATEGORICAL_STATUSES)).min(1).optional(),
    min_age: z.number().int().min(0).optional(),
    max_age: z.number().int().min(0).optional(),
  })
  .refine((v) => Object.values(v).some((x) => x !== undefined), {
    message: 'categorical criterion needs a status or an age bound',
  });

const geographicValueSchema = z
  .object({
    counties: z.array(z.string()).optional(),
    states: z.array(z.string()).optional(),
  })
  .nullish();

const situationalValueSchema = z.object({
  situations: z.array(z.enum(CRISIS_SITUATIONS)).min(1),
});

function parseValue<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  type: string,
): { data: z.infer<S> } | { error: string } {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { error: `Malformed ${type} criterion value: ${result.error.issues.map((i) => i.message).join('; ')}` };
  }
  return { data: result.data };
}

// ── Combining predicates ─────────────────────────────────────────────────────

function combine(answers: (boolean | undefined)[]): CriterionOutcome {
  if (answers.some((a) => a === false)) return 'unmet';
  if (answers.some((a) => a === undefined)) return 'unknown';
  return 'met';
}

// ── Evaluators ───────────────────────────────────────────────────────────────

const evaluateIncome: Evaluator = (value, ctx) => {
  const parsed = parseValue(incomeValueSchema, value, 'income');
  if ('error' in parsed) return parsed;

  const resolution = resolveIncomeLimit(
    ctx.program,
    ctx.profile.householdSize,
    ctx.asOf,
    ctx.fpl,
    { state: ctx.profile.state, fplPercentage: parsed.data?.fpl_percentage },
  );
  if (!resolution.ok) return { error: resolution.error };

  if (resolution.status === 'not_required') {
    return { outcome: 'met', reason: 'No income limit applies' };
  }
  if (resolution.status === 'unresolved') {
    return { outcome: 'unknown', reason: `Income limit could not be resolved: ${resolution.reason}` };
  }
  const ceiling = resolution.ceiling;

  const limit = formatUsd(ceiling.monthly);
  const income = ctx.profile.monthlyIncome;
  if (income === undefined || income === null) {
    return { outcome: 'unknown', reason: `Income not provided; the limit is ${limit}/month` };
  }

  const incomeCents = toCents(income);
  const shown = formatUsd(incomeCents);
  if (incomeCents <= ceiling.monthly) {
    return { outcome: 'met', reason: `Monthly income ${shown} is within the ${limit} limit` };
  }

  // income <= ceiling x tolerance, compared in exact integers
  const toleranceBp = percentToBasisPoints(ctx.policy.nearMissTolerancePct);
  if (incomeCents * 10_000 <= ceiling.monthly * toleranceBp) {
    return {
      outcome: 'partial',
      reason: `Monthly income ${shown} is slightly above the ${limit} limit`,
    };
  }

  return { outcome: 'unmet', reason: `Monthly income ${shown} exceeds the ${limit} limit` };
};

const evaluateHousehold: Evaluator = (value, ctx) => {
  const parsed = parseValue(householdValueSchema, value, 'household');
  if ('error' in parsed) return parsed;
  const rule = parsed.data;
  const size = ctx.profile.householdSize;

  const answers: (boolean | undefined)[] = [];
  const notes: string[] = [];

  if (rule.has_children !== undefined) {
    const has = ctx.facts.hasChildren;
    answers.push(has === undefined ? undefined : has === rule.has_children);
    notes.push(rule.has_children ? 'children in the household' : 'no children in the household');
  }
  if (rule.min_size !== undefined) {
    answers.push(size >= rule.min_size);
    notes.push(`at least ${rule.min_size} people`);
  }
  if (rule.max_size !== undefined) {
    answers.push(size <= rule.max_size);
    notes.push(`at most ${rule.max_size} people`);
  }

  const outcome = combine(answers);
  const requirement = notes.join(', ');
  const reason =
    outcome === 'met'
      ? `Household meets: ${requirement}`
      : outcome === 'unknown'
        ? `Household composition not provided (requires ${requirement})`
        : `Household does not meet: ${requirement}`;
  return { outcome, reason };
};

function statusFlag(status: CategoricalStatus, facts: HouseholdFacts): boolean {
  switch (status) {
    case 'elderly':
      return facts.hasElderly === true;
    case 'veteran':
      return facts.isVeteran === true;
    case 'disability':
      return facts.hasDisability === true;
    case 'pregnant':
      return facts.isPregnant === true;
  }
}

// Binary legal statuses: anything short of a stated match scores zero.
const evaluateCategorical: Evaluator = (value, ctx) => {
  const parsed = parseValue(categoricalValueSchema, value, 'categorical');
  if ('error' in parsed) return parsed;
  const rule = parsed.data;
  const { facts } = ctx;

  const checks: { passed: boolean; label: string }[] = [];

  const statuses = [...(rule.status ? [rule.status] : []), ...(rule.any_of ?? [])];
  if (statuses.length > 0) {
    checks.push({
      passed: statuses.some((s) => statusFlag(s, facts)),
      label: statuses.join(' or '),
    });
  }
  if (rule.min_age !== undefined) {
    const minAge = rule.min_age;
    const passed =
      facts.ages.length > 0
        ? facts.ages.some((age) => age >= minAge)
        : minAge <= ELDERLY_AGE && facts.hasElderly === true;
    checks.push({ passed, label: `a member aged ${minAge}+` });
  }
  if (rule.max_age !== undefined) {
    const maxAge = rule.max_age;
    const passed =
      facts.ages.length > 0
        ? facts.ages.some((age) => age <= maxAge)
        : maxAge >= ADULT_AGE - 1 && facts.hasChildren === true;
    checks.push({ passed, label: `a member aged ${maxAge} or under` });
  }

  const missing = checks.filter((c) => !c.passed).map((c) => c.label);
  if (missing.length === 0) {
    return { outcome: 'met', reason: `Household includes ${checks.map((c) => c.label).join(' and ')}` };
  }
  return { outcome: 'unmet', reason: `Requires ${missing.join(' and ')}` };
};

function normalizePlace(place: string): string {
  return place.trim().toLowerCase();
}

// An empty scope means the program serves everywhere.
const evaluateGeographic: Evaluator = (value, ctx) => {
  const parsed = parseValue(geographicValueSchema, value, 'geographic');
  if ('error' in parsed) return parsed;

  const counties = parsed.data?.counties ?? ctx.program.servesCounties;
  const states = parsed.data?.states ?? ctx.program.servesStates;
  const answers: (boolean | undefined)[] = [];

  const county = ctx.profile.county;
  const countyServed =
    county === undefined ? undefined : counties.map(normalizePlace).includes(normalizePlace(county));
  if (counties.length > 0) answers.push(countyServed);

  if (states.length > 0) {
    const state = ctx.profile.state;
    // A served county already places the person inside the program's states
    if (state !== undefined) {
      answers.push(states.map(normalizePlace).includes(normalizePlace(state)));
    } else if (countyServed !== true) {
      answers.push(undefined);
    }
  }

  if (answers.length === 0) {
    return { outcome: 'met', reason: 'Available in all areas' };
  }

  const outcome = combine(answers);
  const area = [...counties, ...states].join(', ');
  const reason =
    outcome === 'met'
      ? `Serves your area (${area})`
      : outcome === 'unknown'
        ? `Location not provided; serves ${area}`
        : `Only serves ${area}`;
  return { outcome, reason };
};

const evaluateSituational: Evaluator = (value, ctx) => {
  const parsed = parseValue(situationalValueSchema, value, 'situational');
  if ('error' in parsed) return parsed;
  const triggers = parsed.data.situations;
  const situations = ctx.profile.situations;

  if (situations === undefined) {
    return { outcome: 'unknown', reason: `No situation information; helps with ${triggers.join(', ')}` };
  }

  const shared = triggers.filter((s) => situations.includes(s));
  if (shared.length > 0) {
    return { outcome: 'met', reason: `Helps with your situation: ${shared.join(', ')}` };
  }
  return { outcome: 'unmet', reason: `Intended for: ${triggers.join(', ')}` };
};

const EVALUATORS: Record<EligibilityCriterion['type'], Evaluator> = {
  income: evaluateIncome,
  household: evaluateHousehold,
  categorical: evaluateCategorical,
  geographic: evaluateGeographic,
  situational: evaluateSituational,
};

// ── Entry point ──────────────────────────────────────────────────────────────

export function satisfactionFor(outcome: CriterionOutcome, policy: MatchingPolicy): number {
  switch (outcome) {
    case 'met':
      return 1;
    case 'unmet':
      return 0;
    case 'partial':
      return policy.nearMissSatisfaction;
    case 'unknown':
      return policy.neutralSatisfaction;
  }
}

export function evaluateCriterion(
  criterion: EligibilityCriterion,
  ctx: EvaluationContext,
): EvaluationResult {
  const verdict = EVALUATORS[criterion.type](criterion.value, ctx);
  if ('error' in verdict) {
    return { ok: false, error: `${criterion.name}: ${verdict.error}` };
  }

  return {
    ok: true,
    evaluation: {
      criterionName: criterion.name,
      type: criterion.type,
      isRequired: criterion.isRequired,
      outcome: verdict.outcome,
      satisfaction: satisfactionFor(verdict.outcome, ctx.policy),
      reason: verdict.reason,
    },
  };
}
