// tests/eligibility-core/criteria.test.ts
import { describe, it, expect } from 'vitest';
import type { EligibilityCriterion, Program } from '@core/catalog';
import { evaluateCriterion, satisfactionFor, type EvaluationContext } from '@core/criteria';
import { DEFAULT_MATCHING_POLICY, createMatchingPolicy } from '@core/policy';
import { deriveHouseholdFacts } from '@core/profile';
import { AS_OF, FL_FPL, makeProgram, makeProfile } from './fixtures';

function ctx(profileOverrides: Record<string, unknown> = {}, program: Program = makeProgram()): EvaluationContext {
  const profile = makeProfile(profileOverrides);
  return {
    program,
    profile,
    facts: deriveHouseholdFacts(profile),
    fpl: FL_FPL,
    asOf: AS_OF,
    policy: DEFAULT_MATCHING_POLICY,
  };
}

function criterion(type: EligibilityCriterion['type'], value: unknown, name = 'Rule'): EligibilityCriterion {
  return { type, name, value, isRequired: true };
}

function evaluate(c: EligibilityCriterion, context: EvaluationContext) {
  const result = evaluateCriterion(c, context);
  if (!result.ok) throw new Error(result.error);
  return result.evaluation;
}

// ── Income ───────────────────────────────────────────────────────────────────

describe('income criterion', () => {
  const limited = makeProgram({ incomeLimits: [{ householdSize: 3, monthlyLimit: '2694.00' }] });
  const income = criterion('income', null, 'Income limit');

  it('is fully satisfied at or below the ceiling', () => {
    const evaluation = evaluate(income, ctx({ householdSize: 3, monthlyIncome: 2000 }, limited));
    expect(evaluation.outcome).toBe('met');
    expect(evaluation.satisfaction).toBe(1);
    expect(evaluation.reason).toBe('Monthly income $2,000.00 is within the $2,694.00 limit');
  });

  it('is satisfied exactly at the ceiling', () => {
    const evaluation = evaluate(income, ctx({ householdSize: 3, monthlyIncome: 2694 }, limited));
    expect(evaluation.satisfaction).toBe(1);
  });

  it('never increases as income rises below the ceiling', () => {
    const values = [0, 500, 1999.99, 2694].map(
      (monthlyIncome) => evaluate(income, ctx({ householdSize: 3, monthlyIncome }, limited)).satisfaction,
    );
    expect(values).toEqual([1, 1, 1, 1]);
  });

  it('gives near-miss credit at 105% of the ceiling', () => {
    const evaluation = evaluate(income, ctx({ householdSize: 3, monthlyIncome: 2828.7 }, limited));
    expect(evaluation.outcome).toBe('partial');
    expect(evaluation.satisfaction).toBe(0.5);
  });

  it('includes the upper edge of the near-miss band', () => {
    const evaluation = evaluate(income, ctx({ householdSize: 3, monthlyIncome: 2963.4 }, limited));
    expect(evaluation.outcome).toBe('partial');
  });

  it('gives no credit at 111% of the ceiling', () => {
    const evaluation = evaluate(income, ctx({ householdSize: 3, monthlyIncome: 2990.34 }, limited));
    expect(evaluation.outcome).toBe('unmet');
    expect(evaluation.satisfaction).toBe(0);
    expect(evaluation.reason).toBe('Monthly income $2,990.34 exceeds the $2,694.00 limit');
  });

  it('is neutral when income was not disclosed', () => {
    for (const monthlyIncome of [undefined, null]) {
      const evaluation = evaluate(income, ctx({ householdSize: 3, monthlyIncome }, limited));
      expect(evaluation.outcome).toBe('unknown');
      expect(evaluation.satisfaction).toBe(0.5);
    }
  });

  it('is met when the program has no income requirement', () => {
    const evaluation = evaluate(income, ctx({ monthlyIncome: 9000 }));
    expect(evaluation.outcome).toBe('met');
    expect(evaluation.reason).toBe('No income limit applies');
  });

  it('is neutral when the program lists no limit for the household size', () => {
    const evaluation = evaluate(income, ctx({ householdSize: 4, monthlyIncome: 9000 }, limited));
    expect(evaluation.outcome).toBe('unknown');
    expect(evaluation.satisfaction).toBe(0.5);
    expect(evaluation.reason).toBe(
      'Income limit could not be resolved: No income limit listed for a household of 4 on 2024-06-01',
    );
  });

  it('resolves a criterion-level FPL percentage', () => {
    const evaluation = evaluate(
      criterion('income', { fpl_percentage: 100 }),
      ctx({ householdSize: 1, monthlyIncome: 1300 }),
    );
    // 100% FPL for one person is $1,255.00; $1,300 is within the 110% band
    expect(evaluation.outcome).toBe('partial');
  });
});

// ── Household ────────────────────────────────────────────────────────────────

describe('household criterion', () => {
  const needsChildren = criterion('household', { has_children: true });

  it('is met, unmet or unknown depending on what the profile states', () => {
    expect(evaluate(needsChildren, ctx({ householdSize: 2, hasChildren: true })).satisfaction).toBe(1);
    expect(evaluate(needsChildren, ctx({ householdSize: 2, hasChildren: false })).satisfaction).toBe(0);
    expect(evaluate(needsChildren, ctx({ householdSize: 2 })).satisfaction).toBe(0.5);
  });

  it('reads children from a complete member list', () => {
    const evaluation = evaluate(
      needsChildren,
      ctx({ householdSize: 2, members: [{ age: 34 }, { age: 6 }] }),
    );
    expect(evaluation.outcome).toBe('met');
  });

  it('stays unknown when only some members are listed', () => {
    const evaluation = evaluate(needsChildren, ctx({ householdSize: 3, members: [{ age: 34 }] }));
    expect(evaluation.outcome).toBe('unknown');
  });

  it('checks size bounds', () => {
    const bounded = criterion('household', { min_size: 4, max_size: 6 });
    expect(evaluate(bounded, ctx({ householdSize: 3 })).outcome).toBe('unmet');
    expect(evaluate(bounded, ctx({ householdSize: 5 })).outcome).toBe('met');
  });

  it('lets a definite miss outweigh an unknown', () => {
    const both = criterion('household', { has_children: true, min_size: 4 });
    expect(evaluate(both, ctx({ householdSize: 2 })).outcome).toBe('unmet');
  });
});

// ── Categorical ──────────────────────────────────────────────────────────────

describe('categorical criterion', () => {
  it('is binary: an unstated status scores zero', () => {
    const veteran = criterion('categorical', { status: 'veteran' });
    expect(evaluate(veteran, ctx({ isVeteran: true })).satisfaction).toBe(1);
    expect(evaluate(veteran, ctx({})).satisfaction).toBe(0);
    expect(evaluate(veteran, ctx({})).reason).toBe('Requires veteran');
  });

  it('accepts any of several statuses', () => {
    const agedOrDisabled = criterion('categorical', { any_of: ['elderly', 'disability'] });
    expect(evaluate(agedOrDisabled, ctx({ hasDisability: true })).outcome).toBe('met');
  });

  it('checks a minimum age against member ages', () => {
    const senior = criterion('categorical', { min_age: 60 });
    expect(
      evaluate(senior, ctx({ householdSize: 2, members: [{ age: 65 }, { age: 30 }] })).outcome,
    ).toBe('met');
    expect(evaluate(senior, ctx({ members: [{ age: 30 }] })).outcome).toBe('unmet');
  });

  it('falls back to the elderly flag when no ages are given', () => {
    const senior = criterion('categorical', { min_age: 60 });
    expect(evaluate(senior, ctx({ hasElderly: true })).outcome).toBe('met');
  });
});

// ── Geographic ───────────────────────────────────────────────────────────────

describe('geographic criterion', () => {
  const brevard = criterion('geographic', { counties: ['Brevard'] });

  it('matches counties case-insensitively', () => {
    expect(evaluate(brevard, ctx({ county: 'brevard' })).outcome).toBe('met');
    expect(evaluate(brevard, ctx({ county: 'Orange' })).outcome).toBe('unmet');
  });

  it('is unknown without a location', () => {
    expect(evaluate(brevard, ctx({})).satisfaction).toBe(0.5);
  });

  it('falls back to the program service area', () => {
    const program = makeProgram({ servesStates: ['FL'] });
    const evaluation = evaluate(criterion('geographic', null), ctx({ state: 'fl' }, program));
    expect(evaluation.outcome).toBe('met');
    expect(evaluation.reason).toBe('Serves your area (FL)');
  });

  it('accepts a served county when no state is given', () => {
    const program = makeProgram({ servesCounties: ['Brevard'], servesStates: ['FL'] });
    const evaluation = evaluate(criterion('geographic', null), ctx({ county: 'Brevard' }, program));
    expect(evaluation.outcome).toBe('met');
    expect(evaluation.reason).toBe('Serves your area (Brevard, FL)');
  });

  it('still checks the state when one is given alongside a served county', () => {
    const program = makeProgram({ servesCounties: ['Brevard'], servesStates: ['FL'] });
    const evaluation = evaluate(criterion('geographic', null), ctx({ county: 'Brevard', state: 'GA' }, program));
    expect(evaluation.outcome).toBe('unmet');
  });

  it('is met everywhere when the scope is empty', () => {
    const evaluation = evaluate(criterion('geographic', null), ctx({ county: 'Orange' }));
    expect(evaluation.reason).toBe('Available in all areas');
  });
});

// ── Situational ──────────────────────────────────────────────────────────────

describe('situational criterion', () => {
  const eviction = criterion('situational', { situations: ['eviction', 'homelessness'] });

  it('is met when a stated crisis overlaps', () => {
    const evaluation = evaluate(eviction, ctx({ situations: ['eviction'] }));
    expect(evaluation.satisfaction).toBe(1);
    expect(evaluation.reason).toBe('Helps with your situation: eviction');
  });

  it('distinguishes no crisis from an unanswered question', () => {
    expect(evaluate(eviction, ctx({ situations: [] })).satisfaction).toBe(0);
    expect(evaluate(eviction, ctx({})).satisfaction).toBe(0.5);
  });
});

// ── Malformed values ─────────────────────────────────────────────────────────

describe('malformed criterion values', () => {
  it('returns an error naming the criterion', () => {
    const result = evaluateCriterion(criterion('household', {}, 'Kids at home'), ctx());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(
        'Kids at home: Malformed household criterion value: household criterion needs at least one predicate',
      );
    }
  });

  it('rejects a value of the wrong shape', () => {
    const result = evaluateCriterion(criterion('situational', { situations: ['alien_invasion'] }), ctx());
    expect(result.ok).toBe(false);
  });
});

describe('satisfactionFor', () => {
  it('follows the configured neutral and near-miss values', () => {
    const policy = createMatchingPolicy({ neutralSatisfaction: 0.4, nearMissSatisfaction: 0.6 });
    expect(satisfactionFor('unknown', policy)).toBe(0.4);
    expect(satisfactionFor('partial', policy)).toBe(0.6);
    expect(satisfactionFor('met', policy)).toBe(1);
    expect(satisfactionFor('unmet', policy)).toBe(0);
  });
});
