import { describe, it, expect } from 'vitest';
import { deriveHouseholdFacts, validateProfile } from '@core/profile';
import { makeProfile } from './fixtures';

describe('validateProfile', () => {
  it('accepts a minimal profile and fills defaults', () => {
    const result = validateProfile({ householdSize: 2, state: 'fl' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.needs).toEqual([]);
      expect(result.data.state).toBe('FL');
      expect(result.data.monthlyIncome).toBeUndefined();
    }
  });

  it('keeps "prefer not to say" distinct from zero income', () => {
    const result = validateProfile({ householdSize: 1, monthlyIncome: null });
    expect(result.success && result.data.monthlyIncome).toBeNull();
  });

  it.each([
    ['negative income', { householdSize: 1, monthlyIncome: -5 }],
    ['zero household size', { householdSize: 0 }],
    ['oversized household', { householdSize: 21 }],
    ['fractional household size', { householdSize: 2.5 }],
    ['unknown need category', { householdSize: 1, needs: ['pets'] }],
    ['unknown field', { householdSize: 1, favoriteColor: 'blue' }],
    ['more members than household size', { householdSize: 1, members: [{ age: 30 }, { age: 4 }] }],
    ['negative rent', { householdSize: 1, shelterCosts: { rent: -1 } }],
  ])('rejects %s', (_label, input) => {
    expect(validateProfile(input).success).toBe(false);
  });
});

describe('deriveHouseholdFacts', () => {
  it('reads flags from a complete member list', () => {
    const facts = deriveHouseholdFacts(
      makeProfile({ householdSize: 2, members: [{ age: 35, isVeteran: true }, { age: 8 }] }),
    );
    expect(facts).toEqual({
      hasChildren: true,
      hasElderly: false,
      hasDisability: undefined,
      isVeteran: true,
      isPregnant: undefined,
      ages: [35, 8],
    });
  });

  it('cannot rule anything out from a partial member list', () => {
    const facts = deriveHouseholdFacts(makeProfile({ householdSize: 3, members: [{ age: 35 }] }));
    expect(facts.hasChildren).toBeUndefined();
    expect(facts.hasElderly).toBeUndefined();
  });

  it('lets explicit flags win over members', () => {
    const facts = deriveHouseholdFacts(
      makeProfile({ householdSize: 2, hasChildren: false, members: [{ age: 35 }, { age: 8 }] }),
    );
    expect(facts.hasChildren).toBe(false);
  });
});
