import type { BenefitRules } from '../catalog';
import { createSnapCalculator } from './snap';
import type { BenefitCalculator, BenefitInput, BenefitResult } from './types';

export type BenefitRegistry = ReadonlyMap<string, BenefitCalculator>;

export function createBenefitRegistry(rules: BenefitRules): BenefitRegistry {
  const registry = new Map<string, BenefitCalculator>();
  if (rules.snap) {
    registry.set('snap', createSnapCalculator(rules.snap));
  }
  return registry;
}

/** Adding a family is a registration, never a change to the scorer. */
export function registerCalculator(
  registry: BenefitRegistry,
  family: string,
  calculator: BenefitCalculator,
): BenefitRegistry {
  return new Map(registry).set(family.toLowerCase(), calculator);
}

/**
 * `null` means no calculator exists for the family: no estimate is
 * available, which is different from a zero benefit.
 */
export function estimateBenefit(
  registry: BenefitRegistry,
  family: string,
  input: BenefitInput,
): BenefitResult | null {
  const calculator = registry.get(family.toLowerCase());
  return calculator ? calculator(input) : null;
}
