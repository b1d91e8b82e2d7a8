import { z } from 'zod';
import { MAX_HOUSEHOLD_SIZE } from '@shared/constants';
import { moneyInputSchema } from '../profile';

export const benefitInputSchema = z
  .object({
    householdSize: z.number().int().min(1).max(MAX_HOUSEHOLD_SIZE),
    grossMonthlyIncome: moneyInputSchema,
    rent: moneyInputSchema.default(0),
    utilities: moneyInputSchema.default(0),
    hasElderlyOrDisabled: z.boolean().default(false),
  })
  .strict();

export type BenefitInput = z.infer<typeof benefitInputSchema>;

export function validateBenefitInput(
  input: unknown,
): { success: true; data: BenefitInput } | { success: false; error: string } {
  const result = benefitInputSchema.safeParse(input);
  if (!result.success) {
    return { success: false, error: result.error.message };
  }
  return { success: true, data: result.data };
}

export interface BenefitEligible {
  eligible: true;
  family: string;
  estimatedMonthly: number;
  maximumPossible: number;
  details: Record<string, number>;
  disclaimer: string;
}

export interface BenefitIneligible {
  eligible: false;
  family: string;
  reason: string;
  incomeLimit: number;
  yourIncome: number;
  disclaimer: string;
}

export type BenefitResult = BenefitEligible | BenefitIneligible;

/** Every benefit family implements this one contract. */
export type BenefitCalculator = (input: BenefitInput) => BenefitResult;
