// src/eligibility-core/benefits/snap.ts
// SNAP-style benefit estimate. Pure function: (input, rules) -> result.
// Simplified on purpose; the agency's own determination is authoritative.

import { z } from 'zod';
import { ESTIMATE_DISCLAIMER } from '@shared/constants';
import {
  applyRate,
  centsToDollars,
  formatUsd,
  toCents,
  toWholeDollars,
  type Cents,
} from '../money';
import type { BenefitCalculator, BenefitInput, BenefitResult } from './types';

// ── Rules (typed to match benefit-rules/snap.json) ───────────────────────────

const bySizeTable = z.record(z.string().regex(/^\d+$/), z.number().nonnegative());

export const snapRulesSchema = z
  .object({
    ruleId: z.string(),
    fiscalYear: z.string(),
    grossIncomeTest: z.object({
      thresholdPctFpl: z.number().positive(),
      monthlyLimitByHouseholdSize: bySizeTable,
    }),
    maxAllotments: z.object({ monthlyByHouseholdSize: bySizeTable }),
    standardDeduction: z.object({ byHouseholdSize: bySizeTable }),
    excessShelter: z.object({
      incomeMultiplier: z.number().min(0).max(1),
      cap: z.number().nonnegative(),
    }),
    benefitFormula: z.object({ contributionRate: z.number().min(0).max(1) }),
  })
  .superRefine((rules, ctx) => {
    const size = Object.keys(rules.maxAllotments.monthlyByHouseholdSize).length;
    const tables = {
      monthlyLimitByHouseholdSize: rules.grossIncomeTest.monthlyLimitByHouseholdSize,
      monthlyByHouseholdSize: rules.maxAllotments.monthlyByHouseholdSize,
      byHouseholdSize: rules.standardDeduction.byHouseholdSize,
    };
    for (const [name, table] of Object.entries(tables)) {
      for (let n = 1; n <= size; n++) {
        if (table[String(n)] === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${name} is missing household size ${n}`,
          });
        }
      }
    }
  });

export type SnapRules = z.infer<typeof snapRulesSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

function largestTabulatedSize(rules: SnapRules): number {
  return Object.keys(rules.maxAllotments.monthlyByHouseholdSize).length;
}

function lookup(table: Record<string, number>, size: number): Cents {
  return toCents(table[String(size)] ?? 0);
}

// ── Calculation ──────────────────────────────────────────────────────────────

export function estimateSnapBenefit(input: BenefitInput, rules: SnapRules): BenefitResult {
  const size = Math.min(input.householdSize, largestTabulatedSize(rules));
  const gross = toCents(input.grossMonthlyIncome);

  // Gross income test
  const incomeLimit = lookup(rules.grossIncomeTest.monthlyLimitByHouseholdSize, size);
  if (gross > incomeLimit) {
    return {
      eligible: false,
      family: 'snap',
      reason: `Income exceeds ${rules.grossIncomeTest.thresholdPctFpl}% of the Federal Poverty Level (${formatUsd(incomeLimit)}/month)`,
      incomeLimit: centsToDollars(incomeLimit),
      yourIncome: centsToDollars(gross),
      disclaimer: ESTIMATE_DISCLAIMER,
    };
  }

  // Standard deduction, floored at zero
  const standardDeduction = lookup(rules.standardDeduction.byHouseholdSize, size);
  const workingNet = Math.max(0, gross - standardDeduction);

  // Excess shelter deduction, capped unless elderly/disabled
  const shelterCosts = toCents(input.rent) + toCents(input.utilities);
  let shelterDeduction = Math.max(
    0,
    shelterCosts - applyRate(workingNet, rules.excessShelter.incomeMultiplier),
  );
  if (!input.hasElderlyOrDisabled) {
    shelterDeduction = Math.min(shelterDeduction, toCents(rules.excessShelter.cap));
  }

  const netIncome = Math.max(0, workingNet - shelterDeduction);

  // Benefit: max allotment less the expected household contribution
  const maxAllotment = lookup(rules.maxAllotments.monthlyByHouseholdSize, size);
  const contribution = applyRate(netIncome, rules.benefitFormula.contributionRate);
  const benefit = Math.min(maxAllotment, Math.max(0, maxAllotment - contribution));

  return {
    eligible: true,
    family: 'snap',
    estimatedMonthly: toWholeDollars(benefit),
    maximumPossible: centsToDollars(maxAllotment),
    details: {
      grossIncome: centsToDollars(gross),
      standardDeduction: centsToDollars(standardDeduction),
      shelterCosts: centsToDollars(shelterCosts),
      shelterDeduction: centsToDollars(shelterDeduction),
      netIncome: centsToDollars(netIncome),
    },
    disclaimer: ESTIMATE_DISCLAIMER,
  };
}

export function createSnapCalculator(rules: SnapRules): BenefitCalculator {
  return (input) => estimateSnapBenefit(input, rules);
}
