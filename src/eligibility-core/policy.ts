import { z } from 'zod';
import type { SCORE_CATEGORIES } from '@shared/constants';

export type ScoreCategory = (typeof SCORE_CATEGORIES)[number];

export interface MatchingPolicy {
  weights: Record<ScoreCategory, number>;
  /** Income up to this percent of the ceiling still earns partial credit. */
  nearMissTolerancePct: number;
  /** Satisfaction given to income inside the near-miss band. */
  nearMissSatisfaction: number;
  /** Satisfaction given when the profile lacks the data a criterion needs. */
  neutralSatisfaction: number;
  /** Matches scoring below this are dropped from the ranked list. */
  minimumScore: number;
}

// Tolerance band and neutral value are pending product-owner confirmation.
export const DEFAULT_MATCHING_POLICY: MatchingPolicy = {
  weights: {
    income: 0.3,
    household: 0.2,
    need: 0.25,
    situational: 0.15,
    geographic: 0.1,
  },
  nearMissTolerancePct: 110,
  nearMissSatisfaction: 0.5,
  neutralSatisfaction: 0.5,
  minimumScore: 0.1,
};

const weight = z.number().min(0).max(1);

export const matchingPolicySchema = z.object({
  weights: z
    .object({
      income: weight,
      household: weight,
      need: weight,
      situational: weight,
      geographic: weight,
    })
    .refine((w) => Math.abs(Object.values(w).reduce((a, b) => a + b, 0) - 1) < 1e-9, {
      message: 'Category weights must sum to 1',
    }),
  nearMissTolerancePct: z.number().min(100).max(200),
  nearMissSatisfaction: z.number().min(0).max(1),
  neutralSatisfaction: z.number().min(0).max(1),
  minimumScore: z.number().min(0).max(1),
});

export function createMatchingPolicy(overrides: Partial<MatchingPolicy> = {}): MatchingPolicy {
  return matchingPolicySchema.parse({ ...DEFAULT_MATCHING_POLICY, ...overrides });
}
