import { z } from 'zod';
import {
  ADULT_AGE,
  CRISIS_SITUATIONS,
  ELDERLY_AGE,
  MAX_HOUSEHOLD_SIZE,
  PROGRAM_CATEGORIES,
} from '@shared/constants';
import { parseScaled } from './money';

export const MAX_MONTHLY_AMOUNT = 10_000_000;

export const moneyInputSchema = z
  .number()
  .finite()
  .nonnegative()
  .max(MAX_MONTHLY_AMOUNT)
  .refine((n) => parseScaled(n, 2) !== null, { message: 'Must be a plain decimal amount' });

export const householdMemberSchema = z.object({
  age: z.number().int().min(0).max(120).optional(),
  isPregnant: z.boolean().optional(),
  isDisabled: z.boolean().optional(),
  isVeteran: z.boolean().optional(),
});

export const userProfileSchema = z
  .object({
    householdSize: z.number().int().min(1).max(MAX_HOUSEHOLD_SIZE),
    // null or absent: the person preferred not to say. Never read as zero.
    monthlyIncome: moneyInputSchema.nullable().optional(),
    members: z.array(householdMemberSchema).optional(),
    hasChildren: z.boolean().optional(),
    hasElderly: z.boolean().optional(),
    hasDisability: z.boolean().optional(),
    isVeteran: z.boolean().optional(),
    isPregnant: z.boolean().optional(),
    county: z.string().trim().min(1).optional(),
    state: z
      .string()
      .trim()
      .length(2)
      .transform((s) => s.toUpperCase())
      .optional(),
    needs: z.array(z.enum(PROGRAM_CATEGORIES)).default([]),
    situations: z.array(z.enum(CRISIS_SITUATIONS)).optional(),
    shelterCosts: z
      .object({
        rent: moneyInputSchema.default(0),
        utilities: moneyInputSchema.default(0),
      })
      .optional(),
  })
  .strict()
  .superRefine((profile, ctx) => {
    if (profile.members && profile.members.length > profile.householdSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['members'],
        message: `members lists ${profile.members.length} people but householdSize is ${profile.householdSize}`,
      });
    }
  });

export type HouseholdMember = z.infer<typeof householdMemberSchema>;
export type UserProfile = Readonly<z.infer<typeof userProfileSchema>>;

export function validateProfile(
  input: unknown,
): { success: true; data: UserProfile } | { success: false; error: string } {
  const result = userProfileSchema.safeParse(input);
  if (!result.success) {
    return { success: false, error: result.error.message };
  }
  return { success: true, data: result.data };
}

// --- Derived facts ---

/** `undefined` means the profile does not say. */
export interface HouseholdFacts {
  hasChildren: boolean | undefined;
  hasElderly: boolean | undefined;
  hasDisability: boolean | undefined;
  isVeteran: boolean | undefined;
  isPregnant: boolean | undefined;
  ages: number[];
}

// A "no" needs an answer for every household member, not just those listed.
function fromMembers(
  profile: UserProfile,
  test: (m: HouseholdMember) => boolean | undefined,
): boolean | undefined {
  const members = profile.members;
  if (!members || members.length === 0) return undefined;
  const answers = members.map(test);
  if (answers.some((a) => a === true)) return true;
  if (members.length === profile.householdSize && answers.every((a) => a === false)) {
    return false;
  }
  return undefined;
}

/** Explicit aggregate flags win over what can be read off the member list. */
export function deriveHouseholdFacts(profile: UserProfile): HouseholdFacts {
  const byAge = (predicate: (age: number) => boolean) => (m: HouseholdMember) =>
    m.age === undefined ? undefined : predicate(m.age);

  return {
    hasChildren: profile.hasChildren ?? fromMembers(profile, byAge((age) => age < ADULT_AGE)),
    hasElderly: profile.hasElderly ?? fromMembers(profile, byAge((age) => age >= ELDERLY_AGE)),
    hasDisability: profile.hasDisability ?? fromMembers(profile, (m) => m.isDisabled),
    isVeteran: profile.isVeteran ?? fromMembers(profile, (m) => m.isVeteran),
    isPregnant: profile.isPregnant ?? fromMembers(profile, (m) => m.isPregnant),
    ages: (profile.members ?? []).flatMap((m) => (m.age === undefined ? [] : [m.age])),
  };
}
