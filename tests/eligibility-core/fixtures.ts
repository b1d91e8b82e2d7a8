// Shared builders for eligibility-core tests.
import {
  documentRecordSchema,
  programSchema,
  type DocumentRecord,
  type FplReference,
  type Program,
} from '@core/catalog';
import { userProfileSchema, type UserProfile } from '@core/profile';

// 2024 poverty guidelines, 48 states
const FL_2024_ANNUAL = ['15060', '20440', '25820', '31200', '36580', '41960', '47340', '52720'];

export const FL_FPL: FplReference = {
  defaultState: 'FL',
  entries: FL_2024_ANNUAL.map((annual, i) => ({
    year: 2024,
    householdSize: i + 1,
    state: 'FL',
    annualAmount: `${annual}.00`,
    monthlyAmount: '0',
  })),
};

export const AS_OF = new Date('2024-06-01T00:00:00Z');

export function makeProgram(overrides: Record<string, unknown> = {}): Program {
  return programSchema.parse({
    id: 'test-program',
    name: 'Test Program',
    category: 'food',
    ...overrides,
  });
}

export function makeProfile(overrides: Record<string, unknown> = {}): UserProfile {
  return userProfileSchema.parse({ householdSize: 1, ...overrides });
}

export function makeDocument(overrides: Record<string, unknown>): DocumentRecord {
  return documentRecordSchema.parse({ name: 'Document', type: 'other', ...overrides });
}
