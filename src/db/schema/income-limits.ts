import { pgTable, serial, integer, numeric, date, timestamp, unique } from 'drizzle-orm/pg-core';
import { programs } from './programs';

export const incomeLimits = pgTable(
  'income_limits',
  {
    id: serial('id').primaryKey(),
    programId: integer('program_id').references(() => programs.id, { onDelete: 'cascade' }),
    householdSize: integer('household_size').notNull(),
    annualLimit: numeric('annual_limit', { precision: 10, scale: 2 }),
    monthlyLimit: numeric('monthly_limit', { precision: 10, scale: 2 }),
    fplPercentage: integer('fpl_percentage'),
    effectiveDate: date('effective_date'),
    expirationDate: date('expiration_date'),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (t) => ({
    sizePerPeriod: unique().on(t.programId, t.householdSize, t.effectiveDate),
  }),
);
