import { pgTable, serial, integer, numeric, varchar, timestamp, unique } from 'drizzle-orm/pg-core';

export const fplTables = pgTable(
  'fpl_tables',
  {
    id: serial('id').primaryKey(),
    year: integer('year').notNull(),
    householdSize: integer('household_size').notNull(),
    annualAmount: numeric('annual_amount', { precision: 10, scale: 2 }).notNull(),
    monthlyAmount: numeric('monthly_amount', { precision: 10, scale: 2 }).notNull(),
    // AK and HI publish their own tables
    state: varchar('state', { length: 2 }).default('FL'),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (t) => ({
    yearSizeState: unique().on(t.year, t.householdSize, t.state),
  }),
);
