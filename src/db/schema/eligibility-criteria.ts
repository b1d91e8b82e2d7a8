import { pgTable, serial, integer, varchar, jsonb, boolean, text, timestamp } from 'drizzle-orm/pg-core';
import { programs } from './programs';

export const eligibilityCriteria = pgTable('eligibility_criteria', {
  id: serial('id').primaryKey(),
  programId: integer('program_id').references(() => programs.id, { onDelete: 'cascade' }),
  criterionType: varchar('criterion_type', { length: 50 }),
  criterionName: varchar('criterion_name', { length: 100 }),
  criterionValue: jsonb('criterion_value'),
  isRequired: boolean('is_required').default(true),
  notes: text('notes'),
  createdAt: timestamp('created_at').defaultNow(),
});
