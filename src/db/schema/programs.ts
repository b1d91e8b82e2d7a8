import { pgTable, serial, varchar, text, numeric, integer, boolean, timestamp } from 'drizzle-orm/pg-core';

export const programs = pgTable('programs', {
  id: serial('id').primaryKey(),
  programCode: varchar('program_code', { length: 50 }).unique(),
  programName: varchar('program_name', { length: 255 }).notNull(),
  category: varchar('category', { length: 100 }),
  description: text('description'),
  benefitAmountMin: numeric('benefit_amount_min', { precision: 10, scale: 2 }),
  benefitAmountMax: numeric('benefit_amount_max', { precision: 10, scale: 2 }),
  benefitFrequency: varchar('benefit_frequency', { length: 50 }),
  // Calculator key in the benefit registry, e.g. 'snap'
  benefitFamily: varchar('benefit_family', { length: 50 }),
  fplPercentage: integer('fpl_percentage'),
  applicationUrl: varchar('application_url', { length: 500 }),
  confidenceScore: numeric('confidence_score', { precision: 3, scale: 2 }).default('0.5'),
  isActive: boolean('is_active').default(true),
  isEmergency: boolean('is_emergency').default(false),
  servesCounty: varchar('serves_county', { length: 100 }).array(),
  servesState: varchar('serves_state', { length: 2 }).array(),
  contactPhone: varchar('contact_phone', { length: 50 }),
  createdAt: timestamp('created_at').defaultNow(),
  updatedAt: timestamp('updated_at').defaultNow(),
});
