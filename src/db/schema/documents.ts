import { pgTable, serial, varchar, text, boolean, integer, jsonb, timestamp, primaryKey } from 'drizzle-orm/pg-core';
import { programs } from './programs';

export const documents = pgTable('documents', {
  id: serial('id').primaryKey(),
  documentName: varchar('document_name', { length: 255 }).notNull(),
  documentType: varchar('document_type', { length: 100 }),
  description: text('description'),
  howToObtain: text('how_to_obtain'),
  alternatives: text('alternatives').array(),
  isCommon: boolean('is_common').default(false),
  createdAt: timestamp('created_at').defaultNow(),
});

export const programDocuments = pgTable(
  'program_documents',
  {
    programId: integer('program_id')
      .notNull()
      .references(() => programs.id, { onDelete: 'cascade' }),
    documentId: integer('document_id')
      .notNull()
      .references(() => documents.id, { onDelete: 'cascade' }),
    isRequired: boolean('is_required').default(true),
    // { needsAny?, situationsAny?, flags? }; null means always needed
    condition: jsonb('condition'),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.programId, t.documentId] }),
  }),
);
