// src/db/catalog-repository.ts
// Reads the program catalog tables and maps them onto the same raw shape the
// pack loader validates, so both sources go through one set of schemas.

import { asc } from 'drizzle-orm';
import { buildCatalogSnapshot, type CatalogSnapshot, type PackManifest } from '@core/catalog';
import type { Database } from './connection';
import {
  documents,
  eligibilityCriteria,
  fplTables,
  incomeLimits,
  programDocuments,
  programs,
} from './schema/index';

export type ProgramRow = typeof programs.$inferSelect;
export type CriterionRow = typeof eligibilityCriteria.$inferSelect;
export type IncomeLimitRow = typeof incomeLimits.$inferSelect;
export type FplRow = typeof fplTables.$inferSelect;
export type DocumentRow = typeof documents.$inferSelect;
export type ProgramDocumentRow = typeof programDocuments.$inferSelect;

export interface CatalogRows {
  programs: ProgramRow[];
  criteria: CriterionRow[];
  incomeLimits: IncomeLimitRow[];
  fpl: FplRow[];
  documents: DocumentRow[];
  programDocuments: ProgramDocumentRow[];
}

// Columns are nullable; the catalog schemas use absent fields instead.
function opt<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

function optNumber(value: string | null): number | undefined {
  return value === null ? undefined : Number(value);
}

function groupBy<T>(rows: T[], key: (row: T) => number | null): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const row of rows) {
    const k = key(row);
    if (k === null) continue;
    const list = groups.get(k);
    if (list) list.push(row);
    else groups.set(k, [row]);
  }
  return groups;
}

function mapProgram(
  row: ProgramRow,
  criteria: CriterionRow[],
  limits: IncomeLimitRow[],
  docs: ProgramDocumentRow[],
): Record<string, unknown> {
  const hasRange = row.benefitAmountMin !== null || row.benefitAmountMax !== null || row.benefitFrequency !== null;

  return {
    id: row.programCode ?? String(row.id),
    name: row.programName,
    category: row.category,
    description: opt(row.description),
    criteria: criteria.map((c) => ({
      id: String(c.id),
      type: c.criterionType,
      name: c.criterionName ?? c.criterionType,
      value: c.criterionValue,
      isRequired: c.isRequired ?? true,
      notes: opt(c.notes),
    })),
    // Decimal strings stay strings; the resolver parses them exactly.
    incomeLimits: limits.map((l) => ({
      householdSize: l.householdSize,
      annualLimit: opt(l.annualLimit),
      monthlyLimit: opt(l.monthlyLimit),
      fplPercentage: opt(l.fplPercentage),
      effectiveDate: opt(l.effectiveDate),
      expirationDate: opt(l.expirationDate),
    })),
    fplPercentage: opt(row.fplPercentage),
    benefitRange: hasRange
      ? {
          min: optNumber(row.benefitAmountMin),
          max: optNumber(row.benefitAmountMax),
          frequency: opt(row.benefitFrequency),
        }
      : undefined,
    benefitFamily: opt(row.benefitFamily),
    servesCounties: row.servesCounty ?? [],
    servesStates: row.servesState ?? [],
    isEmergency: row.isEmergency ?? false,
    isActive: row.isActive ?? true,
    confidenceScore: optNumber(row.confidenceScore),
    documents: docs.map((d) => ({
      documentId: String(d.documentId),
      isRequired: d.isRequired ?? true,
      condition: d.condition ?? undefined,
    })),
    applicationUrl: opt(row.applicationUrl),
    contactPhone: opt(row.contactPhone),
  };
}

export function assembleCatalog(rows: CatalogRows, manifest: PackManifest): CatalogSnapshot {
  const criteriaByProgram = groupBy(rows.criteria, (c) => c.programId);
  const limitsByProgram = groupBy(rows.incomeLimits, (l) => l.programId);
  const docsByProgram = groupBy(rows.programDocuments, (d) => d.programId);

  return buildCatalogSnapshot({
    meta: manifest.meta,
    benefitRules: manifest.benefitRules,
    programs: rows.programs.map((p) =>
      mapProgram(
        p,
        criteriaByProgram.get(p.id) ?? [],
        limitsByProgram.get(p.id) ?? [],
        docsByProgram.get(p.id) ?? [],
      ),
    ),
    documents: rows.documents.map((d) => ({
      id: String(d.id),
      name: d.documentName,
      type: d.documentType,
      description: opt(d.description),
      howToObtain: opt(d.howToObtain),
      alternatives: d.alternatives ?? [],
    })),
    fpl: rows.fpl.map((f) => ({
      year: f.year,
      householdSize: f.householdSize,
      state: f.state ?? 'FL',
      annualAmount: f.annualAmount,
      monthlyAmount: f.monthlyAmount,
    })),
  });
}

export async function loadCatalogFromDatabase(
  db: Database,
  manifest: PackManifest,
): Promise<CatalogSnapshot> {
  const [programRows, criteria, limits, fpl, documentRows, links] = await Promise.all([
    db.select().from(programs).orderBy(asc(programs.id)),
    db.select().from(eligibilityCriteria).orderBy(asc(eligibilityCriteria.id)),
    db.select().from(incomeLimits).orderBy(asc(incomeLimits.id)),
    db.select().from(fplTables),
    db.select().from(documents).orderBy(asc(documents.id)),
    db.select().from(programDocuments),
  ]);

  return assembleCatalog(
    {
      programs: programRows,
      criteria,
      incomeLimits: limits,
      fpl,
      documents: documentRows,
      programDocuments: links,
    },
    manifest,
  );
}
