import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  BENEFIT_FREQUENCIES,
  CRISIS_SITUATIONS,
  CRITERION_TYPES,
  DOCUMENT_TYPES,
  PROGRAM_CATEGORIES,
} from '@shared/constants';
import { snapRulesSchema, type SnapRules } from './benefits/snap';

// --- Schemas ---

const amountSchema = z.union([z.number(), z.string()]);

export const criterionSchema = z.object({
  id: z.string().optional(),
  type: z.enum(CRITERION_TYPES),
  name: z.string().min(1),
  // Parsed per criterion type when the program is scored.
  value: z.unknown(),
  isRequired: z.boolean().default(true),
  notes: z.string().optional(),
});

export const incomeLimitSchema = z.object({
  // Range-checked by the income limit resolver; a bad row excludes only its program.
  householdSize: z.number(),
  annualLimit: amountSchema.optional(),
  monthlyLimit: amountSchema.optional(),
  fplPercentage: z.number().optional(),
  effectiveDate: z.string().optional(),
  expirationDate: z.string().optional(),
});

export const activationConditionSchema = z.object({
  needsAny: z.array(z.enum(PROGRAM_CATEGORIES)).optional(),
  situationsAny: z.array(z.enum(CRISIS_SITUATIONS)).optional(),
  flags: z
    .object({
      hasChildren: z.boolean().optional(),
      hasElderly: z.boolean().optional(),
      hasDisability: z.boolean().optional(),
      isVeteran: z.boolean().optional(),
      isPregnant: z.boolean().optional(),
    })
    .optional(),
});

export const documentRequirementSchema = z.object({
  documentId: z.string().min(1),
  isRequired: z.boolean().default(true),
  condition: activationConditionSchema.optional(),
});

export const programSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(PROGRAM_CATEGORIES),
  description: z.string().optional(),
  criteria: z.array(criterionSchema).default([]),
  incomeLimits: z.array(incomeLimitSchema).default([]),
  fplPercentage: z.number().positive().optional(),
  benefitRange: z
    .object({
      min: z.number().nonnegative().optional(),
      max: z.number().nonnegative().optional(),
      frequency: z.enum(BENEFIT_FREQUENCIES).optional(),
    })
    .optional(),
  benefitFamily: z.string().optional(),
  servesCounties: z.array(z.string()).default([]),
  servesStates: z.array(z.string()).default([]),
  isEmergency: z.boolean().default(false),
  isActive: z.boolean().default(true),
  confidenceScore: z.number().min(0).max(1).default(0.5),
  documents: z.array(documentRequirementSchema).default([]),
  applicationUrl: z.string().optional(),
  contactPhone: z.string().optional(),
});

export const documentRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.preprocess(
    (raw) => (raw === 'id' ? 'identification' : raw),
    z.enum(DOCUMENT_TYPES).catch('other'),
  ),
  description: z.string().optional(),
  howToObtain: z.string().optional(),
  alternatives: z.array(z.string()).default([]),
});

export const fplEntrySchema = z.object({
  year: z.number().int(),
  householdSize: z.number().int().positive(),
  state: z.string().length(2).transform((s) => s.toUpperCase()),
  annualAmount: amountSchema,
  monthlyAmount: amountSchema,
});

export const catalogMetaSchema = z.object({
  packId: z.string(),
  jurisdiction: z.string(),
  county: z.string().optional(),
  defaultState: z.string().length(2),
  fplYear: z.number().int(),
  version: z.string(),
  effectiveDate: z.string(),
  createdAt: z.string(),
});

// --- Types ---

export type EligibilityCriterion = z.infer<typeof criterionSchema>;
export type IncomeLimit = z.infer<typeof incomeLimitSchema>;
export type ActivationCondition = z.infer<typeof activationConditionSchema>;
export type DocumentRequirement = z.infer<typeof documentRequirementSchema>;
export type Program = z.infer<typeof programSchema>;
export type DocumentRecord = z.infer<typeof documentRecordSchema>;
export type FplEntry = z.infer<typeof fplEntrySchema>;
export type CatalogMeta = z.infer<typeof catalogMetaSchema>;

export interface FplReference {
  entries: readonly FplEntry[];
  defaultState: string;
}

export interface BenefitRules {
  snap?: SnapRules;
}

export interface RejectedRecord {
  kind: 'program' | 'document' | 'fpl_entry';
  ref: string;
  reason: string;
}

/** Immutable, in-memory view of the catalog for the duration of a request. */
export interface CatalogSnapshot {
  meta: CatalogMeta;
  programs: readonly Program[];
  documents: ReadonlyMap<string, DocumentRecord>;
  fpl: FplReference;
  benefitRules: BenefitRules;
  rejected: readonly RejectedRecord[];
}

// --- Assembly ---

function recordRef(raw: unknown, index: number): string {
  if (raw && typeof raw === 'object' && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return `#${index}`;
}

function parseEach<S extends z.ZodTypeAny>(
  rows: unknown[],
  schema: S,
  kind: RejectedRecord['kind'],
  rejected: RejectedRecord[],
): z.infer<S>[] {
  const parsed: z.infer<S>[] = [];
  rows.forEach((raw, index) => {
    const result = schema.safeParse(raw);
    if (result.success) {
      parsed.push(result.data);
    } else {
      rejected.push({ kind, ref: recordRef(raw, index), reason: result.error.message });
    }
  });
  return parsed;
}

export interface RawCatalog {
  meta: unknown;
  programs: unknown[];
  documents: unknown[];
  fpl: unknown[];
  benefitRules?: { snap?: unknown };
}

/**
 * Validates a raw catalog record by record. One bad program never prevents
 * the rest from loading; it is reported in `rejected` instead.
 */
export function buildCatalogSnapshot(raw: RawCatalog): CatalogSnapshot {
  const meta = catalogMetaSchema.parse(raw.meta);
  const rejected: RejectedRecord[] = [];

  const programs = parseEach(raw.programs, programSchema, 'program', rejected);
  const documents = parseEach(raw.documents, documentRecordSchema, 'document', rejected);
  const fplEntries = parseEach(raw.fpl, fplEntrySchema, 'fpl_entry', rejected);

  const benefitRules: BenefitRules = {};
  if (raw.benefitRules?.snap !== undefined) {
    benefitRules.snap = snapRulesSchema.parse(raw.benefitRules.snap);
  }

  return {
    meta,
    programs,
    documents: new Map(documents.map((d) => [d.id, d])),
    fpl: { entries: fplEntries, defaultState: meta.defaultState.toUpperCase() },
    benefitRules,
    rejected,
  };
}

// --- Loader ---

async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  return JSON.parse(raw);
}

async function readJsonArray(filePath: string): Promise<unknown[]> {
  const data = await readJson(filePath);
  if (!Array.isArray(data)) {
    throw new Error(`Expected a JSON array in ${filePath}`);
  }
  return data;
}

export interface PackManifest {
  meta: unknown;
  benefitRules: { snap?: unknown };
}

/** Metadata and benefit rules only; used when programs come from the database. */
export async function readPackManifest(packDir: string): Promise<PackManifest> {
  const [meta, snap] = await Promise.all([
    readJson(path.join(packDir, 'pack.json')),
    readJson(path.join(packDir, 'benefit-rules', 'snap.json')),
  ]);
  return { meta, benefitRules: { snap } };
}

export async function loadCatalogPack(packDir: string): Promise<CatalogSnapshot> {
  const [manifest, programs, documents, fpl] = await Promise.all([
    readPackManifest(packDir),
    readJsonArray(path.join(packDir, 'programs.json')),
    readJsonArray(path.join(packDir, 'documents.json')),
    readJsonArray(path.join(packDir, 'fpl.json')),
  ]);

  return buildCatalogSnapshot({ ...manifest, programs, documents, fpl });
}
