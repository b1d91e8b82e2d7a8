// src/eligibility-core/checklist.ts
// Consolidates the document requirements of matched programs into one list.

import { DOCUMENT_TYPES } from '@shared/constants';
import type { ActivationCondition, DocumentRecord, Program } from './catalog';
import { deriveHouseholdFacts, type HouseholdFacts, type UserProfile } from './profile';

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export interface ChecklistItem {
  documentId: string;
  name: string;
  type: DocumentType;
  description?: string;
  howToObtain?: string;
  /** True when any program that asks for it requires it. */
  required: boolean;
  requiredBy: string[];
  alternatives: string[];
}

export interface ChecklistGroup {
  type: DocumentType;
  items: ChecklistItem[];
}

export interface UnresolvedDocument {
  programId: string;
  documentId: string;
}

export interface Checklist {
  groups: ChecklistGroup[];
  totalDocuments: number;
  unresolved: UnresolvedDocument[];
}

/** What activation conditions are checked against. */
export interface ChecklistContext {
  needs: readonly string[];
  situations?: readonly string[];
  facts?: Partial<HouseholdFacts>;
}

export function checklistContextFromProfile(profile: UserProfile): ChecklistContext {
  return {
    needs: profile.needs,
    situations: profile.situations,
    facts: deriveHouseholdFacts(profile),
  };
}

// Every stated part of a condition must hold.
export function isConditionActive(
  condition: ActivationCondition | undefined,
  context: ChecklistContext,
): boolean {
  if (!condition) return true;

  if (condition.needsAny && !condition.needsAny.some((n) => context.needs.includes(n))) {
    return false;
  }
  if (condition.situationsAny) {
    const situations = context.situations ?? [];
    if (!condition.situationsAny.some((s) => situations.includes(s))) return false;
  }
  if (condition.flags) {
    const { flags } = condition;
    const facts = context.facts ?? {};
    const pairs: [boolean | undefined, boolean | undefined][] = [
      [flags.hasChildren, facts.hasChildren],
      [flags.hasElderly, facts.hasElderly],
      [flags.hasDisability, facts.hasDisability],
      [flags.isVeteran, facts.isVeteran],
      [flags.isPregnant, facts.isPregnant],
    ];
    if (pairs.some(([expected, actual]) => expected !== undefined && actual !== expected)) {
      return false;
    }
  }
  return true;
}

export function buildChecklist(
  programs: readonly Program[],
  documents: ReadonlyMap<string, DocumentRecord>,
  context: ChecklistContext,
): Checklist {
  const byId = new Map<string, ChecklistItem>();
  const unresolved: UnresolvedDocument[] = [];

  for (const program of programs) {
    for (const requirement of program.documents) {
      if (!isConditionActive(requirement.condition, context)) continue;

      const record = documents.get(requirement.documentId);
      if (!record) {
        unresolved.push({ programId: program.id, documentId: requirement.documentId });
        continue;
      }

      const existing = byId.get(record.id);
      if (existing) {
        if (!existing.requiredBy.includes(program.name)) existing.requiredBy.push(program.name);
        existing.required = existing.required || requirement.isRequired;
        continue;
      }

      byId.set(record.id, {
        documentId: record.id,
        name: record.name,
        type: record.type,
        description: record.description,
        howToObtain: record.howToObtain,
        required: requirement.isRequired,
        requiredBy: [program.name],
        alternatives: [...record.alternatives],
      });
    }
  }

  const items = [...byId.values()];
  const groups = DOCUMENT_TYPES.map((type) => ({
    type,
    items: items.filter((item) => item.type === type),
  })).filter((group) => group.items.length > 0);

  return { groups, totalDocuments: items.length, unresolved };
}
