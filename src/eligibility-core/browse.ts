// src/eligibility-core/browse.ts
// Catalog browsing over active programs: category and emergency filters,
// text search, and the counts shown alongside a listing.

import { PROGRAM_CATEGORIES } from '@shared/constants';
import type { Program } from './catalog';

export type ProgramCategory = Program['category'];

export interface ProgramFilter {
  category?: ProgramCategory;
  /** Case-insensitive text found in the name or description. */
  query?: string;
  emergencyOnly?: boolean;
}

export interface CategoryCount {
  category: ProgramCategory;
  count: number;
}

export interface CatalogStats {
  totalPrograms: number;
  emergencyPrograms: number;
  highConfidence: number;
  categories: number;
}

export const HIGH_CONFIDENCE = 0.7;

function byConfidence(a: Program, b: Program): number {
  if (a.confidenceScore !== b.confidenceScore) return b.confidenceScore - a.confidenceScore;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/** Search results come back most reliable first; plain listings keep catalog order. */
export function filterPrograms(programs: readonly Program[], filter: ProgramFilter = {}): Program[] {
  const term = filter.query?.trim().toLowerCase();

  const found = programs.filter((p) => {
    if (!p.isActive) return false;
    if (filter.category && p.category !== filter.category) return false;
    if (filter.emergencyOnly && !p.isEmergency) return false;
    if (term) {
      const text = `${p.name}\n${p.description ?? ''}`.toLowerCase();
      if (!text.includes(term)) return false;
    }
    return true;
  });

  return term ? found.sort(byConfidence) : found;
}

// Largest first; equal counts follow the category list.
export function countByCategory(programs: readonly Program[]): CategoryCount[] {
  const counts = new Map<ProgramCategory, number>();
  for (const p of programs) {
    if (p.isActive) counts.set(p.category, (counts.get(p.category) ?? 0) + 1);
  }
  return PROGRAM_CATEGORIES.flatMap((category) => {
    const count = counts.get(category);
    return count === undefined ? [] : [{ category, count }];
  }).sort((a, b) => b.count - a.count);
}

export function catalogStats(programs: readonly Program[]): CatalogStats {
  const active = programs.filter((p) => p.isActive);
  return {
    totalPrograms: active.length,
    emergencyPrograms: active.filter((p) => p.isEmergency).length,
    highConfidence: active.filter((p) => p.confidenceScore >= HIGH_CONFIDENCE).length,
    categories: new Set(active.map((p) => p.category)).size,
  };
}
