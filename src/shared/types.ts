import type { CatalogStats, CategoryCount } from '@core/browse';
import type { Checklist } from '@core/checklist';
import type { ExcludedProgram, ProgramMatch } from '@core/matcher';
import type { CatalogMeta, RejectedRecord } from '@core/catalog';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface HealthStatus {
  status: 'ok';
  catalog: string;
  programs: number;
  timestamp: string;
}

export interface ProgramSummary {
  id: string;
  name: string;
  category: string;
  isEmergency: boolean;
  isActive: boolean;
  benefitFamily?: string;
}

export interface CatalogOverview {
  meta: CatalogMeta;
  programs: ProgramSummary[];
  counts: CategoryCount[];
  stats: CatalogStats;
  rejected: readonly RejectedRecord[];
  calculators: string[];
}

export interface MatchResponse {
  asOf: string;
  totalMatches: number;
  matches: ProgramMatch[];
  emergency: string[];
  excluded: ExcludedProgram[];
  checklist: Checklist;
}
