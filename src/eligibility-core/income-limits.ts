// src/eligibility-core/income-limits.ts
// Resolves the monthly income ceiling a program applies to a household size.
// Pure function over an in-memory catalog snapshot.

import type { FplReference, IncomeLimit, Program } from './catalog';
import {
  annualToMonthly,
  parseScaled,
  percentToBasisPoints,
  roundHalfUp,
  type Cents,
} from './money';

// ── Types ────────────────────────────────────────────────────────────────────

export interface IncomeCeiling {
  monthly: Cents;
  source: 'limit_table' | 'fpl';
  householdSize: number;
  fplPercentage?: number;
  fplYear?: number;
  fplState?: string;
}

/**
 * `not_required`: the program has no income test at all.
 * `unresolved`: it has one, but no limit applies to this size or date.
 */
export type IncomeLimitResolution =
  | { ok: true; status: 'resolved'; ceiling: IncomeCeiling }
  | { ok: true; status: 'not_required'; ceiling: null }
  | { ok: true; status: 'unresolved'; ceiling: null; reason: string }
  | { ok: false; error: string };

export type FplLookup =
  | { ok: true; annual: Cents; year: number; state: string; extrapolated: boolean }
  | { ok: false; error: string };

export interface ResolveOptions {
  state?: string;
  /** Overrides the program's own FPL percentage (criterion-level limit). */
  fplPercentage?: number;
}

// ── FPL table ────────────────────────────────────────────────────────────────

function entryAnnual(amount: number | string): Cents | null {
  return parseScaled(amount, 2);
}

/**
 * Annual poverty line for a household. Uses the table for the requested state
 * (or the default state), the latest year not after `asOf`, and extrapolates
 * past the largest tabulated size with the table's own last per-member delta.
 */
export function lookupFplAnnual(
  fpl: FplReference,
  householdSize: number,
  asOf: Date,
  state?: string,
): FplLookup {
  const requested = state?.toUpperCase();
  let rows = requested ? fpl.entries.filter((e) => e.state === requested) : [];
  if (rows.length === 0) {
    rows = fpl.entries.filter((e) => e.state === fpl.defaultState);
  }
  if (rows.length === 0) {
    return { ok: false, error: `No FPL table for ${requested ?? fpl.defaultState} or default state ${fpl.defaultState}` };
  }

  const tableState = rows[0].state;
  const years = [...new Set(rows.map((e) => e.year))].sort((a, b) => a - b);
  const asOfYear = asOf.getUTCFullYear();
  const year = years.filter((y) => y <= asOfYear).pop() ?? years[0];

  const bySize = new Map<number, Cents>();
  for (const entry of rows.filter((e) => e.year === year)) {
    const annual = entryAnnual(entry.annualAmount);
    if (annual === null) {
      return { ok: false, error: `Unparseable FPL amount for ${year}/${tableState}/size ${entry.householdSize}` };
    }
    bySize.set(entry.householdSize, annual);
  }

  const exact = bySize.get(householdSize);
  if (exact !== undefined) {
    return { ok: true, annual: exact, year, state: tableState, extrapolated: false };
  }

  const maxSize = Math.max(...bySize.keys());
  if (householdSize < maxSize) {
    return { ok: false, error: `FPL table ${year}/${tableState} has no entry for household size ${householdSize}` };
  }

  const top = bySize.get(maxSize);
  const previous = bySize.get(maxSize - 1);
  if (top === undefined || previous === undefined) {
    return { ok: false, error: `FPL table ${year}/${tableState} cannot be extrapolated past size ${maxSize}` };
  }

  const increment = top - previous;
  return {
    ok: true,
    annual: top + (householdSize - maxSize) * increment,
    year,
    state: tableState,
    extrapolated: true,
  };
}

// ── Limit rows ───────────────────────────────────────────────────────────────

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isActive(row: IncomeLimit, asOfDay: string): boolean {
  if (row.effectiveDate && row.effectiveDate > asOfDay) return false;
  if (row.expirationDate && row.expirationDate < asOfDay) return false;
  return true;
}

function rowMonthly(row: IncomeLimit): Cents | null | 'invalid' {
  if (row.monthlyLimit !== undefined) {
    return parseScaled(row.monthlyLimit, 2) ?? 'invalid';
  }
  if (row.annualLimit !== undefined) {
    const annual = parseScaled(row.annualLimit, 2);
    return annual === null ? 'invalid' : annualToMonthly(annual);
  }
  return null;
}

function checkRow(row: IncomeLimit): string | null {
  if (!Number.isInteger(row.householdSize) || row.householdSize <= 0) {
    return `Income limit has invalid household size ${row.householdSize}`;
  }
  for (const date of [row.effectiveDate, row.expirationDate]) {
    if (date !== undefined && !ISO_DATE.test(date)) {
      return `Income limit for size ${row.householdSize} has invalid date "${date}"`;
    }
  }
  if (row.fplPercentage !== undefined && !(row.fplPercentage > 0)) {
    return `Income limit for size ${row.householdSize} has invalid FPL percentage ${row.fplPercentage}`;
  }
  return null;
}

// ── Resolver ─────────────────────────────────────────────────────────────────

export function resolveIncomeLimit(
  program: Program,
  householdSize: number,
  asOf: Date,
  fpl: FplReference,
  options: ResolveOptions = {},
): IncomeLimitResolution {
  const asOfDay = asOf.toISOString().slice(0, 10);

  for (const row of program.incomeLimits) {
    const problem = checkRow(row);
    if (problem) return { ok: false, error: problem };
  }

  // Step 1: literal limit for this exact size
  const candidates: Cents[] = [];
  for (const row of program.incomeLimits) {
    if (row.householdSize !== householdSize || !isActive(row, asOfDay)) continue;
    const monthly = rowMonthly(row);
    if (monthly === 'invalid') {
      return { ok: false, error: `Income limit for size ${householdSize} has an unparseable amount` };
    }
    if (monthly !== null) candidates.push(monthly);
  }

  if (candidates.length > 1) {
    return {
      ok: false,
      error: `${candidates.length} active income limits for household size ${householdSize}`,
    };
  }
  if (candidates.length === 1) {
    return {
      ok: true,
      status: 'resolved',
      ceiling: { monthly: candidates[0], source: 'limit_table', householdSize },
    };
  }

  // Step 2: percentage of the poverty line
  const fplPercentage =
    options.fplPercentage ??
    program.fplPercentage ??
    program.incomeLimits.find((row) => row.fplPercentage !== undefined)?.fplPercentage;

  if (fplPercentage === undefined) {
    // Step 3: rows that miss this household are not the same as no requirement
    if (program.incomeLimits.length > 0) {
      return {
        ok: true,
        status: 'unresolved',
        ceiling: null,
        reason: `No income limit listed for a household of ${householdSize} on ${asOfDay}`,
      };
    }
    return { ok: true, status: 'not_required', ceiling: null };
  }

  const lookup = lookupFplAnnual(fpl, householdSize, asOf, options.state);
  if (!lookup.ok) return lookup;

  // annual x pct / 12 with a single rounding
  const monthly = roundHalfUp(lookup.annual * percentToBasisPoints(fplPercentage), 10_000 * 12);

  return {
    ok: true,
    status: 'resolved',
    ceiling: {
      monthly,
      source: 'fpl',
      householdSize,
      fplPercentage,
      fplYear: lookup.year,
      fplState: lookup.state,
    },
  };
}
