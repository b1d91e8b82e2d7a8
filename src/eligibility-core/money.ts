// src/eligibility-core/money.ts
// Fixed-point money helpers. Amounts are integer cents, rates and percentages
// are integer basis points, so every step is exact integer arithmetic.

export type Cents = number;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d*))?$/;

/**
 * Parses a decimal (string or number) into an integer scaled by 10^places,
 * rounding half-up on the first dropped digit. Returns null when the value
 * is not a plain decimal.
 */
export function parseScaled(value: string | number, places: number): number | null {
  if (typeof value === 'number' && !Number.isFinite(value)) return null;

  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  const kept = fraction.slice(0, places).padEnd(places, '0');
  let units = Number(whole) * 10 ** places + Number(kept || '0');

  if (fraction.length > places && Number(fraction[places]) >= 5) {
    units += 1;
  }

  if (!Number.isSafeInteger(units)) return null;
  return sign ? -units : units;
}

export function toCents(amount: string | number): Cents {
  const cents = parseScaled(amount, 2);
  if (cents === null) {
    throw new RangeError(`Not a monetary amount: ${String(amount)}`);
  }
  return cents;
}

/** Percentage (e.g. 130 or 138.5) as basis points of the whole (13000). */
export function percentToBasisPoints(percent: number): number {
  const bp = parseScaled(percent, 2);
  if (bp === null) {
    throw new RangeError(`Not a percentage: ${String(percent)}`);
  }
  return bp;
}

/** Fractional rate (e.g. 0.3) as basis points (3000). */
export function rateToBasisPoints(rate: number): number {
  const bp = parseScaled(rate, 4);
  if (bp === null) {
    throw new RangeError(`Not a rate: ${String(rate)}`);
  }
  return bp;
}

/** floor(numerator / denominator + 1/2) for integers, denominator > 0. */
export function roundHalfUp(numerator: number, denominator: number): number {
  return Math.floor((2 * numerator + denominator) / (2 * denominator));
}

export function applyBasisPoints(cents: Cents, basisPoints: number): Cents {
  return roundHalfUp(cents * basisPoints, 10_000);
}

export function applyRate(cents: Cents, rate: number): Cents {
  return applyBasisPoints(cents, rateToBasisPoints(rate));
}

export function annualToMonthly(annual: Cents): Cents {
  return roundHalfUp(annual, 12);
}

export function centsToDollars(cents: Cents): number {
  return cents / 100;
}

/** Rounds to the nearest whole currency unit and returns dollars. */
export function toWholeDollars(cents: Cents): number {
  return roundHalfUp(cents, 100);
}

const usd = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export function formatUsd(cents: Cents): string {
  return usd.format(cents / 100);
}
