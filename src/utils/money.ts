import Decimal from 'decimal.js';

// Amounts are plain non-negative numbers of any precision; sums are exact in decimal, then converted back.

export function addAmounts(a: number, b: number): number {
  return new Decimal(a).plus(b).toNumber();
}

export function subtractAmounts(a: number, b: number): number {
  return new Decimal(a).minus(b).toNumber();
}

export function sumAmounts(amounts: Iterable<number>): number {
  let total = new Decimal(0);
  for (const a of amounts) total = total.plus(a);
  return total.toNumber();
}

/** `part / whole * 100`, unrounded. */
export function percentOf(part: number, whole: number): number {
  return new Decimal(part).div(whole).times(100).toNumber();
}

export function roundTo(value: number, places: number): number {
  return new Decimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

const formatter = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatAmount(amount: number): string {
  return formatter.format(amount);
}
