import { PeriodFormatError } from './errors.js';

/**
 * Period tokens are opaque strings ordered lexically. That order is only
 * chronological when every token has the same fixed width and is zero-padded
 * ("2024-01", not "2024-1"), so callers go through these helpers instead of
 * sorting raw strings.
 */

export function comparePeriods(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Throws PeriodFormatError when tokens differ in width */
export function assertSortablePeriods(periods: Iterable<string>): void {
  const widths = new Map<number, string>();
  for (const p of periods) {
    if (!widths.has(p.length)) widths.set(p.length, p);
  }
  if (widths.size > 1) {
    throw new PeriodFormatError(Array.from(widths.values()).sort(comparePeriods));
  }
}

/** Distinct periods in ascending order */
export function distinctPeriods(periods: Iterable<string>): string[] {
  return Array.from(new Set(periods)).sort(comparePeriods);
}

/** Build a YYYY-MM token from loose year/month cell values (e.g. 2024, "3.0") */
export function periodFromYearMonth(year: unknown, month: unknown): string {
  const y = String(year).replace('.0', '').trim();
  const m = String(month).replace('.0', '').trim().padStart(2, '0');
  return `${y}-${m}`;
}
