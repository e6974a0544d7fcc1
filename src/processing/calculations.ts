import { InsufficientPeriodsError, PeriodNotFoundError } from '../core/errors.js';
import type {
  GroupTotals,
  GroupVariationRow,
  PeriodComparison,
  PeriodTotals,
  VariationRow,
} from '../core/types.js';

/**
 * Null-safe ratio of L14 over volume.
 * Returns null when either side is missing or the volume is zero.
 */
export function costPerUnit(l14: number | null, vol: number | null): number | null {
  if (l14 === null || vol === null || vol === 0) return null;
  const ratio = l14 / vol;
  return isFinite(ratio) ? ratio : null;
}

/**
 * Percentage change of current against prior.
 * Returns null for a missing side, a zero prior, or a non-finite result.
 */
export function percentChange(current: number | null, prior: number | null): number | null {
  if (current === null || prior === null || prior === 0) return null;
  const change = ((current - prior) / prior) * 100;
  return isFinite(change) ? change : null;
}

/** Round to 2 decimals; null passes through */
export function round2(value: number | null): number | null {
  if (value === null) return null;
  return Math.round(value * 100) / 100;
}

function variationBetween(current: PeriodTotals, prior: PeriodTotals | null): VariationRow {
  if (!prior) {
    return { period: current.period, l14: null, vol: null, cost_per_unit: null };
  }
  return {
    period: current.period,
    l14: percentChange(current.l14, prior.l14),
    vol: percentChange(current.vol, prior.vol),
    cost_per_unit: percentChange(current.cost_per_unit, prior.cost_per_unit),
  };
}

/**
 * Period-over-period variations for a totals series.
 * Totals must be in chronological order (oldest first). The first row has
 * no predecessor and is all null.
 */
export function calculateVariations(totals: PeriodTotals[]): VariationRow[] {
  return totals.map((row, i) => variationBetween(row, i > 0 ? totals[i - 1] : null));
}

/**
 * Variations computed per group, each row against the same group's previous
 * row in the sequence. A group absent from some periods is compared with its
 * last present row, which can skip calendar periods.
 */
export function calculateGroupVariations(totals: GroupTotals[]): GroupVariationRow[] {
  const lastSeen = new Map<string, GroupTotals>();

  return totals.map(row => {
    const prior = lastSeen.get(row.group) ?? null;
    lastSeen.set(row.group, row);
    return { group: row.group, ...variationBetween(row, prior) };
  });
}

/**
 * Pair a period's totals with its predecessor and their variation.
 * Defaults to the latest period.
 */
export function comparePeriodToPrevious(
  totals: PeriodTotals[],
  variations: VariationRow[],
  period?: string
): PeriodComparison {
  if (totals.length < 2) {
    throw new InsufficientPeriodsError('No hay suficientes periodos para comparar.', totals.length);
  }

  const target = period ?? totals[totals.length - 1].period;
  const idx = totals.findIndex(t => t.period === target);
  if (idx === -1) {
    throw new PeriodNotFoundError(target, totals.map(t => t.period));
  }
  if (idx === 0) {
    throw new InsufficientPeriodsError(`No existe periodo anterior para comparar ${target}`, totals.length);
  }

  const variation = variations.find(v => v.period === target) ?? variationBetween(totals[idx], totals[idx - 1]);

  return { current: totals[idx], previous: totals[idx - 1], variation };
}
