import type { GroupVariationRow, MetricId, MoverBoards, MoverDirection, RankedMover } from '../core/types.js';
import { round2 } from './calculations.js';

/**
 * Most recent variation row of each group: the last row the group has in
 * sequence order, which is not necessarily the globally latest period.
 * Groups keep the order in which their last rows appear.
 */
export function latestPerGroup(variations: GroupVariationRow[]): GroupVariationRow[] {
  const lastIndex = new Map<string, number>();
  variations.forEach((row, i) => lastIndex.set(row.group, i));
  return variations.filter((row, i) => lastIndex.get(row.group) === i);
}

/**
 * Rank groups by their latest variation of one metric.
 *
 * Groups without a computed variation for the metric (e.g. seen in a single
 * period) are left out, so the result is empty when none has one. The sort
 * is stable: ties keep their sequence order.
 */
export function topMovers(
  variations: GroupVariationRow[],
  metric: MetricId,
  n: number,
  direction: MoverDirection
): RankedMover[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`n must be a non-negative integer, got ${n}`);
  }

  const candidates: Array<{ row: GroupVariationRow; value: number }> = [];
  for (const row of latestPerGroup(variations)) {
    const value = row[metric];
    if (value !== null) candidates.push({ row, value });
  }

  const sign = direction === 'gainers' ? -1 : 1;
  candidates.sort((a, b) => sign * (a.value - b.value));

  return candidates.slice(0, n).map(({ row, value }) => ({
    group: row.group,
    period: row.period,
    value: Math.round(value * 100) / 100,
    l14: round2(row.l14),
    vol: round2(row.vol),
    cost_per_unit: round2(row.cost_per_unit),
  }));
}

/** Gainers and decliners for every metric */
export function rankAllMovers(variations: GroupVariationRow[], n: number): MoverBoards {
  const board = (metric: MetricId) => ({
    gainers: topMovers(variations, metric, n, 'gainers'),
    decliners: topMovers(variations, metric, n, 'decliners'),
  });
  return { l14: board('l14'), vol: board('vol'), cost_per_unit: board('cost_per_unit') };
}
