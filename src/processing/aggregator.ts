import { SchemaError } from '../core/errors.js';
import { assertSortablePeriods, comparePeriods } from '../core/period.js';
import type { CanonicalColumn, FinancialRecord, GroupColumn, GroupTotals, PeriodTotals, RecordTable } from '../core/types.js';
import { costPerUnit } from './calculations.js';

/**
 * Sums of L14 and VOL grouped by period, optionally by entity or brand
 * within the period. Null values are skipped; a group whose values are all
 * null sums to zero.
 */

const GROUP_COLUMN: Record<GroupColumn, CanonicalColumn> = {
  entity_id: 'ENTITY_ID',
  brand: 'BRAND',
};

interface Accumulator {
  period: string;
  group: string;
  l14: number;
  vol: number;
}

export function aggregateByPeriod(table: RecordTable): PeriodTotals[] {
  requireColumns(table, ['PERIOD', 'L14', 'VOL'], 'period totals');

  return accumulate(table.rows, () => '').map(({ period, l14, vol }) => ({
    period,
    l14,
    vol,
    cost_per_unit: costPerUnit(l14, vol),
  }));
}

export function aggregateBy(table: RecordTable, groupBy: GroupColumn): GroupTotals[] {
  requireColumns(table, ['PERIOD', GROUP_COLUMN[groupBy], 'L14', 'VOL'], `${groupBy} totals`);

  return accumulate(table.rows, row => row[groupBy]).map(({ period, group, l14, vol }) => ({
    period,
    group,
    l14,
    vol,
    cost_per_unit: costPerUnit(l14, vol),
  }));
}

/** Whether any row carries a brand */
export function hasBrandData(table: RecordTable): boolean {
  return table.columns.includes('BRAND') && table.rows.some(r => r.brand !== null);
}

function requireColumns(table: RecordTable, required: CanonicalColumn[], purpose: string): void {
  const missing = required.filter(c => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new SchemaError(`Cannot compute ${purpose}: missing column(s) ${missing.join(', ')}`, missing);
  }
}

/**
 * Group rows by (period, key) and sum. Rows whose key is null are left out.
 * Output is ordered by period, then key.
 */
function accumulate(rows: FinancialRecord[], keyOf: (row: FinancialRecord) => string | null): Accumulator[] {
  const groups = new Map<string, Accumulator>();

  for (const row of rows) {
    const group = keyOf(row);
    if (group === null) continue;

    const id = `${row.period}\u0000${group}`;
    let acc = groups.get(id);
    if (!acc) {
      acc = { period: row.period, group, l14: 0, vol: 0 };
      groups.set(id, acc);
    }
    if (row.l14 !== null) acc.l14 += row.l14;
    if (row.vol !== null) acc.vol += row.vol;
  }

  const result = Array.from(groups.values());
  assertSortablePeriods(result.map(r => r.period));

  return result.sort((a, b) => comparePeriods(a.period, b.period) || comparePeriods(a.group, b.group));
}
