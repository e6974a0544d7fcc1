/**
 * Renders totals and movers as CSV for spreadsheet import.
 */

import type { GroupTotals, PeriodTotals, RankedMover, VariationRow } from '../core/types.js';
import { csvEscape } from './format-utils.js';

function cell(value: number | null): string {
  return value === null ? '' : value.toString();
}

export function renderTotalsCsv(totals: PeriodTotals[], variations: VariationRow[]): string {
  const lines: string[] = [];
  lines.push('Period,L14,VOL,Cost_Per_Unit,L14_Change_Pct,VOL_Change_Pct,Cost_Per_Unit_Change_Pct');

  totals.forEach((t, i) => {
    const v = variations[i];
    lines.push([
      csvEscape(t.period),
      cell(t.l14),
      cell(t.vol),
      cell(t.cost_per_unit),
      cell(v ? v.l14 : null),
      cell(v ? v.vol : null),
      cell(v ? v.cost_per_unit : null),
    ].join(','));
  });

  return lines.join('\n');
}

export function renderGroupTotalsCsv(totals: GroupTotals[], groupLabel: string): string {
  const lines: string[] = [`Period,${groupLabel},L14,VOL,Cost_Per_Unit`];
  for (const t of totals) {
    lines.push([csvEscape(t.period), csvEscape(t.group), cell(t.l14), cell(t.vol), cell(t.cost_per_unit)].join(','));
  }
  return lines.join('\n');
}

export function renderMoversCsv(movers: RankedMover[]): string {
  const lines: string[] = ['Rank,IDH,Period,Value,L14_Change_Pct,VOL_Change_Pct,Cost_Per_Unit_Change_Pct'];
  movers.forEach((m, i) => {
    lines.push([
      String(i + 1),
      csvEscape(m.group),
      csvEscape(m.period),
      m.value.toString(),
      cell(m.l14),
      cell(m.vol),
      cell(m.cost_per_unit),
    ].join(','));
  });
  return lines.join('\n');
}
