import chalk from 'chalk';
import type { GroupTotals, PeriodTotals, VariationRow } from '../core/types.js';
import { formatNumber, formatPct, padRight } from './format-utils.js';

/**
 * Renders period totals and their variations as formatted terminal tables.
 */

export function renderTotalsTable(totals: PeriodTotals[], variations: VariationRow[]): string {
  const lines: string[] = [];

  const header = `Totales por periodo (${totals.length} periodos)`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (totals.length === 0) {
    lines.push(chalk.dim('  No data found.'));
    return lines.join('\n');
  }

  const valueColWidth = Math.max(
    16,
    ...totals.map(t => Math.max(formatNumber(t.l14).length, formatNumber(t.vol).length) + 2)
  );
  const periodColWidth = Math.max(10, ...totals.map(t => t.period.length + 2));

  lines.push(
    `  ${chalk.underline(padRight('Periodo', periodColWidth))}` +
    `${chalk.underline(padRight('L14', valueColWidth))}` +
    `${chalk.underline(padRight('Volumen', valueColWidth))}` +
    `${chalk.underline(padRight('Costo unit.', 14))}` +
    `${chalk.underline(padRight('Var L14', 12))}` +
    `${chalk.underline(padRight('Var Vol', 12))}` +
    `${chalk.underline(padRight('Var Costo', 12))}`
  );

  totals.forEach((t, i) => {
    const v = variations[i];
    lines.push(
      `  ${padRight(t.period, periodColWidth)}` +
      `${padRight(formatNumber(t.l14), valueColWidth)}` +
      `${padRight(formatNumber(t.vol), valueColWidth)}` +
      `${padRight(formatNumber(t.cost_per_unit), 14)}` +
      `${padRight(formatChange(v?.l14 ?? null), 12)}` +
      `${padRight(formatChange(v?.vol ?? null), 12)}` +
      `${formatChange(v?.cost_per_unit ?? null)}`
    );
  });

  lines.push('');

  if (totals.length >= 3) {
    lines.push(`  Tendencia L14:          ${sparkline(totals.map(t => t.l14))}`);
    const costs = totals.map(t => t.cost_per_unit).filter((c): c is number => c !== null);
    if (costs.length >= 3) {
      lines.push(`  Tendencia costo unit.:  ${sparkline(costs)}`);
    }
  }

  return lines.join('\n').trimEnd();
}

/** Brand totals of one period, biggest L14 first */
export function renderBrandTable(brandTotals: GroupTotals[], period: string): string {
  const rows = brandTotals.filter(b => b.period === period).sort((a, b) => b.l14 - a.l14);
  const lines: string[] = [];

  const header = `Totales por marca — ${period}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (rows.length === 0) {
    lines.push(chalk.dim('  No brand data for this period.'));
    return lines.join('\n');
  }

  const brandColWidth = Math.max(10, ...rows.map(r => r.group.length + 2));
  lines.push(`  ${chalk.underline(padRight('Marca', brandColWidth))}${chalk.underline(padRight('L14', 18))}${chalk.underline(padRight('Volumen', 18))}${chalk.underline('Costo unit.')}`);
  for (const r of rows) {
    lines.push(`  ${padRight(r.group, brandColWidth)}${padRight(formatNumber(r.l14), 18)}${padRight(formatNumber(r.vol), 18)}${formatNumber(r.cost_per_unit)}`);
  }

  return lines.join('\n');
}

function formatChange(pct: number | null): string {
  if (pct === null) return chalk.dim('--');
  const str = formatPct(pct);
  if (pct > 0) return chalk.green(str);
  if (pct < 0) return chalk.red(str);
  return str;
}

/** Generate a Unicode sparkline from a series of values */
export function sparkline(values: number[]): string {
  if (values.length < 2) return '';
  const blocks = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  if (range === 0) return blocks[4].repeat(values.length);

  return values.map(v => {
    const idx = Math.round(((v - min) / range) * (blocks.length - 1));
    return blocks[idx];
  }).join('');
}
