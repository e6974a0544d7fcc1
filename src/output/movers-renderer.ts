import chalk from 'chalk';
import type { MetricId, MoverBoard, RankedMover } from '../core/types.js';
import { getMetricDefinition } from '../processing/metric-definitions.js';
import { formatPct, padRight } from './format-utils.js';

/**
 * Renders ranked mover lists, as plain text for chat answers and as a
 * colored terminal table for the CLI.
 */

export function renderMoversList(title: string, movers: RankedMover[], groupLabel: string = 'IDH'): string {
  const lines: string[] = [title];

  if (movers.length === 0) {
    lines.push('  Sin variaciones calculadas (se necesitan al menos dos periodos por IDH).');
    return lines.join('\n');
  }

  const groupWidth = Math.max(groupLabel.length, ...movers.map(m => m.group.length)) + 2;
  lines.push(`  ${padRight(groupLabel, groupWidth)}${padRight('Variación', 12)}Periodo`);
  for (const m of movers) {
    lines.push(`  ${padRight(m.group, groupWidth)}${padRight(formatPct(m.value), 12)}${m.period}`);
  }

  return lines.join('\n');
}

/** Both lists for one metric, labeled the way chat answers show them */
export function renderMoverBoardText(board: MoverBoard, metric: MetricId): string {
  const name = getMetricDefinition(metric)?.display_name ?? metric;
  const label = name.replace(/\b\w/g, c => c.toUpperCase());
  return [
    renderMoversList(`Top IDH (${label}) - Subidas:`, board.gainers),
    '',
    renderMoversList(`Top IDH (${label}) - Bajadas:`, board.decliners),
  ].join('\n');
}

export function renderMoversTable(board: MoverBoard, metric: MetricId): string {
  const name = getMetricDefinition(metric)?.display_name ?? metric;
  const lines: string[] = [];

  const header = `Mayores variaciones por IDH — ${name}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  const sections: Array<[string, RankedMover[]]> = [
    ['Subidas', board.gainers],
    ['Bajadas', board.decliners],
  ];

  for (const [title, movers] of sections) {
    lines.push(chalk.bold(`  ${title}`));
    if (movers.length === 0) {
      lines.push(chalk.dim('  Sin variaciones calculadas.'));
      lines.push('');
      continue;
    }

    const groupWidth = Math.max(8, ...movers.map(m => m.group.length + 2));
    lines.push(`  ${chalk.underline(padRight('IDH', groupWidth))}${chalk.underline(padRight('Periodo', 10))}${chalk.underline(padRight('Variación', 12))}`);
    for (const m of movers) {
      const pct = formatPct(m.value);
      const colored = m.value > 0 ? chalk.green(pct) : m.value < 0 ? chalk.red(pct) : pct;
      lines.push(`  ${padRight(m.group, groupWidth)}${padRight(m.period, 10)}${colored}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
