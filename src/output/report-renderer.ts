import { InsufficientPeriodsError } from '../core/errors.js';
import type { PeriodComparison, PeriodTotals, VariationRow } from '../core/types.js';
import { comparePeriodToPrevious } from '../processing/calculations.js';
import { formatNumber } from './format-utils.js';

/**
 * Email-style summary of one period against the previous one.
 * Text only; sending is up to the caller.
 */

export function generateReport(totals: PeriodTotals[], variations: VariationRow[], period?: string): string {
  let comparison: PeriodComparison;
  try {
    comparison = comparePeriodToPrevious(totals, variations, period);
  } catch (err) {
    if (err instanceof InsufficientPeriodsError) return err.message;
    throw err;
  }

  const { current, previous, variation } = comparison;
  const pct = (v: number | null) => (v === null ? 'n/d' : `${formatNumber(v)} %`);

  return [
    'Equipo,',
    '',
    'Resumen automático del análisis de KPIs.',
    '',
    `PERIODO ANALIZADO: ${current.period}`,
    '',
    `Resultados (vs periodo anterior ${previous.period}):`,
    `- L14 total: ${formatNumber(current.l14)} (anterior ${formatNumber(previous.l14)})`,
    `- Volumen total: ${formatNumber(current.vol)} (anterior ${formatNumber(previous.vol)})`,
    `- Costo unitario: ${formatNumber(current.cost_per_unit)} (anterior ${formatNumber(previous.cost_per_unit)})`,
    '',
    'Variaciones %:',
    `- L14: ${pct(variation.l14)}`,
    `- Volumen: ${pct(variation.vol)}`,
    `- Costo unitario: ${pct(variation.cost_per_unit)}`,
    '',
    'Insights:',
    `- ${unitCostInsight(variation.cost_per_unit)}`,
    '- Revisar IDH y marcas con mayor impacto.',
    '',
    'Saludos,',
    'Análisis Automático',
  ].join('\n');
}

function unitCostInsight(change: number | null): string {
  if (change === null) return 'No fue posible comparar el costo unitario con el periodo anterior.';
  if (change > 0) return 'El costo unitario subió respecto al periodo anterior.';
  if (change < 0) return 'El costo unitario bajó respecto al periodo anterior.';
  return 'El costo unitario se mantuvo respecto al periodo anterior.';
}
