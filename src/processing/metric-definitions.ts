import type { MetricDefinition, MetricId } from '../core/types.js';

/**
 * The 3 tracked KPIs.
 *
 * L14 and VOL are summed straight from the records; cost per unit is
 * always re-derived from the sums, never summed itself.
 */

export const METRIC_DEFINITIONS: MetricDefinition[] = [
  {
    id: 'l14',
    display_name: 'L14',
    description: 'Revenue-like monetary amount summed per period',
    unit_type: 'currency',
    aggregation: 'sum',
    source_columns: ['L14'],
  },
  {
    id: 'vol',
    display_name: 'Volumen',
    description: 'Volume summed per period',
    unit_type: 'volume',
    aggregation: 'sum',
    source_columns: ['VOL'],
  },
  {
    id: 'cost_per_unit',
    display_name: 'Costo unitario',
    description: 'L14 divided by volume; empty when volume is zero',
    unit_type: 'ratio',
    aggregation: 'derived',
    source_columns: ['L14', 'VOL'],
  },
];

export function getMetricDefinition(id: string): MetricDefinition | undefined {
  return METRIC_DEFINITIONS.find(m => m.id === id);
}

/**
 * Resolve a loosely written metric name ("costo unitario", "volume", "L14").
 */
export function findMetricByName(name: string): MetricDefinition | undefined {
  const lower = name.toLowerCase().trim();

  const byId = getMetricDefinition(lower);
  if (byId) return byId;

  const byName = METRIC_DEFINITIONS.find(m => m.display_name.toLowerCase() === lower);
  if (byName) return byName;

  // Longer phrases first so "costo unitario" wins over a bare "vol"
  const keywords: Array<[string, MetricId]> = [
    ['costo unitario', 'cost_per_unit'],
    ['cost per unit', 'cost_per_unit'],
    ['unit cost', 'cost_per_unit'],
    ['costo', 'cost_per_unit'],
    ['cpu', 'cost_per_unit'],
    ['volumen', 'vol'],
    ['volume', 'vol'],
    ['vol', 'vol'],
    ['l14', 'l14'],
    ['revenue', 'l14'],
    ['ventas', 'l14'],
  ];

  for (const [keyword, metricId] of keywords) {
    if (lower.includes(keyword)) {
      return getMetricDefinition(metricId);
    }
  }

  return undefined;
}
