/**
 * Core data model for kpi-variance-nl.
 *
 * Design principles:
 * - Records are supplied per invocation and never mutated
 * - Totals and variations are derived, never stored
 * - Ratios that would divide by zero are null, not Infinity
 */

export type CanonicalColumn = 'PERIOD' | 'ENTITY_ID' | 'BRAND' | 'L14' | 'VOL';

export const CANONICAL_COLUMNS: readonly CanonicalColumn[] = ['PERIOD', 'ENTITY_ID', 'BRAND', 'L14', 'VOL'];

/** One row per product/material (IDH) per period */
export interface FinancialRecord {
  period: string;
  entity_id: string;
  brand: string | null;
  l14: number | null;
  vol: number | null;
}

/**
 * A batch of records plus the canonical columns its source delivered.
 * Columns are what schema checks look at; rows never carry undeclared data.
 */
export interface RecordTable {
  columns: CanonicalColumn[];
  rows: FinancialRecord[];
}

export type MetricId = 'l14' | 'vol' | 'cost_per_unit';

export const METRIC_IDS = ['l14', 'vol', 'cost_per_unit'] as const satisfies readonly MetricId[];

export type GroupColumn = 'entity_id' | 'brand';

export interface PeriodTotals {
  period: string;
  l14: number;
  vol: number;
  cost_per_unit: number | null;
}

export interface GroupTotals extends PeriodTotals {
  group: string;
}

/** Percentage change against the predecessor row; null where undefined */
export interface VariationRow {
  period: string;
  l14: number | null;
  vol: number | null;
  cost_per_unit: number | null;
}

export interface GroupVariationRow extends VariationRow {
  group: string;
}

export type MoverDirection = 'gainers' | 'decliners';

export interface RankedMover {
  group: string;
  period: string;
  /** Variation of the ranked metric, rounded to 2 decimals */
  value: number;
  l14: number | null;
  vol: number | null;
  cost_per_unit: number | null;
}

export interface MoverBoard {
  gainers: RankedMover[];
  decliners: RankedMover[];
}

export type MoverBoards = Record<MetricId, MoverBoard>;

export interface PeriodComparison {
  current: PeriodTotals;
  previous: PeriodTotals;
  variation: VariationRow;
}

export interface MetricDefinition {
  id: MetricId;
  display_name: string;
  description: string;
  unit_type: 'currency' | 'volume' | 'ratio';
  aggregation: 'sum' | 'derived';
  source_columns: CanonicalColumn[];
}

export interface MergeProvenance {
  historical_rows: number;
  incoming_rows: number;
  merged_rows: number;
  superseded_rows: number;
  periods: string[];
  new_periods: string[];
  dedup_strategy: string;
  notes: string[];
}

export interface AnalysisResult {
  records: RecordTable;
  totals: PeriodTotals[];
  variations: VariationRow[];
  brand_totals: GroupTotals[] | null;
  brand_variations: GroupVariationRow[] | null;
  movers: MoverBoards;
  report: string;
  prediction: {
    predictor: string;
    next_cost_per_unit: number | null;
  };
  provenance: MergeProvenance;
}
