/**
 * Core analysis engine.
 *
 * Runs the merge → aggregate → variation → ranking pipeline and returns
 * data (never prints). Used by the CLI, the web API and the MCP server.
 * Domain failures come back as typed errors; anything unexpected throws.
 */

import { respondToQuery, type QueryAnswer } from '../analysis/responder.js';
import { buildMergeProvenance } from '../analysis/provenance.js';
import { aggregateBy, aggregateByPeriod, hasBrandData } from '../processing/aggregator.js';
import { calculateGroupVariations, calculateVariations } from '../processing/calculations.js';
import { mergeRecords } from '../processing/merge.js';
import { rankAllMovers, topMovers } from '../processing/movers.js';
import { createPredictor, type TrendPredictor } from '../processing/predictors.js';
import { generateReport } from '../output/report-renderer.js';
import { hashContent, type AnalysisCache } from './analysis-cache.js';
import { comparePeriods } from './period.js';
import {
  IngestError,
  InsufficientPeriodsError,
  MissingKeyError,
  PeriodFormatError,
  PeriodNotFoundError,
  SchemaError,
} from './errors.js';
import type {
  AnalysisResult,
  GroupTotals,
  GroupVariationRow,
  MetricId,
  MoverDirection,
  PeriodTotals,
  RankedMover,
  RecordTable,
  VariationRow,
} from './types.js';

export interface AnalysisParams {
  historical: RecordTable;
  incoming?: RecordTable;
  /** Period to report on; defaults to the latest */
  period?: string;
  topN?: number;
}

export interface AskParams extends AnalysisParams {
  question: string;
}

export interface MoversParams extends AnalysisParams {
  metric: MetricId;
  direction: MoverDirection;
}

export interface EngineDeps {
  predictor?: TrendPredictor;
  cache?: AnalysisCache<AnalysisResult>;
}

export type EngineErrorType =
  | 'missing_key'
  | 'schema'
  | 'period_format'
  | 'insufficient_periods'
  | 'period_not_found'
  | 'ingest';

export interface EngineError {
  type: EngineErrorType;
  message: string;
  missing?: string[];
  availablePeriods?: string[];
}

export type EngineResult<T> =
  | { success: true; result: T }
  | { success: false; error: EngineError };

interface Prepared {
  merged: RecordTable;
  totals: PeriodTotals[];
  variations: VariationRow[];
}

const DEFAULT_TOP_N = 5;

function emptyLike(table: RecordTable): RecordTable {
  return { columns: [...table.columns], rows: [] };
}

function upTo(table: RecordTable, period: string | undefined): RecordTable {
  if (period === undefined) return table;
  return { columns: table.columns, rows: table.rows.filter(r => comparePeriods(r.period, period) <= 0) };
}

function prepare(params: AnalysisParams): Prepared {
  const merged = mergeRecords(params.historical, params.incoming ?? emptyLike(params.historical));
  const totals = aggregateByPeriod(merged);
  const variations = calculateVariations(totals);

  if (params.period !== undefined && !totals.some(t => t.period === params.period)) {
    throw new PeriodNotFoundError(params.period, totals.map(t => t.period));
  }

  return { merged, totals, variations };
}

function analyze(params: AnalysisParams, prepared: Prepared, predictor: TrendPredictor): AnalysisResult {
  const { merged, totals, variations } = prepared;
  const topN = params.topN ?? DEFAULT_TOP_N;

  const entityVariations = calculateGroupVariations(aggregateBy(upTo(merged, params.period), 'entity_id'));

  let brandTotals: GroupTotals[] | null = null;
  let brandVariations: GroupVariationRow[] | null = null;
  if (hasBrandData(merged)) {
    brandTotals = aggregateBy(merged, 'brand');
    brandVariations = calculateGroupVariations(brandTotals);
  }

  return {
    records: merged,
    totals,
    variations,
    brand_totals: brandTotals,
    brand_variations: brandVariations,
    movers: rankAllMovers(entityVariations, topN),
    report: generateReport(totals, variations, params.period),
    prediction: {
      predictor: predictor.name,
      next_cost_per_unit: predictor.predictNext(totals.map(t => t.cost_per_unit)),
    },
    provenance: buildMergeProvenance(
      params.historical,
      params.incoming ?? emptyLike(params.historical),
      merged
    ),
  };
}

/**
 * Full analysis of a historical table plus an optional new batch.
 */
export function runAnalysis(params: AnalysisParams, deps: EngineDeps = {}): EngineResult<AnalysisResult> {
  const predictor = deps.predictor ?? createPredictor('linear');

  return guard(() => {
    const prepared = prepare(params);
    if (!deps.cache) return analyze(params, prepared, predictor);

    const key = hashContent({
      historical: params.historical,
      incoming: params.incoming ?? null,
      period: params.period ?? null,
      topN: params.topN ?? DEFAULT_TOP_N,
      predictor: predictor.name,
    });
    return deps.cache.getOrCompute(key, () => analyze(params, prepared, predictor));
  });
}

/**
 * Answer one question against the merged records.
 */
export function runAsk(params: AskParams): EngineResult<QueryAnswer & { period: string | null }> {
  return guard(() => {
    const { merged, totals, variations } = prepare(params);
    const answer = respondToQuery(
      { records: merged, totals, variations },
      params.question,
      { period: params.period, topN: params.topN }
    );
    const period = params.period ?? (totals.length > 0 ? totals[totals.length - 1].period : null);
    return { ...answer, period };
  });
}

/**
 * Ranked IDH movers for one metric and direction. With a period, only rows
 * up to and including it are considered.
 */
export function runMovers(params: MoversParams): EngineResult<RankedMover[]> {
  return guard(() => {
    const { merged } = prepare(params);
    const variations = calculateGroupVariations(aggregateBy(upTo(merged, params.period), 'entity_id'));
    return topMovers(variations, params.metric, params.topN ?? DEFAULT_TOP_N, params.direction);
  });
}

function guard<T>(fn: () => T): EngineResult<T> {
  try {
    return { success: true, result: fn() };
  } catch (err) {
    return { success: false, error: toEngineError(err) };
  }
}

/**
 * Map a domain error to its engine error shape. Errors outside the domain
 * taxonomy are rethrown for the caller to surface.
 */
export function toEngineError(err: unknown): EngineError {
  if (err instanceof MissingKeyError) {
    return { type: 'missing_key', message: err.message, missing: err.missing };
  }
  if (err instanceof PeriodFormatError) {
    return { type: 'period_format', message: err.message };
  }
  if (err instanceof SchemaError) {
    return { type: 'schema', message: err.message, missing: err.missing };
  }
  if (err instanceof InsufficientPeriodsError) {
    return { type: 'insufficient_periods', message: err.message };
  }
  if (err instanceof PeriodNotFoundError) {
    return { type: 'period_not_found', message: err.message, availablePeriods: err.availablePeriods };
  }
  if (err instanceof IngestError) {
    return { type: 'ingest', message: err.message };
  }
  throw err;
}
