import { SchemaError } from '../core/errors.js';
import { comparePeriods } from '../core/period.js';
import type { GroupTotals, PeriodTotals, RecordTable, VariationRow } from '../core/types.js';
import { aggregateBy } from '../processing/aggregator.js';
import { calculateGroupVariations } from '../processing/calculations.js';
import { topMovers } from '../processing/movers.js';
import { formatNumber, padRight } from '../output/format-utils.js';
import { renderMoverBoardText } from '../output/movers-renderer.js';
import { classifyQuery, type QueryIntent } from './query-parser.js';

/**
 * Answers a free-text question from precomputed aggregates.
 *
 * Every answer is text: data problems (missing columns, empty series,
 * unknown period) come back as a message. Only a malformed call (no
 * context, non-string question, bad topN) throws.
 */

export const HELP_TEXT =
  "No entendí la pregunta. Prueba: 'top idh', 'costo unitario ultimo', 'variacion l14', 'volumen ultimo'.";

export interface QueryContext {
  records: RecordTable;
  totals: PeriodTotals[];
  variations: VariationRow[];
}

export interface QueryOptions {
  /** Period to answer about; defaults to the latest */
  period?: string;
  /** Rows per ranked list (default 5) */
  topN?: number;
}

export interface QueryAnswer {
  intent: QueryIntent;
  text: string;
}

interface ResolvedOptions {
  period: string | undefined;
  topN: number;
}

type Handler = (ctx: QueryContext, opts: ResolvedOptions) => string;

type Target =
  | { ok: true; index: number; row: PeriodTotals; label: string }
  | { ok: false; message: string };

export function respondToQuery(context: QueryContext, question: string, options: QueryOptions = {}): QueryAnswer {
  assertContext(context);
  if (typeof question !== 'string') {
    throw new TypeError(`question must be a string, got ${typeof question}`);
  }

  const topN = options.topN ?? 5;
  if (!Number.isInteger(topN) || topN < 1) {
    throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }

  const intent = classifyQuery(question);
  return { intent, text: HANDLERS[intent](context, { period: options.period, topN }) };
}

const HANDLERS: Record<QueryIntent, Handler> = {
  top_movers: answerTopMovers,
  unit_cost: answerUnitCost,
  l14_variation: answerL14Variation,
  volume: answerVolume,
  worst_brands: answerWorstBrands,
  help: () => HELP_TEXT,
};

function answerTopMovers(ctx: QueryContext, opts: ResolvedOptions): string {
  if (!ctx.records.columns.includes('ENTITY_ID')) {
    return 'No hay columna IDH en los datos; no se puede calcular el top por IDH.';
  }

  const target = resolveTarget(ctx.totals, opts.period);
  if (!target.ok) return target.message;

  const rows = ctx.records.rows.filter(r => comparePeriods(r.period, target.row.period) <= 0);
  let entityTotals: GroupTotals[];
  try {
    entityTotals = aggregateBy({ columns: ctx.records.columns, rows }, 'entity_id');
  } catch (err) {
    if (err instanceof SchemaError) return `No se pudo calcular el top por IDH: ${err.message}`;
    throw err;
  }

  const variations = calculateGroupVariations(entityTotals);
  const board = {
    gainers: topMovers(variations, 'cost_per_unit', opts.topN, 'gainers'),
    decliners: topMovers(variations, 'cost_per_unit', opts.topN, 'decliners'),
  };

  if (board.gainers.length === 0) {
    return 'No hay suficientes periodos por IDH para calcular variaciones de costo unitario.';
  }

  return renderMoverBoardText(board, 'cost_per_unit');
}

function answerUnitCost(ctx: QueryContext, opts: ResolvedOptions): string {
  const target = resolveTarget(ctx.totals, opts.period);
  if (!target.ok) return target.message;

  const value = target.row.cost_per_unit;
  if (value === null) {
    return `Costo unitario no disponible para el ${target.label} (volumen total en cero).`;
  }
  return `Costo unitario ${target.label}: ${formatNumber(value)}`;
}

function answerL14Variation(ctx: QueryContext, opts: ResolvedOptions): string {
  const target = resolveTarget(ctx.totals, opts.period);
  if (!target.ok) return target.message;

  if (target.index === 0) {
    return `No existe periodo anterior para calcular la variación de L14 (${target.row.period}).`;
  }

  const variation = ctx.variations.find(v => v.period === target.row.period);
  if (!variation) {
    return `No hay variaciones calculadas para el periodo ${target.row.period}.`;
  }
  if (variation.l14 === null) {
    return `Variación de L14 no disponible para el ${target.label} (L14 anterior en cero o vacío).`;
  }
  return `Variación % de L14 ${target.label}: ${formatNumber(variation.l14)}%`;
}

function answerVolume(ctx: QueryContext, opts: ResolvedOptions): string {
  const target = resolveTarget(ctx.totals, opts.period);
  if (!target.ok) return target.message;

  return `Volumen total ${target.label}: ${formatNumber(target.row.vol)}`;
}

function answerWorstBrands(ctx: QueryContext, opts: ResolvedOptions): string {
  if (!ctx.records.columns.includes('BRAND')) {
    return 'No hay columna de marca en los datos; no se puede calcular el top por marca.';
  }

  const target = resolveTarget(ctx.totals, opts.period);
  if (!target.ok) return target.message;

  let brandTotals: GroupTotals[];
  try {
    brandTotals = aggregateBy(ctx.records, 'brand');
  } catch (err) {
    if (err instanceof SchemaError) return `No se pudo calcular el top por marca: ${err.message}`;
    throw err;
  }

  const ranked = brandTotals
    .filter(b => b.period === target.row.period)
    .sort((a, b) => b.l14 - a.l14)
    .slice(0, opts.topN);

  if (ranked.length === 0) {
    return `No hay datos por marca para el periodo ${target.row.period}.`;
  }

  const width = Math.max(...ranked.map(b => b.group.length)) + 2;
  const lines = [`Top marcas por L14 (${target.label}):`];
  for (const b of ranked) {
    lines.push(`  ${padRight(b.group, width)}${formatNumber(b.l14)}`);
  }
  return lines.join('\n');
}

function resolveTarget(totals: PeriodTotals[], period: string | undefined): Target {
  if (totals.length === 0) {
    return { ok: false, message: 'No hay datos de totales por periodo.' };
  }

  if (period === undefined) {
    const index = totals.length - 1;
    const row = totals[index];
    return { ok: true, index, row, label: `último periodo (${row.period})` };
  }

  const index = totals.findIndex(t => t.period === period);
  if (index === -1) {
    return {
      ok: false,
      message: `El periodo ${period} no existe en los datos. Periodos disponibles: ${totals.map(t => t.period).join(', ')}`,
    };
  }
  return { ok: true, index, row: totals[index], label: `periodo ${period}` };
}

function assertContext(context: QueryContext): void {
  if (
    !context ||
    !context.records ||
    !Array.isArray(context.records.rows) ||
    !Array.isArray(context.records.columns) ||
    !Array.isArray(context.totals) ||
    !Array.isArray(context.variations)
  ) {
    throw new TypeError('respondToQuery requires a context with records, totals and variations');
  }
}
