/**
 * Shared helpers for the web API layer.
 * Request body schemas, record table conversion and error → HTTP status mapping.
 */

import { z } from 'zod';
import type { CanonicalColumn, FinancialRecord, RecordTable } from '../core/types.js';
import { CANONICAL_COLUMNS, METRIC_IDS } from '../core/types.js';
import { toNumber } from '../ingest/column-normalizer.js';

// ── Error Mapping ─────────────────────────────────────────────────────

const ERROR_STATUS_MAP: Record<string, number> = {
  validation: 400,
  missing_key: 400,
  schema: 400,
  period_format: 400,
  ingest: 400,
  period_not_found: 404,
  insufficient_periods: 422,
};

export function errorToHttpStatus(errorType: string): number {
  return ERROR_STATUS_MAP[errorType] ?? 500;
}

// ── Request Schemas ───────────────────────────────────────────────────

const nullableNumber = z.union([z.number(), z.string(), z.null()]).optional();

/**
 * Loose record shape: keys may be missing (the merge boundary reports
 * that as missing_key) and numbers may arrive as strings.
 */
export const RecordInputSchema = z.object({
  period: z.union([z.string(), z.number()]).optional(),
  entity_id: z.union([z.string(), z.number()]).optional(),
  brand: z.string().nullable().optional(),
  l14: nullableNumber,
  vol: nullableNumber,
});

export type RecordInput = z.infer<typeof RecordInputSchema>;

export const AnalyzeBodySchema = z.object({
  historical: z.array(RecordInputSchema),
  incoming: z.array(RecordInputSchema).optional(),
  period: z.string().min(1).optional(),
  top_n: z.number().int().min(1).max(100).optional(),
});

export const AskBodySchema = AnalyzeBodySchema.extend({
  question: z.string(),
});

export const MoversBodySchema = AnalyzeBodySchema.extend({
  metric: z.enum(METRIC_IDS).default('cost_per_unit'),
  direction: z.enum(['gainers', 'decliners']).default('gainers'),
});

export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

// ── Record Conversion ─────────────────────────────────────────────────

const FIELD_COLUMNS: Array<[keyof RecordInput, CanonicalColumn]> = [
  ['period', 'PERIOD'],
  ['entity_id', 'ENTITY_ID'],
  ['brand', 'BRAND'],
  ['l14', 'L14'],
  ['vol', 'VOL'],
];

/**
 * Build a RecordTable from JSON records. A column counts as delivered when
 * at least one record carries the field, as with a table built from them.
 */
export function tableFromInput(records: RecordInput[]): RecordTable {
  const present = new Set<CanonicalColumn>();
  for (const r of records) {
    for (const [field, column] of FIELD_COLUMNS) {
      if (r[field] !== undefined) present.add(column);
    }
  }

  const rows: FinancialRecord[] = records.map(r => ({
    period: r.period === undefined ? '' : String(r.period).trim(),
    entity_id: r.entity_id === undefined ? '' : String(r.entity_id).trim(),
    brand: r.brand ?? null,
    l14: toNumber(r.l14),
    vol: toNumber(r.vol),
  }));

  return { columns: CANONICAL_COLUMNS.filter(c => present.has(c)), rows };
}
