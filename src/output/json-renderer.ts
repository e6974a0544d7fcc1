import type { AnalysisResult } from '../core/types.js';

/**
 * Renders analysis results as structured JSON for programmatic use.
 * Raw records are summarized by count; everything derived is included.
 */

export function serializeAnalysis(result: AnalysisResult) {
  return {
    records: {
      columns: result.records.columns,
      row_count: result.records.rows.length,
    },
    totals: result.totals,
    variations: result.variations,
    brands: result.brand_totals
      ? { totals: result.brand_totals, variations: result.brand_variations }
      : null,
    movers: result.movers,
    report: result.report,
    prediction: result.prediction,
    provenance: result.provenance,
  };
}

export function renderAnalysisJson(result: AnalysisResult): string {
  return JSON.stringify(serializeAnalysis(result), null, 2);
}
