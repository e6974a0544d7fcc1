import { describe, it, expect } from 'vitest';
import { runAnalysis, runAsk, runMovers } from '../src/core/analysis-engine.js';
import { AnalysisCache } from '../src/core/analysis-cache.js';
import { NoPredictor } from '../src/processing/predictors.js';
import { serializeAnalysis } from '../src/output/json-renderer.js';
import type { AnalysisResult, CanonicalColumn, FinancialRecord, RecordTable } from '../src/core/types.js';

const COLUMNS: CanonicalColumn[] = ['PERIOD', 'ENTITY_ID', 'BRAND', 'L14', 'VOL'];

function rec(period: string, entity_id: string, brand: string | null, l14: number | null, vol: number | null): FinancialRecord {
  return { period, entity_id, brand, l14, vol };
}

function table(rows: FinancialRecord[], columns: CanonicalColumn[] = COLUMNS): RecordTable {
  return { columns, rows };
}

const HISTORICAL = table([
  rec('2024-01', 'A', 'Alfa', 100, 10),
  rec('2024-01', 'B', 'Beta', 200, 40),
  rec('2024-02', 'A', 'Alfa', 150, 10),
  rec('2024-02', 'B', 'Beta', 180, 40),
]);

const INCOMING = table([
  rec('2024-02', 'B', 'Beta', 220, 40),
  rec('2024-03', 'A', 'Alfa', 160, 10),
  rec('2024-03', 'B', 'Beta', 200, 40),
]);

function analyzed(): AnalysisResult {
  const result = runAnalysis({ historical: HISTORICAL, incoming: INCOMING });
  if (!result.success) throw new Error(result.error.message);
  return result.result;
}

describe('runAnalysis', () => {
  it('merges the incoming batch over the history', () => {
    const r = analyzed();
    expect(r.records.rows.map(x => `${x.period}/${x.entity_id}/${x.l14}`)).toEqual([
      '2024-01/A/100',
      '2024-01/B/200',
      '2024-02/A/150',
      '2024-02/B/220',
      '2024-03/A/160',
      '2024-03/B/200',
    ]);
  });

  it('totals each period with its variation', () => {
    const r = analyzed();
    expect(r.totals).toEqual([
      { period: '2024-01', l14: 300, vol: 50, cost_per_unit: 6 },
      { period: '2024-02', l14: 370, vol: 50, cost_per_unit: 7.4 },
      { period: '2024-03', l14: 360, vol: 50, cost_per_unit: 7.2 },
    ]);
    expect(r.variations[0].l14).toBeNull();
    expect(r.variations[1].l14).toBeCloseTo(23.3333, 4);
    expect(r.variations[2].l14).toBeCloseTo(-2.7027, 4);
  });

  it('ranks IDH by their latest unit cost variation', () => {
    const { cost_per_unit } = analyzed().movers;
    expect(cost_per_unit.gainers.map(m => [m.group, m.value])).toEqual([['A', 6.67], ['B', -9.09]]);
    expect(cost_per_unit.decliners.map(m => m.group)).toEqual(['B', 'A']);
  });

  it('includes brand totals when brands are present', () => {
    const r = analyzed();
    expect(r.brand_totals?.filter(b => b.period === '2024-03').map(b => [b.group, b.l14])).toEqual([
      ['Alfa', 160],
      ['Beta', 200],
    ]);
    expect(r.brand_variations).toHaveLength(6);
  });

  it('leaves brand totals null without brand data', () => {
    const noBrand = table([rec('2024-01', 'A', null, 1, 1)], ['PERIOD', 'ENTITY_ID', 'L14', 'VOL']);
    const result = runAnalysis({ historical: noBrand });
    expect(result.success && result.result.brand_totals).toBeNull();
  });

  it('reports on the latest period', () => {
    const r = analyzed();
    expect(r.report).toContain('PERIODO ANALIZADO: 2024-03');
    expect(r.report).toContain('Resultados (vs periodo anterior 2024-02):');
    expect(r.report).toContain('- El costo unitario bajó respecto al periodo anterior.');
  });

  it('forecasts the next unit cost with the linear predictor by default', () => {
    const r = analyzed();
    expect(r.prediction.predictor).toBe('linear');
    expect(r.prediction.next_cost_per_unit).toBeCloseTo(8.0667, 4);
  });

  it('uses the injected predictor', () => {
    const result = runAnalysis({ historical: HISTORICAL }, { predictor: new NoPredictor() });
    expect(result.success && result.result.prediction).toEqual({ predictor: 'none', next_cost_per_unit: null });
  });

  it('describes the merge', () => {
    expect(analyzed().provenance).toEqual({
      historical_rows: 4,
      incoming_rows: 3,
      merged_rows: 6,
      superseded_rows: 1,
      periods: ['2024-01', '2024-02', '2024-03'],
      new_periods: ['2024-03'],
      dedup_strategy: 'Last occurrence kept per (period, IDH); incoming rows replace historical ones',
      notes: [],
    });
  });

  it('flags IDH with calendar gaps', () => {
    const gapped = table([
      rec('2024-01', 'A', null, 1, 1),
      rec('2024-02', 'B', null, 1, 1),
      rec('2024-03', 'A', null, 1, 1),
    ]);
    const result = runAnalysis({ historical: gapped });
    expect(result.success && result.result.provenance.notes).toEqual([
      'IDH missing from some periods (variation compares with their last present period): A',
    ]);
  });

  it('ranks movers only up to a selected period', () => {
    const result = runAnalysis({ historical: HISTORICAL, incoming: INCOMING, period: '2024-02' });
    if (!result.success) throw new Error(result.error.message);
    expect(result.result.movers.cost_per_unit.gainers.map(m => [m.group, m.value])).toEqual([['A', 50], ['B', 10]]);
    expect(result.result.report).toContain('PERIODO ANALIZADO: 2024-02');
  });

  it('serves a repeated request from the cache', () => {
    const cache = new AnalysisCache<AnalysisResult>();
    const first = runAnalysis({ historical: HISTORICAL, incoming: INCOMING }, { cache });
    const second = runAnalysis({ historical: HISTORICAL, incoming: INCOMING }, { cache });
    expect(first.success && second.success && first.result === second.result).toBe(true);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it('misses the cache when the records change', () => {
    const cache = new AnalysisCache<AnalysisResult>();
    runAnalysis({ historical: HISTORICAL }, { cache });
    runAnalysis({ historical: HISTORICAL, incoming: INCOMING }, { cache });
    expect(cache.stats().misses).toBe(2);
  });

  describe('errors', () => {
    it('returns missing_key when the incoming batch lacks a key column', () => {
      const incoming = table([rec('2024-03', '', null, 1, 1)], ['PERIOD', 'L14', 'VOL']);
      const result = runAnalysis({ historical: HISTORICAL, incoming });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('missing_key');
        expect(result.error.missing).toEqual(['ENTITY_ID']);
      }
    });

    it('returns schema when VOL is absent', () => {
      const noVol = table([rec('2024-01', 'A', null, 1, null)], ['PERIOD', 'ENTITY_ID', 'L14']);
      const result = runAnalysis({ historical: noVol });
      expect(!result.success && result.error.type).toBe('schema');
    });

    it('returns period_format for mixed-width periods', () => {
      const mixed = table([rec('2024-9', 'A', null, 1, 1), rec('2024-10', 'A', null, 1, 1)]);
      const result = runAnalysis({ historical: mixed });
      expect(!result.success && result.error.type).toBe('period_format');
    });

    it('returns period_not_found with the available periods', () => {
      const result = runAnalysis({ historical: HISTORICAL, period: '2023-12' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('period_not_found');
        expect(result.error.availablePeriods).toEqual(['2024-01', '2024-02']);
      }
    });

    it('rethrows errors outside the domain', () => {
      expect(() => runAnalysis({ historical: HISTORICAL, topN: -1 })).toThrow(RangeError);
    });
  });
});

describe('runAsk', () => {
  it('answers against the merged records', () => {
    const result = runAsk({ historical: HISTORICAL, incoming: INCOMING, question: 'costo unitario ultimo' });
    expect(result).toEqual({
      success: true,
      result: { intent: 'unit_cost', text: 'Costo unitario último periodo (2024-03): 7.20', period: '2024-03' },
    });
  });

  it('echoes the selected period', () => {
    const result = runAsk({ historical: HISTORICAL, question: 'volumen', period: '2024-01' });
    expect(result.success && result.result.period).toBe('2024-01');
    expect(result.success && result.result.text).toBe('Volumen total periodo 2024-01: 50.00');
  });

  it('reports a null period for an empty table', () => {
    const result = runAsk({ historical: table([]), question: 'volumen' });
    expect(result.success && result.result).toEqual({
      intent: 'volume',
      text: 'No hay datos de totales por periodo.',
      period: null,
    });
  });
});

describe('runMovers', () => {
  it('ranks one metric in one direction', () => {
    const result = runMovers({
      historical: HISTORICAL,
      incoming: INCOMING,
      metric: 'cost_per_unit',
      direction: 'decliners',
      topN: 1,
    });
    expect(result.success && result.result.map(m => [m.group, m.value])).toEqual([['B', -9.09]]);
  });

  it('keeps sequence order for tied variations', () => {
    const result = runMovers({ historical: HISTORICAL, metric: 'vol', direction: 'decliners' });
    expect(result.success && result.result.map(m => [m.group, m.value])).toEqual([['A', 0], ['B', 0]]);
  });

  it('only considers rows up to a selected period', () => {
    const result = runMovers({ historical: HISTORICAL, metric: 'l14', direction: 'gainers', period: '2024-01' });
    expect(result.success && result.result).toEqual([]);
  });
});

describe('serializeAnalysis', () => {
  it('summarizes records by count and nests brand data', () => {
    const json = serializeAnalysis(analyzed());
    expect(json.records).toEqual({ columns: COLUMNS, row_count: 6 });
    expect(json.brands?.totals).toHaveLength(6);
    expect(json.totals).toHaveLength(3);
  });
});
