import { describe, it, expect } from 'vitest';
import { mergeRecords } from '../src/processing/merge.js';
import { MissingKeyError } from '../src/core/errors.js';
import type { CanonicalColumn, FinancialRecord, RecordTable } from '../src/core/types.js';

const ALL: CanonicalColumn[] = ['PERIOD', 'ENTITY_ID', 'L14', 'VOL'];

function rec(period: string, entity_id: string, l14: number | null, vol: number | null, brand: string | null = null): FinancialRecord {
  return { period, entity_id, brand, l14, vol };
}

function table(rows: FinancialRecord[], columns: CanonicalColumn[] = ALL): RecordTable {
  return { columns, rows };
}

describe('mergeRecords', () => {
  it('replaces a historical row with the incoming row of the same key', () => {
    const merged = mergeRecords(
      table([rec('2024-01', 'A', 100, 10)]),
      table([rec('2024-01', 'A', 200, 20)])
    );
    expect(merged.rows).toEqual([rec('2024-01', 'A', 200, 20)]);
  });

  it('keeps rows with distinct keys in concatenation order', () => {
    const merged = mergeRecords(
      table([rec('2024-01', 'A', 1, 1), rec('2024-01', 'B', 2, 2)]),
      table([rec('2024-02', 'A', 3, 3)])
    );
    expect(merged.rows.map(r => `${r.period}/${r.entity_id}`)).toEqual(['2024-01/A', '2024-01/B', '2024-02/A']);
  });

  it('places a replaced key at the position of its last occurrence', () => {
    const merged = mergeRecords(
      table([rec('2024-01', 'A', 1, 1), rec('2024-01', 'B', 2, 2)]),
      table([rec('2024-01', 'A', 9, 9)])
    );
    expect(merged.rows).toEqual([rec('2024-01', 'B', 2, 2), rec('2024-01', 'A', 9, 9)]);
  });

  it('keeps the last of duplicates inside the incoming batch', () => {
    const merged = mergeRecords(
      table([]),
      table([rec('2024-01', 'A', 1, 1), rec('2024-01', 'A', 5, 5)])
    );
    expect(merged.rows).toEqual([rec('2024-01', 'A', 5, 5)]);
  });

  it('also dedupes within the historical table', () => {
    const merged = mergeRecords(
      table([rec('2024-01', 'A', 1, 1), rec('2024-01', 'A', 2, 2)]),
      table([])
    );
    expect(merged.rows).toEqual([rec('2024-01', 'A', 2, 2)]);
  });

  it('returns the historical rows when the incoming batch is empty', () => {
    const rows = [rec('2024-01', 'A', 1, 1), rec('2024-02', 'A', 2, 2)];
    expect(mergeRecords(table(rows), table([])).rows).toEqual(rows);
  });

  it('unions columns in canonical order', () => {
    const merged = mergeRecords(
      table([rec('2024-01', 'A', 1, 1)], ['PERIOD', 'ENTITY_ID', 'L14', 'VOL']),
      table([rec('2024-02', 'A', 1, 1, 'Alfa')], ['PERIOD', 'ENTITY_ID', 'BRAND', 'L14', 'VOL'])
    );
    expect(merged.columns).toEqual(['PERIOD', 'ENTITY_ID', 'BRAND', 'L14', 'VOL']);
  });

  it('does not mutate its inputs', () => {
    const historical = table([rec('2024-01', 'A', 1, 1)]);
    const incoming = table([rec('2024-01', 'A', 2, 2)]);
    mergeRecords(historical, incoming);
    expect(historical.rows).toEqual([rec('2024-01', 'A', 1, 1)]);
    expect(incoming.rows).toEqual([rec('2024-01', 'A', 2, 2)]);
  });

  it('throws MissingKeyError when the incoming batch has no entity column', () => {
    const incoming = table([rec('2024-01', '', 1, 1)], ['PERIOD', 'L14', 'VOL']);
    try {
      mergeRecords(table([]), incoming);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingKeyError);
      expect(err instanceof MissingKeyError && err.input).toBe('incoming');
      expect(err instanceof MissingKeyError && err.missing).toEqual(['ENTITY_ID']);
    }
  });

  it('throws MissingKeyError for an empty key value', () => {
    const historical = table([rec('2024-01', 'A', 1, 1), rec('', 'B', 1, 1)]);
    try {
      mergeRecords(historical, table([]));
      expect.unreachable();
    } catch (err) {
      expect(err instanceof MissingKeyError && err.rowIndex).toBe(1);
      expect(err instanceof MissingKeyError && err.missing).toEqual(['PERIOD']);
    }
  });
});
