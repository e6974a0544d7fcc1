import { describe, it, expect, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import {
  detectVolumeColumn,
  normalizeColumnName,
  normalizeRows,
  resolveCanonicalColumns,
  toNumber,
} from '../src/ingest/column-normalizer.js';
import { loadWorkbook, parseWorkbook } from '../src/ingest/workbook-loader.js';
import { IngestError } from '../src/core/errors.js';

function xlsxBuffer(sheets: Record<string, Array<Record<string, unknown>>>): Buffer {
  const wb = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(rows), name);
  }
  return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
}

describe('normalizeColumnName', () => {
  it('upper-cases and trims', () => {
    expect(normalizeColumnName('  l14 ')).toBe('L14');
  });

  it('keeps Ñ and folds other accents', () => {
    expect(normalizeColumnName('Año')).toBe('AÑO');
    expect(normalizeColumnName('Período')).toBe('PERIODO');
  });

  it('drops punctuation and joins words with underscores', () => {
    expect(normalizeColumnName('Volumen (kg)')).toBe('VOLUMEN_KG');
    expect(normalizeColumnName('Main Material Code')).toBe('MAIN_MATERIAL_CODE');
  });
});

describe('detectVolumeColumn', () => {
  it('prefers an exact VOL', () => {
    expect(detectVolumeColumn(['VOLUMEN', 'VOL'])).toBe('VOL');
  });

  it('accepts VOL prefixes and QTY', () => {
    expect(detectVolumeColumn(['L14', 'VOLUMEN_KG'])).toBe('VOLUMEN_KG');
    expect(detectVolumeColumn(['L14', 'TOTAL_QTY'])).toBe('TOTAL_QTY');
  });

  it('falls back to any header containing VOL', () => {
    expect(detectVolumeColumn(['L14', 'NET_VOL'])).toBe('NET_VOL');
  });

  it('throws IngestError when nothing matches', () => {
    expect(() => detectVolumeColumn(['L14', 'PRECIO'], 'ventas.xlsx')).toThrow(IngestError);
  });
});

describe('resolveCanonicalColumns', () => {
  it('uses PERIODO directly', () => {
    const mapping = resolveCanonicalColumns(['PERIODO', 'IDH', 'L14', 'VOL']);
    expect(mapping.period).toEqual({ kind: 'column', column: 'PERIODO' });
    expect(mapping.entity).toBe('IDH');
    expect(mapping.brand).toBeNull();
  });

  it('builds the period from year and month columns', () => {
    const mapping = resolveCanonicalColumns(['AÑO', 'MES', 'MAIN_MATERIAL_CODE', 'PSV_BRAND', 'L14', 'VOL']);
    expect(mapping.period).toEqual({ kind: 'year_month', year: 'AÑO', month: 'MES' });
    expect(mapping.entity).toBe('MAIN_MATERIAL_CODE');
    expect(mapping.brand).toBe('PSV_BRAND');
  });

  it('throws without any period source', () => {
    expect(() => resolveCanonicalColumns(['IDH', 'L14', 'VOL'])).toThrow(IngestError);
  });

  it('throws without L14', () => {
    expect(() => resolveCanonicalColumns(['PERIODO', 'IDH', 'VOL'])).toThrow("Column 'L14' not found");
  });
});

describe('toNumber', () => {
  it('parses numeric text', () => {
    expect(toNumber(' 12.5 ')).toBe(12.5);
    expect(toNumber(7)).toBe(7);
  });

  it('maps blanks and text to null', () => {
    expect(toNumber('')).toBeNull();
    expect(toNumber('n/a')).toBeNull();
    expect(toNumber(null)).toBeNull();
  });
});

describe('normalizeRows', () => {
  it('maps spreadsheet headers onto canonical records', () => {
    const table = normalizeRows([
      { 'Año': 2024, 'Mes': 3, 'IDH': 1001, 'Marca': 'Alfa', 'L14': '100', 'Volumen': 10 },
    ]);
    expect(table.columns).toEqual(['PERIOD', 'ENTITY_ID', 'BRAND', 'L14', 'VOL']);
    expect(table.rows).toEqual([{ period: '2024-03', entity_id: '1001', brand: 'Alfa', l14: 100, vol: 10 }]);
  });

  it('leaves missing key values empty for the merge to reject', () => {
    const table = normalizeRows([{ PERIODO: null, IDH: 'A', L14: 1, VOL: 1 }]);
    expect(table.rows[0].period).toBe('');
  });

  it('omits ENTITY_ID and BRAND when the source has neither', () => {
    expect(normalizeRows([{ PERIODO: '2024-01', L14: 1, VOL: 1 }]).columns).toEqual(['PERIOD', 'L14', 'VOL']);
  });
});

describe('parseWorkbook', () => {
  it('reads the first sheet of an xlsx workbook', () => {
    const buf = xlsxBuffer({
      Datos: [
        { PERIODO: '2024-01', IDH: 'A', MARCA: 'Alfa', L14: 100, VOL: 10 },
        { PERIODO: '2024-02', IDH: 'A', MARCA: 'Alfa', L14: 120, VOL: 10 },
      ],
    });
    const table = parseWorkbook(buf);
    expect(table.rows).toEqual([
      { period: '2024-01', entity_id: 'A', brand: 'Alfa', l14: 100, vol: 10 },
      { period: '2024-02', entity_id: 'A', brand: 'Alfa', l14: 120, vol: 10 },
    ]);
  });

  it('reads a named sheet', () => {
    const buf = xlsxBuffer({
      Resumen: [{ NOTA: 'x' }],
      Datos: [{ PERIODO: '2024-01', IDH: 'B', L14: 5, VOL: 1 }],
    });
    expect(parseWorkbook(buf, { sheet: 'Datos' }).rows[0].entity_id).toBe('B');
  });

  it('throws IngestError for a missing sheet', () => {
    const buf = xlsxBuffer({ Datos: [{ PERIODO: '2024-01', IDH: 'B', L14: 5, VOL: 1 }] });
    expect(() => parseWorkbook(buf, { sheet: 'Otra' })).toThrow('Sheet "Otra" not found. Available sheets: Datos');
  });

  it('reads CSV text without coercing periods to dates', () => {
    const table = parseWorkbook('PERIODO,IDH,L14,VOL\n2024-01,A,100,10\n2024-02,A,120,12\n');
    expect(table.rows).toEqual([
      { period: '2024-01', entity_id: 'A', brand: null, l14: 100, vol: 10 },
      { period: '2024-02', entity_id: 'A', brand: null, l14: 120, vol: 12 },
    ]);
  });

  it('throws IngestError for a sheet without data rows', () => {
    expect(() => parseWorkbook('PERIODO,IDH,L14,VOL\n')).toThrow(IngestError);
  });
});

describe('loadWorkbook', () => {
  let dir: string | undefined;

  afterAll(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('loads a CSV file from disk', async () => {
    dir = await mkdtemp(join(tmpdir(), 'kpi-nl-'));
    const path = join(dir, 'nuevo.csv');
    await writeFile(path, 'Año,Mes,IDH,L14,VOL\n2024,4,A,90,9\n', 'utf8');

    const table = await loadWorkbook(path);
    expect(table.rows).toEqual([{ period: '2024-04', entity_id: 'A', brand: null, l14: 90, vol: 9 }]);
  });

  it('throws IngestError for a missing file', async () => {
    await expect(loadWorkbook(join(tmpdir(), 'kpi-nl-missing', 'nada.xlsx'))).rejects.toBeInstanceOf(IngestError);
  });
});
