import { IngestError } from '../core/errors.js';
import { periodFromYearMonth } from '../core/period.js';
import type { CanonicalColumn, FinancialRecord, RecordTable } from '../core/types.js';

/**
 * Maps the header variants found in monthly spreadsheets onto the canonical
 * record columns (PERIOD, ENTITY_ID, BRAND, L14, VOL).
 *
 * Headers are normalized first: trimmed, upper-cased, accents folded
 * (Ñ is kept, so "Año" becomes AÑO), punctuation dropped and spaces
 * turned into underscores.
 */

const ACCENT_FOLD: Record<string, string> = { Á: 'A', É: 'E', Í: 'I', Ó: 'O', Ú: 'U', Ü: 'U' };

const YEAR_CANDIDATES = ['AÑO', 'ANO', 'ANIO', 'YEAR'];
const MONTH_CANDIDATES = ['MES', 'MONTH'];
const BRAND_CANDIDATES = ['MARCA', 'PSV_BRAND', 'BRAND'];
const ENTITY_CANDIDATES = ['IDH', 'MAIN_MATERIAL_CODE', 'MATERIAL_CODE', 'MAIN_MATERIAL'];

export function normalizeColumnName(header: string): string {
  return header
    .trim()
    .toUpperCase()
    .replace(/[ÁÉÍÓÚÜ]/g, ch => ACCENT_FOLD[ch] ?? ch)
    .replace(/[^0-9A-ZÑ_ ]+/g, '')
    .replace(/ /g, '_');
}

export interface ColumnMapping {
  period: { kind: 'column'; column: string } | { kind: 'year_month'; year: string; month: string };
  entity: string | null;
  brand: string | null;
  l14: string;
  vol: string;
}

/**
 * Decide which normalized header feeds each canonical column.
 * Throws IngestError when no period source, L14 or volume column exists.
 */
export function resolveCanonicalColumns(headers: string[], source: string = 'input'): ColumnMapping {
  const has = (name: string) => headers.includes(name);
  const first = (candidates: string[]) => candidates.find(has) ?? null;

  let period: ColumnMapping['period'];
  if (has('PERIODO')) {
    period = { kind: 'column', column: 'PERIODO' };
  } else if (has('PERIOD')) {
    period = { kind: 'column', column: 'PERIOD' };
  } else {
    const year = first(YEAR_CANDIDATES);
    const month = first(MONTH_CANDIDATES);
    if (!year || !month) {
      throw new IngestError(
        `No PERIODO column and no detectable year/month pair. Columns found: ${headers.join(', ')}`,
        source
      );
    }
    period = { kind: 'year_month', year, month };
  }

  if (!has('L14')) {
    throw new IngestError(`Column 'L14' not found. Columns: ${headers.join(', ')}`, source);
  }

  return {
    period,
    entity: first(ENTITY_CANDIDATES) ?? (has('ENTITY_ID') ? 'ENTITY_ID' : null),
    brand: first(BRAND_CANDIDATES),
    l14: 'L14',
    vol: detectVolumeColumn(headers, source),
  };
}

/** Prefer an exact VOL, then VOL*, *VOLUME* or *QTY*, then anything containing VOL */
export function detectVolumeColumn(headers: string[], source: string = 'input'): string {
  if (headers.includes('VOL')) return 'VOL';

  const strict = headers.find(h => h.startsWith('VOL') || h.includes('VOLUME') || h.includes('QTY'));
  if (strict) return strict;

  const loose = headers.find(h => h.includes('VOL'));
  if (loose) return loose;

  throw new IngestError(
    `No volume column found (VOL, VOLUMEN, QTY, ...). Columns available: ${headers.join(', ')}`,
    source
  );
}

/** Numeric cell or null; non-numeric text becomes null rather than failing */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const n = Number(trimmed);
    return isFinite(n) ? n : null;
  }
  return null;
}

function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' && !isFinite(value)) return null;
  const text = String(value).trim();
  return text === '' ? null : text;
}

/**
 * Turn raw spreadsheet rows (header → cell) into a canonical RecordTable.
 * Key values are not validated here; the merge boundary does that.
 */
export function normalizeRows(rawRows: Array<Record<string, unknown>>, source: string = 'input'): RecordTable {
  const headerMap = new Map<string, string>();
  for (const raw of rawRows) {
    for (const header of Object.keys(raw)) {
      const normalized = normalizeColumnName(header);
      if (!headerMap.has(normalized)) headerMap.set(normalized, header);
    }
  }

  const mapping = resolveCanonicalColumns(Array.from(headerMap.keys()), source);
  const cell = (raw: Record<string, unknown>, column: string | null): unknown => {
    if (column === null) return null;
    const original = headerMap.get(column);
    return original === undefined ? null : raw[original];
  };

  const rows: FinancialRecord[] = rawRows.map(raw => {
    const p = mapping.period;
    const period = p.kind === 'column'
      ? toText(cell(raw, p.column)) ?? ''
      : yearMonthPeriod(cell(raw, p.year), cell(raw, p.month));

    return {
      period,
      entity_id: toText(cell(raw, mapping.entity)) ?? '',
      brand: toText(cell(raw, mapping.brand)),
      l14: toNumber(cell(raw, mapping.l14)),
      vol: toNumber(cell(raw, mapping.vol)),
    };
  });

  const columns: CanonicalColumn[] = ['PERIOD'];
  if (mapping.entity) columns.push('ENTITY_ID');
  if (mapping.brand) columns.push('BRAND');
  columns.push('L14', 'VOL');

  return { columns, rows };
}

function yearMonthPeriod(year: unknown, month: unknown): string {
  if (toText(year) === null || toText(month) === null) return '';
  return periodFromYearMonth(year, month);
}
