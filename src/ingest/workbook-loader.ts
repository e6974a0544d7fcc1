import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as XLSX from 'xlsx';
import { IngestError } from '../core/errors.js';
import type { RecordTable } from '../core/types.js';
import { normalizeRows } from './column-normalizer.js';

export interface WorkbookOptions {
  /** Sheet to read; defaults to the first one */
  sheet?: string;
  /** Label used in error messages */
  source?: string;
}

/**
 * Parse workbook bytes (.xlsx) or CSV text into a canonical table.
 * CSV goes in as a decoded string so UTF-8 headers like "AÑO" survive.
 */
export function parseWorkbook(data: Buffer | string, options: WorkbookOptions = {}): RecordTable {
  const source = options.source ?? 'workbook';

  let workbook: XLSX.WorkBook;
  try {
    workbook = typeof data === 'string'
      ? XLSX.read(data, { type: 'string', raw: true })
      : XLSX.read(data, { type: 'buffer' });
  } catch (err) {
    throw new IngestError(`Could not read workbook: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new IngestError(
      `Sheet "${sheetName ?? ''}" not found. Available sheets: ${workbook.SheetNames.join(', ') || 'none'}`,
      source
    );
  }

  const rawRows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null });
  if (rawRows.length === 0) {
    throw new IngestError(`Sheet "${sheetName}" has no data rows`, source);
  }

  return normalizeRows(rawRows, source);
}

export async function loadWorkbook(path: string, options: Omit<WorkbookOptions, 'source'> = {}): Promise<RecordTable> {
  let data: Buffer | string;
  try {
    data = extname(path).toLowerCase() === '.csv'
      ? await readFile(path, 'utf8')
      : await readFile(path);
  } catch (err) {
    throw new IngestError(`File not found or unreadable: ${path} (${err instanceof Error ? err.message : String(err)})`, path);
  }

  return parseWorkbook(data, { ...options, source: path });
}
