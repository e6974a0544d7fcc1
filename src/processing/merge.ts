import { MissingKeyError, type InputName } from '../core/errors.js';
import type { CanonicalColumn, FinancialRecord, RecordTable } from '../core/types.js';
import { CANONICAL_COLUMNS } from '../core/types.js';

const KEY_COLUMNS: CanonicalColumn[] = ['PERIOD', 'ENTITY_ID'];

export function recordKey(record: FinancialRecord): string {
  return `${record.period}\u0000${record.entity_id}`;
}

/**
 * Union a historical table with an incoming batch.
 *
 * Rows are concatenated (historical first) and duplicate (period, entity_id)
 * keys keep their last occurrence, at that occurrence's position. A key in
 * both inputs therefore keeps the incoming row, and a key repeated inside the
 * incoming batch keeps its last row.
 */
export function mergeRecords(historical: RecordTable, incoming: RecordTable): RecordTable {
  assertKeys(historical, 'historical');
  assertKeys(incoming, 'incoming');

  const combined = [...historical.rows, ...incoming.rows];

  const lastIndex = new Map<string, number>();
  combined.forEach((row, i) => lastIndex.set(recordKey(row), i));

  const rows = combined.filter((row, i) => lastIndex.get(recordKey(row)) === i);

  const present = new Set<CanonicalColumn>([...historical.columns, ...incoming.columns]);
  const columns = CANONICAL_COLUMNS.filter(c => present.has(c));

  return { columns, rows };
}

function assertKeys(table: RecordTable, input: InputName): void {
  const missing = KEY_COLUMNS.filter(c => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new MissingKeyError(input, missing);
  }

  table.rows.forEach((row, i) => {
    const missingValues: CanonicalColumn[] = [];
    if (!isKeyValue(row.period)) missingValues.push('PERIOD');
    if (!isKeyValue(row.entity_id)) missingValues.push('ENTITY_ID');
    if (missingValues.length > 0) {
      throw new MissingKeyError(input, missingValues, i);
    }
  });
}

function isKeyValue(value: unknown): boolean {
  return typeof value === 'string' && value.trim() !== '';
}
