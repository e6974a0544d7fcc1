import { distinctPeriods } from '../core/period.js';
import type { MergeProvenance, RecordTable } from '../core/types.js';
import { recordKey } from '../processing/merge.js';

/**
 * Describe what a merge did: how many rows the incoming batch replaced,
 * which periods it added, and which IDH have calendar gaps (their
 * variations compare against the last period they appear in, not the
 * previous calendar period).
 */

export function buildMergeProvenance(
  historical: RecordTable,
  incoming: RecordTable,
  merged: RecordTable
): MergeProvenance {
  const historicalKeys = new Set(historical.rows.map(recordKey));
  const incomingKeys = new Set(incoming.rows.map(recordKey));

  let superseded = 0;
  for (const key of incomingKeys) {
    if (historicalKeys.has(key)) superseded++;
  }

  const periods = distinctPeriods(merged.rows.map(r => r.period));
  const historicalPeriods = new Set(historical.rows.map(r => r.period));
  const newPeriods = distinctPeriods(incoming.rows.map(r => r.period)).filter(p => !historicalPeriods.has(p));

  const notes: string[] = [];

  const duplicatesInIncoming = incoming.rows.length - incomingKeys.size;
  if (duplicatesInIncoming > 0) {
    notes.push(`${duplicatesInIncoming} duplicate row(s) inside the incoming batch; the last one of each key was kept`);
  }

  const gapped = entitiesWithGaps(merged, periods);
  if (gapped.length > 0) {
    const shown = gapped.slice(0, 10).join(', ');
    const more = gapped.length > 10 ? ` and ${gapped.length - 10} more` : '';
    notes.push(`IDH missing from some periods (variation compares with their last present period): ${shown}${more}`);
  }

  return {
    historical_rows: historical.rows.length,
    incoming_rows: incoming.rows.length,
    merged_rows: merged.rows.length,
    superseded_rows: superseded,
    periods,
    new_periods: newPeriods,
    dedup_strategy: 'Last occurrence kept per (period, IDH); incoming rows replace historical ones',
    notes,
  };
}

/** IDH whose periods are not contiguous within the overall period list */
function entitiesWithGaps(table: RecordTable, periods: string[]): string[] {
  const position = new Map(periods.map((p, i) => [p, i]));
  const seen = new Map<string, Set<number>>();

  for (const row of table.rows) {
    const idx = position.get(row.period);
    if (idx === undefined) continue;
    let set = seen.get(row.entity_id);
    if (!set) {
      set = new Set();
      seen.set(row.entity_id, set);
    }
    set.add(idx);
  }

  const gapped: string[] = [];
  for (const [entity, set] of seen) {
    const sorted = Array.from(set).sort((a, b) => a - b);
    if (sorted[sorted.length - 1] - sorted[0] + 1 > sorted.length) {
      gapped.push(entity);
    }
  }
  return gapped.sort();
}
