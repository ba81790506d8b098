import type { CollectorLogger } from '@/lib/logging/logger';

/** Maps a decoded row to a record, or `null` when the row does not have the kind's shape. */
export type RowShape<TRecord> = (fields: readonly string[]) => TRecord | null;

export function assembleRecords<TRecord>(
  rows: readonly (readonly string[])[],
  shape: RowShape<TRecord>,
  logger?: CollectorLogger,
): TRecord[] {
  const records: TRecord[] = [];
  let dropped = 0;
  for (const row of rows) {
    const record = shape(row);
    if (record === null) {
      dropped += 1;
      continue;
    }
    records.push(record);
  }

  if (dropped > 0) logger?.debug({ event_type: 'rows.dropped', dropped, kept: records.length });
  return records;
}

const INTEGER = /^-?\d+$/;

/** Parse a field the query runner wrote as an integer; anything else fails the row. */
export function integerField(value: string | undefined): number | null {
  if (value === undefined || !INTEGER.test(value)) return null;
  return Number(value);
}
