import { integerField } from '@/lib/collector/record-assembler';

import type { RowField } from '@/lib/mqsc/row-codec';
import type { ListenerStatusRecord } from './types';

/** One aggregate row per manager: name, listener count, comma-joined names. */
export function listenerRow(queueManager: string, names: readonly string[]): RowField[] {
  const cleaned = names.map((name) => name.replace(/,/g, '')).filter((name) => name.length > 0);
  return [queueManager, cleaned.length, cleaned.join(',')];
}

export function toListenerRecord(fields: readonly string[]): ListenerStatusRecord | null {
  const [queueManager, count, listeners] = fields;
  const parsedCount = integerField(count);
  if (fields.length !== 3 || !queueManager || parsedCount === null || parsedCount < 0 || listeners === undefined) {
    return null;
  }
  return { Q_MANAGER: queueManager, Q_COUNT: parsedCount, LISTENER: listeners };
}
