import { integerField } from '@/lib/collector/record-assembler';

import type { RowField } from '@/lib/mqsc/row-codec';
import type { MessageAgeRecord, QueueAge } from './types';

export type AgeFilter = {
  deadLetterQueue: string;
  includeSystem: boolean;
};

export function isReportedQueue(queue: string, filter: AgeFilter): boolean {
  if (filter.includeSystem) return true;
  if (queue.startsWith('SYSTEM.')) return false;
  return filter.deadLetterQueue === '' || queue !== filter.deadLetterQueue;
}

export function ageRows(queueManager: string, stanzas: readonly QueueAge[], filter: AgeFilter): RowField[][] {
  const rows: RowField[][] = [];
  for (const stanza of stanzas) {
    if (!stanza.queue || !isReportedQueue(stanza.queue, filter)) continue;
    rows.push([queueManager, stanza.queue, stanza.age ?? 0]);
  }
  return rows;
}

export function toMessageAgeRecord(fields: readonly string[]): MessageAgeRecord | null {
  const [queueManager, queue, age] = fields;
  const parsedAge = integerField(age);
  if (fields.length !== 3 || !queueManager || !queue || parsedAge === null || parsedAge < 0) return null;
  return { Q_MANAGER: queueManager, Q_NAME: queue, Q_MSGAGE: parsedAge };
}
