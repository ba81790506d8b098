import { integerField } from '@/lib/collector/record-assembler';

import type { DeadLetterQueueRecord } from './types';

export const UNKNOWN_DEPTH = -1;

export function toDeadLetterQueueRecord(fields: readonly string[]): DeadLetterQueueRecord | null {
  const [queueManager, depth, name] = fields;
  const parsedDepth = integerField(depth);
  if (fields.length !== 3 || !queueManager || name === undefined) return null;
  if (parsedDepth === null || parsedDepth < UNKNOWN_DEPTH) return null;
  return { Q_MANAGER: queueManager, Q_STATUS: parsedDepth, Q_DLNAME: name };
}
