import { INVALID_TAG } from '@/lib/mqsc/queue-manager-name';
import { lookupDeadLetterQueue, runMqsc } from '@/lib/mqsc/runmqsc';
import { extractAttribute } from '@/lib/mqsc/stanza-parser';
import { toDeadLetterQueueRecord, UNKNOWN_DEPTH } from './normalize';

import type { QueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import type { DeadLetterQueueRecord } from './types';

export const deadLetterQueueCollector: QueueManagerCollector<DeadLetterQueueRecord> = {
  service: 'mqm-dead-letter-queue',
  tools: ['runmqsc'],
  query: async (ctx, queueManager) => {
    const deadLetterQueue = await lookupDeadLetterQueue(ctx, queueManager);
    if (!deadLetterQueue) return [[queueManager, UNKNOWN_DEPTH, '']];

    const output = await runMqsc(ctx, queueManager, `DISPLAY QSTATUS(${deadLetterQueue}) CURDEPTH`);
    const depth = extractAttribute(output, { attribute: 'CURDEPTH', accept: /^\d+$/ });
    return [[queueManager, depth ?? UNKNOWN_DEPTH, deadLetterQueue]];
  },
  invalidRows: (queueManager) => [[queueManager, UNKNOWN_DEPTH, INVALID_TAG]],
  failureRows: (queueManager) => [[queueManager, UNKNOWN_DEPTH, '']],
  toRecord: toDeadLetterQueueRecord,
};
