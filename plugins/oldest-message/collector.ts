import { INVALID_TAG } from '@/lib/mqsc/queue-manager-name';
import { lookupDeadLetterQueue, runMqsc } from '@/lib/mqsc/runmqsc';
import { parseStanzas, startsWithAttribute } from '@/lib/mqsc/stanza-parser';
import { ageRows, toMessageAgeRecord } from './normalize';

import type { QueryContext } from '@/lib/collector/query-context';
import type { QueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import type { StanzaSpec } from '@/lib/mqsc/stanza-parser';
import type { MessageAgeRecord, QueueAge } from './types';

const QUEUE_STANZA: StanzaSpec<keyof QueueAge> = {
  isMarker: startsWithAttribute('QUEUE'),
  fields: {
    queue: { attribute: 'QUEUE' },
    age: { attribute: 'MSGAGE', accept: /^\d+$/ },
  },
};

/** Queue status stanzas, retried without `ALL` when that form yields none. */
async function queueStatus(ctx: QueryContext, queueManager: string): Promise<QueueAge[]> {
  const full = parseStanzas(await runMqsc(ctx, queueManager, 'DISPLAY QSTATUS(*) ALL'), QUEUE_STANZA);
  if (full.length > 0) return full;

  ctx.logger.debug({ event_type: 'qstatus.fallback', queue_manager: queueManager });
  return parseStanzas(await runMqsc(ctx, queueManager, 'DISPLAY QSTATUS(*)'), QUEUE_STANZA);
}

export const oldestMessageCollector: QueueManagerCollector<MessageAgeRecord> = {
  service: 'mqm-oldest-msg',
  tools: ['runmqsc'],
  query: async (ctx, queueManager) => {
    const deadLetterQueue = await lookupDeadLetterQueue(ctx, queueManager);
    const stanzas = await queueStatus(ctx, queueManager);
    const rows = ageRows(queueManager, stanzas, { deadLetterQueue, includeSystem: ctx.includeSystem });
    ctx.logger.debug({
      event_type: 'qstatus.parsed',
      queue_manager: queueManager,
      queues: stanzas.length,
      reported: rows.length,
    });
    return rows;
  },
  invalidRows: (queueManager) => [[queueManager, INVALID_TAG, 0]],
  failureRows: () => [],
  toRecord: toMessageAgeRecord,
};
