import { INVALID_TAG } from '@/lib/mqsc/queue-manager-name';
import { runMqsc } from '@/lib/mqsc/runmqsc';
import { parseStanzas } from '@/lib/mqsc/stanza-parser';
import { listenerRow, toListenerRecord } from './normalize';

import type { QueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import type { StanzaSpec } from '@/lib/mqsc/stanza-parser';
import type { ListenerStatusRecord } from './types';

// runmqsc echoes the command itself, which also mentions the listener keyword.
const LISTENER_STANZA: StanzaSpec<'name'> = {
  isMarker: (line) => line.includes('LISTENER(') && !line.includes('DISPLAY'),
  fields: { name: { attribute: 'LISTENER' } },
};

export const listenerCollector: QueueManagerCollector<ListenerStatusRecord> = {
  service: 'mqm-listen-msg',
  tools: ['runmqsc'],
  query: async (ctx, queueManager) => {
    const output = await runMqsc(ctx, queueManager, 'DISPLAY LSSTATUS(*)');
    const names = parseStanzas(output, LISTENER_STANZA).map((stanza) => stanza.name ?? '');
    return [listenerRow(queueManager, names)];
  },
  invalidRows: (queueManager) => [[queueManager, 0, INVALID_TAG]],
  failureRows: (queueManager) => [listenerRow(queueManager, [])],
  toRecord: toListenerRecord,
};
