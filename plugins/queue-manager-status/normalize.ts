import { parseStanzas } from '@/lib/mqsc/stanza-parser';
import { QueueManagerState } from '@/lib/registry/registry-schema';

import type { StanzaSpec } from '@/lib/mqsc/stanza-parser';
import type { QueueManagerStateType } from '@/lib/registry/registry-schema';
import type { ManagerStatusRecord } from './types';

// `dspmq -x` starts each manager at column 0; INSTANCE lines below it are indented.
const MANAGER_STANZA: StanzaSpec<'name' | 'status'> = {
  isMarker: (line) => line.startsWith('QMNAME('),
  fields: {
    name: { attribute: 'QMNAME' },
    status: { attribute: 'STATUS', whitespace: 'trim' },
  },
};

export function managerState(status: string | null): QueueManagerStateType {
  if (status === 'Running') return QueueManagerState.RUNNING;
  if (status === 'Running as standby') return QueueManagerState.STANDBY_RUNNING;
  return QueueManagerState.NOT_RUNNING;
}

export function parseManagerStatus(output: string): ManagerStatusRecord[] {
  const records: ManagerStatusRecord[] = [];
  for (const stanza of parseStanzas(output, MANAGER_STANZA)) {
    if (!stanza.name) continue;
    records.push({ Q_MANAGER: stanza.name, Q_STATUS: managerState(stanza.status) });
  }
  return records;
}
