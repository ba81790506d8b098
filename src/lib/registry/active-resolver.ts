import { QueueManagerState } from '@/lib/registry/registry-schema';

import type { CollectorLogger } from '@/lib/logging/logger';
import type { RegistryStore } from '@/lib/registry/registry-store';

export type ActiveQueueManagers = {
  registryVersion: string;
  names: string[];
};

/**
 * Names of the queue managers the cache marks as running, in cache order.
 * Standby instances are not active; an empty list is a normal result.
 */
export function resolveActiveQueueManagers(store: RegistryStore, logger?: CollectorLogger): ActiveQueueManagers {
  const snapshot = store.read();
  const names = snapshot.entries
    .filter((entry) => entry.Q_STATUS === QueueManagerState.RUNNING)
    .map((entry) => entry.Q_MANAGER);

  logger?.debug({
    event_type: 'registry.resolved',
    registry_version: snapshot.version,
    entries: snapshot.entries.length,
    active: names,
  });

  return { registryVersion: snapshot.version, names };
}
