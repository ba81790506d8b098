#!/usr/bin/env tsx

import { runCollectorMain } from '@/lib/collector/collector-main';
import { runQueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import { listenerCollector } from './collector';

process.exitCode = await runCollectorMain(listenerCollector.service, (runtime) =>
  runQueueManagerCollector(listenerCollector, runtime),
);
