#!/usr/bin/env tsx

import { runCollectorMain } from '@/lib/collector/collector-main';
import { runQueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import { commandServerCollector } from './collector';

process.exitCode = await runCollectorMain(commandServerCollector.service, (runtime) =>
  runQueueManagerCollector(commandServerCollector, runtime),
);
