#!/usr/bin/env tsx

import { runCollectorMain } from '@/lib/collector/collector-main';
import { runQueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import { deadLetterQueueCollector } from './collector';

process.exitCode = await runCollectorMain(deadLetterQueueCollector.service, (runtime) =>
  runQueueManagerCollector(deadLetterQueueCollector, runtime),
);
