#!/usr/bin/env tsx

import { runCollectorMain } from '@/lib/collector/collector-main';
import { runQueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import { oldestMessageCollector } from './collector';

process.exitCode = await runCollectorMain(oldestMessageCollector.service, (runtime) =>
  runQueueManagerCollector(oldestMessageCollector, runtime),
);
