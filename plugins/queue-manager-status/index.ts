#!/usr/bin/env tsx

import { runCollectorMain } from '@/lib/collector/collector-main';
import { collectManagerStatus, MANAGER_STATUS_SERVICE } from './collector';

process.exitCode = await runCollectorMain(MANAGER_STATUS_SERVICE, (runtime) => collectManagerStatus(runtime));
