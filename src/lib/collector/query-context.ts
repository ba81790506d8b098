import type { CollectorLogger } from '@/lib/logging/logger';
import type { ExecutionContext } from '@/lib/privilege/execution-context';
import type { AdminToolPaths } from '@/lib/collector/admin-tools';

/** Everything a per-manager query may touch; built once per invocation after the preflight. */
export type QueryContext = {
  exec: ExecutionContext;
  tools: AdminToolPaths;
  includeSystem: boolean;
  logger: CollectorLogger;
};
