import { ExitCode } from '@/lib/errors/error-codes';
import { toFatalError } from '@/lib/errors/error';
import { toolSearchPath } from '@/lib/exec/executables';
import { isValidQueueManagerName } from '@/lib/mqsc/queue-manager-name';
import { resolveExecutionContext } from '@/lib/privilege/privilege-bridge';
import { resolveActiveQueueManagers } from '@/lib/registry/active-resolver';
import { createFileRegistryStore } from '@/lib/registry/registry-store';
import { withScratchScope } from '@/lib/scratch/scratch-scope';
import { resolveAdminTools } from '@/lib/collector/admin-tools';
import { emitRecords, formatErrorEnvelope } from '@/lib/collector/collector-response';
import { assembleRecords } from '@/lib/collector/record-assembler';
import { RowSpool } from '@/lib/collector/row-spool';

import type { CollectorEnv } from '@/lib/env/collector-env';
import type { ExitCodeType } from '@/lib/errors/error-codes';
import type { CollectorLogger } from '@/lib/logging/logger';
import type { RowField } from '@/lib/mqsc/row-codec';
import type { ExecutionContext } from '@/lib/privilege/execution-context';
import type { PrivilegeBridgeOptions } from '@/lib/privilege/privilege-bridge';
import type { RegistryStore } from '@/lib/registry/registry-store';
import type { AdminToolName } from '@/lib/collector/admin-tools';
import type { QueryContext } from '@/lib/collector/query-context';
import type { RowShape } from '@/lib/collector/record-assembler';

export type Rows = RowField[][];

/** One collector kind: which tools it needs, how it queries a manager and how its rows become records. */
export type QueueManagerCollector<TRecord> = {
  service: string;
  tools: readonly AdminToolName[];
  query: (ctx: QueryContext, queueManager: string) => Promise<Rows>;
  /** Rows for a manager whose name fails validation; it is never queried. */
  invalidRows: (queueManager: string) => Rows;
  /** Rows for a manager whose query threw. */
  failureRows: (queueManager: string) => Rows;
  toRecord: RowShape<TRecord>;
};

export type CollectorRuntime = {
  env: CollectorEnv;
  logger: CollectorLogger;
  store?: RegistryStore;
  searchDirs?: string[];
  resolveExecution?: (options: PrivilegeBridgeOptions) => Promise<ExecutionContext>;
  pid?: number;
};

export type CollectorOutcome = {
  stdout: string;
  /** Secondary diagnostics that must not replace the payload. */
  stderr?: string;
  exitCode: ExitCodeType;
};

export function fatalOutcome(err: unknown, logger: CollectorLogger): CollectorOutcome {
  const failure = toFatalError(err);
  logger.error({ event_type: 'collector.fatal', message: failure.message, error: failure.error });
  return { stdout: formatErrorEnvelope(failure.message), exitCode: failure.exitCode };
}

async function collectRows<TRecord>(
  collector: QueueManagerCollector<TRecord>,
  ctx: QueryContext,
  queueManager: string,
): Promise<Rows> {
  if (!isValidQueueManagerName(queueManager)) {
    ctx.logger.debug({ event_type: 'queue_manager.invalid_name', queue_manager: queueManager });
    return collector.invalidRows(queueManager);
  }

  try {
    return await collector.query(ctx, queueManager);
  } catch (err) {
    ctx.logger.error({
      event_type: 'queue_manager.query_failed',
      queue_manager: queueManager,
      message: err instanceof Error ? err.message : String(err),
    });
    return collector.failureRows(queueManager);
  }
}

/**
 * Resolve active managers, check tools and identity, query each manager in registry
 * order and emit the assembled records. Fatal preconditions become an error envelope;
 * a failure on one manager only affects that manager's rows.
 */
export async function runQueueManagerCollector<TRecord>(
  collector: QueueManagerCollector<TRecord>,
  runtime: CollectorRuntime,
): Promise<CollectorOutcome> {
  const { env, logger } = runtime;

  try {
    const store = runtime.store ?? createFileRegistryStore({ filePath: env.registryFile });
    const { names } = resolveActiveQueueManagers(store, logger);
    if (names.length === 0) return { stdout: emitRecords([]), exitCode: ExitCode.SUCCESS };

    const searchDirs = runtime.searchDirs ?? toolSearchPath(env.mqmPath);
    const tools = resolveAdminTools(collector.tools, searchDirs);
    const resolveExecution = runtime.resolveExecution ?? resolveExecutionContext;
    const exec = await resolveExecution({ serviceUser: env.serviceUser, mqmPath: env.mqmPath, searchDirs, logger });
    const ctx: QueryContext = { exec, tools, includeSystem: env.includeSystem, logger };

    const rows = await withScratchScope(
      { parentDir: env.scratchDir, prefix: collector.service, pid: runtime.pid },
      async (scope) => {
        const spool = new RowSpool(scope.file('rows.out'));
        for (const name of names) spool.append(await collectRows(collector, ctx, name));
        logger.debug({ event_type: 'spool.written', rows: spool.size, queue_managers: names.length });
        return spool.readAll();
      },
    );

    return { stdout: emitRecords(assembleRecords(rows, collector.toRecord, logger)), exitCode: ExitCode.SUCCESS };
  } catch (err) {
    return fatalOutcome(err, logger);
  }
}
