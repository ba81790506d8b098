import { requireTool, resolveAdminTools } from '@/lib/collector/admin-tools';
import { emitRecords, formatErrorEnvelope } from '@/lib/collector/collector-response';
import { fatalOutcome } from '@/lib/collector/queue-manager-collector';
import { ExitCode } from '@/lib/errors/error-codes';
import { toFatalError } from '@/lib/errors/error';
import { toolSearchPath } from '@/lib/exec/executables';
import { createDirectContext } from '@/lib/privilege/execution-context';
import { assertRegistryDirWritable, createFileRegistryStore, registryDirOf } from '@/lib/registry/registry-store';
import { parseManagerStatus } from './normalize';

import type { CollectorOutcome, CollectorRuntime } from '@/lib/collector/queue-manager-collector';
import type { CollectorLogger } from '@/lib/logging/logger';
import type { ExecutionContext } from '@/lib/privilege/execution-context';
import type { ManagerStatusRecord } from './types';

export const MANAGER_STATUS_SERVICE = 'mqm-status-service';

export type ManagerStatusRuntime = Pick<CollectorRuntime, 'env' | 'logger' | 'store' | 'searchDirs'> & {
  /** Where `dspmq` runs; the invoking identity unless overridden. */
  exec?: ExecutionContext;
};

async function listManagers(exec: ExecutionContext, dspmq: string, logger: CollectorLogger): Promise<ManagerStatusRecord[]> {
  try {
    const result = await exec.run({ command: dspmq, args: ['-x'] });
    logger.debug({
      event_type: 'dspmq.completed',
      exit_code: result.exitCode,
      stdout_bytes: Buffer.byteLength(result.stdout),
      stdout_excerpt: result.stdout,
    });
    return parseManagerStatus(result.stdout);
  } catch (err) {
    logger.error({ event_type: 'dspmq.failed', message: err instanceof Error ? err.message : String(err) });
    return [];
  }
}

/**
 * List every queue manager with its state, replace the registry with the result and
 * print it. A failed registry write is reported on stderr; the listing is still printed.
 */
export async function collectManagerStatus(runtime: ManagerStatusRuntime): Promise<CollectorOutcome> {
  const { env, logger } = runtime;

  try {
    const store = runtime.store ?? createFileRegistryStore({ filePath: env.registryFile });
    const tools = resolveAdminTools(['dspmq'], runtime.searchDirs ?? toolSearchPath(env.mqmPath));
    assertRegistryDirWritable(registryDirOf(store));
    store.assertCodec();

    const exec = runtime.exec ?? createDirectContext({ mqmPath: env.mqmPath });
    const records = await listManagers(exec, requireTool(tools, 'dspmq'), logger);
    const stdout = emitRecords(records);

    try {
      const snapshot = store.replace(records);
      logger.debug({ event_type: 'registry.replaced', registry_version: snapshot.version, entries: records.length });
      return { stdout, exitCode: ExitCode.SUCCESS };
    } catch (err) {
      const failure = toFatalError(err);
      logger.error({ event_type: 'registry.write_failed', message: failure.message, error: failure.error });
      return { stdout, stderr: formatErrorEnvelope(failure.message), exitCode: ExitCode.SUCCESS };
    }
  } catch (err) {
    return fatalOutcome(err, logger);
  }
}
