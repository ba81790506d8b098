import { tmpdir } from 'node:os';
import path from 'node:path';

import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import { fatal } from '@/lib/errors/error';

export type CollectorEnv = {
  logDir: string;
  registryFile: string;
  mqmPath: string;
  serviceUser: string;
  scratchDir: string;
  debugLevel: 0 | 1 | 2;
  includeSystem: boolean;
};

const DEFAULT_LOG_DIR = '/opt/zabbix/logs';
const REGISTRY_FILE_NAME = 'queue_manager_cache.json';

function toDebugLevel(value: string | undefined): 0 | 1 | 2 {
  if (value === undefined || value === '0') return 0;
  if (value === '2') return 2;
  return 1;
}

/**
 * Read collector settings from the environment. Variable names match the ones the
 * deployed monitoring templates already export.
 */
export function loadCollectorEnv(runtimeEnv: Record<string, string | undefined> = process.env): CollectorEnv {
  const env = createEnv({
    server: {
      ZABBIX_LOG_DIR: z.string().min(1).default(DEFAULT_LOG_DIR),
      QM_FILE: z.string().min(1).optional(),
      MQM_PATH: z.string().min(1).default('/opt/mqm/bin'),
      MQM_USER: z
        .string()
        .regex(/^[a-z_][a-z0-9._-]*[$]?$/i, 'must be a valid user name')
        .default('mqm'),
      MQM_SCRATCH_DIR: z.string().min(1).optional(),
      DEBUG: z.string().optional(),
      INCLUDE_SYSTEM: z.enum(['0', '1']).default('0'),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (issues) => {
      const fields = issues.map((issue) => (issue.path ?? []).map((p) => String(typeof p === 'object' ? p.key : p)).join('.'));
      throw fatal(ErrorCode.CONFIG_INVALID, 'config', `Invalid collector environment: ${fields.join(', ')}`, {
        fields,
      });
    },
  });

  const logDir = path.resolve(env.ZABBIX_LOG_DIR);
  return {
    logDir,
    registryFile: path.resolve(env.QM_FILE ?? path.join(logDir, REGISTRY_FILE_NAME)),
    mqmPath: env.MQM_PATH,
    serviceUser: env.MQM_USER,
    scratchDir: path.resolve(env.MQM_SCRATCH_DIR ?? tmpdir()),
    debugLevel: toDebugLevel(env.DEBUG),
    includeSystem: env.INCLUDE_SYSTEM === '1',
  };
}
