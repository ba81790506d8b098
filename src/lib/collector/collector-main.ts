import { loadCollectorEnv } from '@/lib/env/collector-env';
import { toFatalError } from '@/lib/errors/error';
import { createLogger } from '@/lib/logging/logger';
import { formatErrorEnvelope } from '@/lib/collector/collector-response';
import { fatalOutcome } from '@/lib/collector/queue-manager-collector';

import type { CollectorEnv } from '@/lib/env/collector-env';
import type { CollectorLogger } from '@/lib/logging/logger';
import type { CollectorOutcome } from '@/lib/collector/queue-manager-collector';

export type CollectorMainOptions = {
  runtimeEnv?: Record<string, string | undefined>;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

/**
 * Entry-point wrapper shared by the executables: load the environment, run the
 * collector, print exactly one payload line and return the exit code.
 */
export async function runCollectorMain(
  service: string,
  run: (runtime: { env: CollectorEnv; logger: CollectorLogger }) => Promise<CollectorOutcome>,
  options: CollectorMainOptions = {},
): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => void process.stdout.write(text));
  const stderr = options.stderr ?? ((text: string) => void process.stderr.write(text));

  let env: CollectorEnv;
  try {
    env = loadCollectorEnv(options.runtimeEnv);
  } catch (err) {
    const failure = toFatalError(err);
    stdout(`${formatErrorEnvelope(failure.message)}\n`);
    return failure.exitCode;
  }

  const logger = createLogger({ service, debugLevel: env.debugLevel, write: stderr });
  let outcome: CollectorOutcome;
  try {
    outcome = await run({ env, logger });
  } catch (err) {
    outcome = fatalOutcome(err, logger);
  }

  stdout(`${outcome.stdout}\n`);
  if (outcome.stderr) stderr(`${outcome.stderr}\n`);
  return outcome.exitCode;
}
