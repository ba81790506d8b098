import { requireTool } from '@/lib/collector/admin-tools';
import { extractAttribute } from '@/lib/mqsc/stanza-parser';

import type { QueryContext } from '@/lib/collector/query-context';

/**
 * Feed one MQSC command to `runmqsc <queueManager>` and return its stdout. The exit
 * status is logged but not acted on: runmqsc reports a failed command with a
 * non-zero status and still prints what it could, and empty output is a valid answer.
 */
export async function runMqsc(ctx: QueryContext, queueManager: string, command: string): Promise<string> {
  const result = await ctx.exec.run({
    command: requireTool(ctx.tools, 'runmqsc'),
    args: [queueManager],
    input: `${command}\n`,
  });

  ctx.logger.debug({
    event_type: 'mqsc.completed',
    queue_manager: queueManager,
    command,
    exit_code: result.exitCode,
    stdout_bytes: Buffer.byteLength(result.stdout),
    stdout_excerpt: result.stdout,
  });
  return result.stdout;
}

/** Name of the manager's dead-letter queue, or `''` when none is configured. Looked up on every call. */
export async function lookupDeadLetterQueue(ctx: QueryContext, queueManager: string): Promise<string> {
  const output = await runMqsc(ctx, queueManager, 'DISPLAY QMGR DEADQ');
  return extractAttribute(output, { attribute: 'DEADQ' }) ?? '';
}
