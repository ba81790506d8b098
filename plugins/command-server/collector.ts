import { requireTool } from '@/lib/collector/admin-tools';
import { INVALID_TAG } from '@/lib/mqsc/queue-manager-name';
import { commandServerState, toCommandServerRecord } from './normalize';

import type { QueueManagerCollector } from '@/lib/collector/queue-manager-collector';
import type { CommandServerRecord } from './types';

export const commandServerCollector: QueueManagerCollector<CommandServerRecord> = {
  service: 'mqm-command-service',
  tools: ['dspmqcsv'],
  query: async (ctx, queueManager) => {
    const result = await ctx.exec.run({ command: requireTool(ctx.tools, 'dspmqcsv'), args: [queueManager] });
    ctx.logger.debug({
      event_type: 'dspmqcsv.completed',
      queue_manager: queueManager,
      exit_code: result.exitCode,
      stdout_bytes: Buffer.byteLength(result.stdout),
      stdout_excerpt: result.stdout,
    });
    return [[queueManager, commandServerState(result.stdout)]];
  },
  invalidRows: (queueManager) => [[queueManager, INVALID_TAG]],
  failureRows: (queueManager) => [[queueManager, '0']],
  toRecord: toCommandServerRecord,
};
