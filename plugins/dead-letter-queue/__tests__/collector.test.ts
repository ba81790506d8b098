import { describe, expect, it } from 'vitest';

import { runCollectorWithFake } from '@/test/collector-fixtures';
import { deadLetterQueueCollector } from '../collector';

const DEADQ_QM1 = [
  '     1 : DISPLAY QMGR DEADQ',
  'AMQ8408I: Display Queue Manager details.',
  '   QMNAME(QM1)                             DEADQ(SYSTEM.DEAD.LETTER.QUEUE)',
].join('\n');

const DEPTH_QM1 = [
  '     2 : DISPLAY QSTATUS(SYSTEM.DEAD.LETTER.QUEUE) CURDEPTH',
  'AMQ8450I: Display queue status details.',
  '   QUEUE(SYSTEM.DEAD.LETTER.QUEUE)         TYPE(QUEUE)',
  '   CURDEPTH(7)',
].join('\n');

describe('dead letter queue collector', () => {
  it('reports the depth of the configured dead-letter queue', async () => {
    const { outcome, fake } = await runCollectorWithFake(deadLetterQueueCollector, {
      registry: [{ Q_MANAGER: 'QM1', Q_STATUS: 1 }],
      responses: {
        'runmqsc QM1 <<DISPLAY QMGR DEADQ': DEADQ_QM1,
        'runmqsc QM1 <<DISPLAY QSTATUS(SYSTEM.DEAD.LETTER.QUEUE) CURDEPTH': DEPTH_QM1,
      },
    });

    expect(outcome).toEqual({
      stdout: '[{"Q_MANAGER":"QM1","Q_STATUS":7,"Q_DLNAME":"SYSTEM.DEAD.LETTER.QUEUE"}]',
      exitCode: 0,
    });
    expect(fake.keys()).toEqual([
      'runmqsc QM1 <<DISPLAY QMGR DEADQ',
      'runmqsc QM1 <<DISPLAY QSTATUS(SYSTEM.DEAD.LETTER.QUEUE) CURDEPTH',
    ]);
  });

  it('reports -1 and an empty name without a depth query when no dead-letter queue is set', async () => {
    const { outcome, fake } = await runCollectorWithFake(deadLetterQueueCollector, {
      registry: [{ Q_MANAGER: 'QM1', Q_STATUS: 1 }],
      responses: { 'runmqsc QM1 <<DISPLAY QMGR DEADQ': '   QMNAME(QM1)    DEADQ( )\n' },
    });

    expect(outcome.stdout).toBe('[{"Q_MANAGER":"QM1","Q_STATUS":-1,"Q_DLNAME":""}]');
    expect(fake.keys()).toEqual(['runmqsc QM1 <<DISPLAY QMGR DEADQ']);
  });

  it('reports -1 with the queue name when the depth cannot be read', async () => {
    const { outcome } = await runCollectorWithFake(deadLetterQueueCollector, {
      registry: [{ Q_MANAGER: 'QM1', Q_STATUS: 1 }],
      responses: {
        'runmqsc QM1 <<DISPLAY QMGR DEADQ': '   DEADQ(DLQ.MAIN)\n',
        'runmqsc QM1 <<DISPLAY QSTATUS(DLQ.MAIN) CURDEPTH': 'AMQ8147E: IBM MQ object DLQ.MAIN not found.\n',
      },
    });

    expect(outcome.stdout).toBe('[{"Q_MANAGER":"QM1","Q_STATUS":-1,"Q_DLNAME":"DLQ.MAIN"}]');
  });

  it('keeps going after an invalid name and a failed query', async () => {
    const { outcome } = await runCollectorWithFake(deadLetterQueueCollector, {
      registry: [
        { Q_MANAGER: 'bad name!', Q_STATUS: 1 },
        { Q_MANAGER: 'QM2', Q_STATUS: 1 },
        { Q_MANAGER: 'QM3', Q_STATUS: 1 },
      ],
      responses: {
        'runmqsc QM2 <<DISPLAY QMGR DEADQ': new Error('spawn EACCES'),
        'runmqsc QM3 <<DISPLAY QMGR DEADQ': '   DEADQ(QM3.DLQ)\n',
        'runmqsc QM3 <<DISPLAY QSTATUS(QM3.DLQ) CURDEPTH': '   QUEUE(QM3.DLQ)\n   CURDEPTH(0)\n',
      },
    });

    expect(JSON.parse(outcome.stdout)).toEqual([
      { Q_MANAGER: 'bad name!', Q_STATUS: -1, Q_DLNAME: 'INVALID' },
      { Q_MANAGER: 'QM2', Q_STATUS: -1, Q_DLNAME: '' },
      { Q_MANAGER: 'QM3', Q_STATUS: 0, Q_DLNAME: 'QM3.DLQ' },
    ]);
  });
});
