import { describe, expect, it } from 'vitest';

import { emitRecords, formatErrorEnvelope } from '@/lib/collector/collector-response';

describe('emitRecords', () => {
  it('emits [] for an empty batch', () => {
    expect(emitRecords([])).toBe('[]');
  });

  it('keeps record order and field order', () => {
    expect(
      emitRecords([
        { Q_MANAGER: 'QM2', Q_STATUS: -1, Q_DLNAME: '' },
        { Q_MANAGER: 'QM1', Q_STATUS: 0, Q_DLNAME: 'DLQ' },
      ]),
    ).toBe('[{"Q_MANAGER":"QM2","Q_STATUS":-1,"Q_DLNAME":""},{"Q_MANAGER":"QM1","Q_STATUS":0,"Q_DLNAME":"DLQ"}]');
  });

  it('falls back to [] instead of throwing', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(emitRecords([cyclic])).toBe('[]');
  });
});

describe('formatErrorEnvelope', () => {
  it('escapes quotes and backslashes through the JSON encoder', () => {
    expect(formatErrorEnvelope('bad "name" C:\\mq')).toBe('{"error":"bad \\"name\\" C:\\\\mq"}');
  });
});
