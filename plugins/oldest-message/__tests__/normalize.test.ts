import { describe, expect, it } from 'vitest';

import { ageRows, isReportedQueue, toMessageAgeRecord } from '../normalize';

describe('isReportedQueue', () => {
  const filter = { deadLetterQueue: 'DLQ', includeSystem: false };

  it('filters SYSTEM queues and the dead-letter queue unless overridden', () => {
    expect(isReportedQueue('APP.IN', filter)).toBe(true);
    expect(isReportedQueue('SYSTEM.ADMIN.COMMAND.QUEUE', filter)).toBe(false);
    expect(isReportedQueue('DLQ', filter)).toBe(false);
    expect(isReportedQueue('DLQ', { ...filter, includeSystem: true })).toBe(true);
  });

  it('does not match a queue prefixed with SYSTEM but no dot', () => {
    expect(isReportedQueue('SYSTEMATIC', filter)).toBe(true);
  });
});

describe('ageRows', () => {
  it('skips stanzas without a queue name and defaults missing ages to 0', () => {
    const rows = ageRows(
      'QM1',
      [
        { queue: '', age: '3' },
        { queue: null, age: null },
        { queue: 'APP.IN', age: null },
      ],
      { deadLetterQueue: '', includeSystem: false },
    );

    expect(rows).toEqual([['QM1', 'APP.IN', 0]]);
  });
});

describe('toMessageAgeRecord', () => {
  it('rejects negative or non-numeric ages', () => {
    expect(toMessageAgeRecord(['QM1', 'APP.IN', '-1'])).toBeNull();
    expect(toMessageAgeRecord(['QM1', 'APP.IN', 'old'])).toBeNull();
    expect(toMessageAgeRecord(['QM1', 'APP.IN', '7'])).toEqual({ Q_MANAGER: 'QM1', Q_NAME: 'APP.IN', Q_MSGAGE: 7 });
  });
});
