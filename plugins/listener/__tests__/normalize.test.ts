import { describe, expect, it } from 'vitest';

import { listenerRow, toListenerRecord } from '../normalize';

describe('listenerRow', () => {
  it('drops commas inside names and skips empty names', () => {
    expect(listenerRow('QM1', ['A,B', '', 'C'])).toEqual(['QM1', 2, 'AB,C']);
  });
});

describe('toListenerRecord', () => {
  it('coerces the count', () => {
    expect(toListenerRecord(['QM1', '2', 'L1,L2'])).toEqual({ Q_MANAGER: 'QM1', Q_COUNT: 2, LISTENER: 'L1,L2' });
  });

  it('rejects rows of the wrong shape', () => {
    expect(toListenerRecord(['QM1', 'two', 'L1'])).toBeNull();
    expect(toListenerRecord(['QM1', '-1', ''])).toBeNull();
    expect(toListenerRecord(['QM1', '1'])).toBeNull();
    expect(toListenerRecord(['', '0', ''])).toBeNull();
  });
});
