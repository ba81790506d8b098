import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { makeTempDir } from '@/test/collector-fixtures';
import { RowSpool } from '@/lib/collector/row-spool';

describe('RowSpool', () => {
  it('reads back appended rows in order', () => {
    const spool = new RowSpool(path.join(makeTempDir('mqm-spool-'), 'rows.out'));

    spool.append([['QM1', 'L1,L2', 2]]);
    spool.append([]);
    spool.append([
      ['QM2', '', 0],
      ['bad name!', 'INVALID', 0],
    ]);

    expect(spool.size).toBe(3);
    expect(spool.readAll()).toEqual([
      ['QM1', 'L1,L2', '2'],
      ['QM2', '', '0'],
      ['bad name!', 'INVALID', '0'],
    ]);
  });

  it('starts from an empty file', () => {
    const spool = new RowSpool(path.join(makeTempDir('mqm-spool-'), 'rows.out'));

    expect(spool.readAll()).toEqual([]);
  });
});
