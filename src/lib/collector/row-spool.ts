import { appendFileSync, readFileSync, writeFileSync } from 'node:fs';

import { decodeRows, encodeRow } from '@/lib/mqsc/row-codec';

import type { RowField } from '@/lib/mqsc/row-codec';

/** Intermediate rows for one invocation, one encoded row per line. */
export class RowSpool {
  private written = 0;

  constructor(readonly filePath: string) {
    writeFileSync(filePath, '', { encoding: 'utf8', mode: 0o600 });
  }

  append(rows: readonly (readonly RowField[])[]): void {
    if (rows.length === 0) return;
    appendFileSync(this.filePath, rows.map((row) => `${encodeRow(row)}\n`).join(''), 'utf8');
    this.written += rows.length;
  }

  get size(): number {
    return this.written;
  }

  readAll(): string[][] {
    return decodeRows(readFileSync(this.filePath, 'utf8'));
  }
}
