import { describe, expect, it } from 'vitest';

import { extractAttribute, parseStanzas, startsWithAttribute } from '@/lib/mqsc/stanza-parser';

const QSTATUS_OUTPUT = [
  '5724-H72 (C) Copyright IBM Corp. 1994, 2024.',
  'Starting MQSC for queue manager QM1.',
  '',
  '     1 : DISPLAY QSTATUS(*) ALL',
  'AMQ8450I: Display queue status details.',
  '   QUEUE(APP.IN)                           TYPE(QUEUE)',
  '   CURDEPTH(3)                             IPPROCS(0)',
  '   MSGAGE(120)                             OPPROCS(0)',
  'AMQ8450I: Display queue status details.',
  '   QUEUE(SYSTEM.FOO)                       TYPE(QUEUE)',
  '   CURDEPTH(0)                             MSGAGE( )',
  'One MQSC command read.',
].join('\n');

describe('parseStanzas', () => {
  const spec = {
    isMarker: startsWithAttribute('QUEUE'),
    fields: {
      queue: { attribute: 'QUEUE' },
      age: { attribute: 'MSGAGE', accept: /^\d+$/ },
      depth: { attribute: 'CURDEPTH' },
    },
  };

  it('groups attributes spread over several lines under their marker', () => {
    expect(parseStanzas(QSTATUS_OUTPUT, spec)).toEqual([
      { queue: 'APP.IN', age: '120', depth: '3' },
      { queue: 'SYSTEM.FOO', age: null, depth: '0' },
    ]);
  });

  it('ignores text before the first marker', () => {
    expect(parseStanzas('CURDEPTH(9)\nMSGAGE(9)\n', spec)).toEqual([]);
  });

  it('reports attributes missing from a stanza as null', () => {
    const bare = {
      isMarker: (line: string) => line.includes('LISTENER(') && !line.includes('DISPLAY'),
      fields: { name: { attribute: 'LISTENER' }, pid: { attribute: 'PID' } },
    };

    expect(parseStanzas('  1 : DISPLAY LSSTATUS(*)\nLISTENER()\n', bare)).toEqual([{ name: '', pid: null }]);
  });
});

describe('extractAttribute', () => {
  it('returns the first occurrence with whitespace stripped', () => {
    const text = 'QMNAME(QM1)   DEADQ( DLQ.ONE )\nDEADQ(DLQ.TWO)';

    expect(extractAttribute(text, { attribute: 'DEADQ' })).toBe('DLQ.ONE');
  });

  it('only trims the edges under the trim policy', () => {
    expect(extractAttribute('DESCR( my queue )', { attribute: 'DESCR', whitespace: 'trim' })).toBe('my queue');
  });

  it('does not match a keyword that merely ends with the attribute name', () => {
    expect(extractAttribute('XDEADQ(OTHER)', { attribute: 'DEADQ' })).toBeNull();
  });

  it('returns null when the value is rejected', () => {
    expect(extractAttribute('CURDEPTH(n/a)', { attribute: 'CURDEPTH', accept: /^\d+$/ })).toBeNull();
  });
});
