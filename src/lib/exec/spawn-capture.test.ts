import { describe, expect, it } from 'vitest';

import { spawnCapture } from '@/lib/exec/spawn-capture';

describe('spawnCapture', () => {
  it('feeds stdin and collects stdout, stderr and the exit code', async () => {
    const script =
      "let d='';process.stdin.on('data',c=>d+=c);process.stdin.on('end',()=>{process.stdout.write(d.toUpperCase());process.stderr.write('warn');process.exitCode=5;});";

    const res = await spawnCapture(process.execPath, ['-e', script], 'display qmgr deadq\n');

    expect(res).toEqual({ exitCode: 5, stdout: 'DISPLAY QMGR DEADQ\n', stderr: 'warn' });
  });

  it('decodes a multibyte character written across two chunks', async () => {
    const script =
      'process.stdout.write(Buffer.from([0x51, 0xe2, 0x82]));setTimeout(()=>process.stdout.write(Buffer.from([0xac, 0x0a])),50);';

    const res = await spawnCapture(process.execPath, ['-e', script], undefined);

    expect(res.stdout).toBe('Q\u20ac\n');
  });

  it('rejects when the command cannot be started', async () => {
    await expect(spawnCapture('/nonexistent/runmqsc', [], undefined)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
