import { spawn } from 'node:child_process';

export type SpawnCaptureResult = { exitCode: number; stdout: string; stderr: string };

/**
 * Run a command to completion and collect its output. There is no timeout: the
 * scheduler that launched the collector bounds the whole invocation.
 */
export async function spawnCapture(
  command: string,
  args: string[],
  input: string | undefined,
  options?: { env?: NodeJS.ProcessEnv },
): Promise<SpawnCaptureResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { env: options?.env, stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let finished = false;

    const finish = (fn: () => void) => {
      if (finished) return;
      finished = true;
      fn();
    };

    child.on('error', (err) => finish(() => reject(err)));
    // A multibyte character may span two chunks.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('close', (code) => finish(() => resolve({ exitCode: code ?? 1, stdout, stderr })));

    // The child may exit before reading stdin (e.g. dspmqcsv ignores it).
    child.stdin.on('error', () => undefined);
    if (input !== undefined) child.stdin.write(input);
    child.stdin.end();
  });
}
