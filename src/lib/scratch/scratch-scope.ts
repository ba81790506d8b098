import { mkdtempSync, rmSync } from 'node:fs';
import path from 'node:path';

export type ScratchScope = {
  readonly dir: string;
  file: (name: string) => string;
};

export type ScratchScopeOptions = {
  parentDir: string;
  /** Collector name; together with the pid it keeps concurrent invocations apart. */
  prefix: string;
  pid?: number;
};

function removeDir(dir: string) {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // Nothing left to report to: the invocation is already ending.
  }
}

/**
 * Run `fn` with a private scratch directory that is removed on every exit path:
 * normal return, a thrown error, or `process.exit` while the scope is still open.
 */
export async function withScratchScope<T>(
  options: ScratchScopeOptions,
  fn: (scope: ScratchScope) => Promise<T>,
): Promise<T> {
  const pid = options.pid ?? process.pid;
  const dir = mkdtempSync(path.join(options.parentDir, `${options.prefix}-${pid}-`));
  const onExit = () => removeDir(dir);
  process.once('exit', onExit);

  const scope: ScratchScope = {
    dir,
    file: (name) => {
      const resolved = path.join(dir, name);
      if (path.dirname(resolved) !== dir) throw new Error(`scratch file name must be a plain file name: ${name}`);
      return resolved;
    },
  };

  try {
    return await fn(scope);
  } finally {
    process.removeListener('exit', onExit);
    removeDir(dir);
  }
}
