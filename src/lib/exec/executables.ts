import { accessSync, constants, statSync } from 'node:fs';
import path from 'node:path';

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Directories searched for tools: the MQ binary directory first, then PATH. */
export function toolSearchPath(mqmPath: string, envPath = process.env.PATH ?? ''): string[] {
  const dirs = [mqmPath, ...envPath.split(path.delimiter)].filter((d) => d.length > 0);
  return Array.from(new Set(dirs));
}

export function findExecutable(name: string, searchDirs: string[]): string | null {
  if (name.includes('/')) return isExecutableFile(name) ? name : null;
  for (const dir of searchDirs) {
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}
