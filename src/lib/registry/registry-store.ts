import { createHash } from 'node:crypto';
import { accessSync, constants, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { ErrorCode } from '@/lib/errors/error-codes';
import { fatal } from '@/lib/errors/error';
import { validateRegistryEntries } from '@/lib/registry/registry-schema';

import type { RegistryEntry } from '@/lib/registry/registry-schema';

export type JsonCodec = Pick<typeof JSON, 'parse' | 'stringify'>;

export type RegistrySnapshot = {
  /** Content hash of the file the entries were decoded from. */
  version: string;
  entries: RegistryEntry[];
};

/**
 * Narrow read/replace view over the shared queue manager cache. Readers take no lock:
 * replacement is a rename, so a read sees either the previous or the next snapshot.
 */
export type RegistryStore = {
  readonly filePath: string;
  /** Throws MISSING_DEPENDENCY when entries could not be decoded or encoded. */
  assertCodec: () => void;
  read: () => RegistrySnapshot;
  replace: (entries: RegistryEntry[]) => RegistrySnapshot;
};

export type FileRegistryStoreOptions = {
  filePath: string;
  /** `null` models a runtime without a usable JSON codec. */
  codec?: JsonCodec | null;
  pid?: number;
};

function versionOf(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

function errnoCode(err: unknown): string | null {
  if (!err || typeof err !== 'object' || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

export function createFileRegistryStore(options: FileRegistryStoreOptions): RegistryStore {
  const filePath = options.filePath;
  const codec = options.codec === undefined ? JSON : options.codec;
  const pid = options.pid ?? process.pid;

  function requireCodec(): JsonCodec {
    if (codec) return codec;
    throw fatal(
      ErrorCode.MISSING_DEPENDENCY,
      'dependency',
      'JSON codec is not available. Cannot process the queue manager cache file.',
    );
  }

  function read(): RegistrySnapshot {
    const json = requireCodec();

    let text: string;
    try {
      text = readFileSync(filePath, 'utf8');
    } catch (err) {
      const code = errnoCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR') {
        throw fatal(ErrorCode.REGISTRY_MISSING, 'registry', `The file '${filePath}' does not exist.`);
      }
      throw fatal(ErrorCode.REGISTRY_PARSE_FAILED, 'parse', 'Failed to parse queue manager cache file', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    let decoded: unknown;
    try {
      decoded = json.parse(text);
    } catch {
      throw fatal(ErrorCode.REGISTRY_PARSE_FAILED, 'parse', 'Failed to parse queue manager cache file', {
        reason: 'invalid_json',
      });
    }

    const result = validateRegistryEntries(decoded);
    if (!result.ok) {
      throw fatal(ErrorCode.REGISTRY_PARSE_FAILED, 'parse', 'Failed to parse queue manager cache file', {
        reason: 'schema',
        issues: result.issues.slice(0, 20),
      });
    }

    return { version: versionOf(text), entries: result.entries };
  }

  function replace(entries: RegistryEntry[]): RegistrySnapshot {
    const json = requireCodec();
    const text = `${json.stringify(entries)}\n`;
    const tempPath = `${filePath}.tmp.${pid}`;

    try {
      writeFileSync(tempPath, text, { encoding: 'utf8', mode: 0o644 });
      renameSync(tempPath, filePath);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw fatal(ErrorCode.REGISTRY_WRITE_FAILED, 'registry', 'Failed to write cache file', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    return { version: versionOf(text), entries };
  }

  return {
    filePath,
    assertCodec: () => void requireCodec(),
    read,
    replace,
  };
}

/** The writer needs the registry directory to exist and accept new files before it runs anything. */
export function assertRegistryDirWritable(dir: string): void {
  let isDir = false;
  try {
    isDir = statSync(dir).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw fatal(ErrorCode.REGISTRY_DIR_UNWRITABLE, 'registry', `Directory '${dir}' does not exist.`);
  }

  try {
    accessSync(dir, constants.W_OK);
  } catch {
    throw fatal(
      ErrorCode.REGISTRY_DIR_UNWRITABLE,
      'registry',
      `Cannot write to '${dir}'. Check directory permissions.`,
    );
  }
}

export function registryDirOf(store: RegistryStore): string {
  return path.dirname(store.filePath);
}
