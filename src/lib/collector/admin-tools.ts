import { ErrorCode } from '@/lib/errors/error-codes';
import { fatal } from '@/lib/errors/error';
import { findExecutable } from '@/lib/exec/executables';

export type AdminToolName = 'dspmq' | 'dspmqcsv' | 'runmqsc';

export type AdminToolPaths = { readonly [N in AdminToolName]?: string };

function missingTool(name: AdminToolName) {
  return fatal(
    ErrorCode.ADMIN_TOOL_MISSING,
    'dependency',
    `${name} command not found. Please ensure IBM MQ is installed and in PATH.`,
    { tool: name },
  );
}

/** Resolve every tool a collector needs to an absolute path, or fail before any query runs. */
export function resolveAdminTools(names: readonly AdminToolName[], searchDirs: string[]): AdminToolPaths {
  const resolved: { [N in AdminToolName]?: string } = {};
  for (const name of names) {
    const found = findExecutable(name, searchDirs);
    if (!found) throw missingTool(name);
    resolved[name] = found;
  }
  return resolved;
}

export function requireTool(tools: AdminToolPaths, name: AdminToolName): string {
  const found = tools[name];
  if (!found) throw missingTool(name);
  return found;
}
