import { userInfo } from 'node:os';

import { ErrorCode } from '@/lib/errors/error-codes';
import { fatal } from '@/lib/errors/error';
import { findExecutable } from '@/lib/exec/executables';
import { createDirectContext, createSudoContext } from '@/lib/privilege/execution-context';

import type { CollectorLogger } from '@/lib/logging/logger';
import type { ExecutionContext } from '@/lib/privilege/execution-context';

export type PrivilegeDecision = 'self' | 'delegated' | 'denied';

export type PrivilegeFacts = {
  currentUser: string | null;
  serviceUser: string;
  delegationAvailable: boolean;
  delegationProbeOk: boolean;
};

export function decidePrivilege(facts: PrivilegeFacts): PrivilegeDecision {
  if (facts.currentUser !== null && facts.currentUser === facts.serviceUser) return 'self';
  if (facts.delegationAvailable && facts.delegationProbeOk) return 'delegated';
  return 'denied';
}

export function currentUserName(): string | null {
  try {
    return userInfo().username;
  } catch {
    return null;
  }
}

export type PrivilegeBridgeOptions = {
  serviceUser: string;
  mqmPath: string;
  searchDirs: string[];
  currentUser?: string | null;
  /** Overridable for tests; defaults to the real direct and sudo contexts. */
  contexts?: {
    direct: () => ExecutionContext;
    delegated: (sudoPath: string) => ExecutionContext;
  };
  logger?: CollectorLogger;
};

/**
 * Pick how administrative commands run for this invocation. Fails closed with
 * PRIVILEGE_DENIED before any query when neither identity path is usable.
 */
export async function resolveExecutionContext(options: PrivilegeBridgeOptions): Promise<ExecutionContext> {
  const contexts = options.contexts ?? {
    direct: () => createDirectContext({ mqmPath: options.mqmPath }),
    delegated: (sudoPath: string) =>
      createSudoContext({ sudoPath, user: options.serviceUser, mqmPath: options.mqmPath }),
  };
  const currentUser = options.currentUser === undefined ? currentUserName() : options.currentUser;
  const identity = { currentUser, serviceUser: options.serviceUser };

  // The probe is only worth spawning when the caller is not already the service identity.
  if (decidePrivilege({ ...identity, delegationAvailable: false, delegationProbeOk: false }) === 'self') {
    options.logger?.debug({ event_type: 'privilege.resolved', mode: 'self', user: currentUser });
    return contexts.direct();
  }

  const sudoPath = findExecutable('sudo', options.searchDirs);
  const delegated = sudoPath ? contexts.delegated(sudoPath) : null;
  const delegationProbeOk = delegated ? await delegated.probe() : false;

  const decision = decidePrivilege({ ...identity, delegationAvailable: delegated !== null, delegationProbeOk });
  options.logger?.debug({ event_type: 'privilege.resolved', mode: decision, user: currentUser });

  if (decision === 'delegated' && delegated) return delegated;
  throw fatal(
    ErrorCode.PRIVILEGE_DENIED,
    'permission',
    `Cannot run as ${options.serviceUser} non-interactively (configure sudoers).`,
    { current_user: currentUser, sudo_found: sudoPath !== null },
  );
}
