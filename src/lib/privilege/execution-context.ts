import { spawnCapture } from '@/lib/exec/spawn-capture';

export type AdminCommand = {
  /** Absolute path of the tool, as resolved by the preflight. */
  command: string;
  args?: string[];
  /** Written to the tool's stdin (MQSC commands for runmqsc). */
  input?: string;
};

export type CommandOutput = { exitCode: number; stdout: string; stderr: string };

export type ExecutionMode = 'self' | 'delegated';

/**
 * Where administrative commands run. The switching mechanism stays behind this
 * interface so the privilege decision can be made from probe results alone.
 */
export interface ExecutionContext {
  readonly mode: ExecutionMode;
  probe(): Promise<boolean>;
  run(command: AdminCommand): Promise<CommandOutput>;
}

function childEnv(mqmPath: string): NodeJS.ProcessEnv {
  const inherited = process.env.PATH ?? '';
  return { ...process.env, LC_ALL: 'C', PATH: inherited ? `${mqmPath}:${inherited}` : mqmPath };
}

export function createDirectContext(options: { mqmPath: string }): ExecutionContext {
  const env = childEnv(options.mqmPath);
  return {
    mode: 'self',
    probe: async () => true,
    run: (cmd) => spawnCapture(cmd.command, cmd.args ?? [], cmd.input, { env }),
  };
}

export type SudoContextOptions = {
  sudoPath: string;
  user: string;
  mqmPath: string;
};

/** `env_reset` drops the caller's locale, so it is set again on the far side of sudo. */
const DELEGATED_ENV = ['/usr/bin/env', 'LC_ALL=C'];

/** Runs every command through `sudo -n -u <user>`; `-n` makes a password prompt fail instead of block. */
export function createSudoContext(options: SudoContextOptions): ExecutionContext {
  const env = childEnv(options.mqmPath);
  const prefix = ['-n', '-u', options.user];

  return {
    mode: 'delegated',
    probe: async () => {
      try {
        const res = await spawnCapture(options.sudoPath, [...prefix, 'true'], undefined, { env });
        return res.exitCode === 0;
      } catch {
        return false;
      }
    },
    run: (cmd) =>
      spawnCapture(options.sudoPath, [...prefix, ...DELEGATED_ENV, cmd.command, ...(cmd.args ?? [])], cmd.input, {
        env,
      }),
  };
}
