import type { CommandServerRecord, CommandServerState } from './types';

const STATES: readonly CommandServerState[] = ['0', '1', 'INVALID'];

function isCommandServerState(value: string | undefined): value is CommandServerState {
  return STATES.some((state) => state === value);
}

/** `dspmqcsv` prints a sentence; any mention of `Running` counts as running. */
export function commandServerState(output: string): CommandServerState {
  return output.includes('Running') ? '1' : '0';
}

export function toCommandServerRecord(fields: readonly string[]): CommandServerRecord | null {
  const [queueManager, state] = fields;
  if (fields.length !== 2 || !queueManager || !isCommandServerState(state)) return null;
  return { Q_MANAGER: queueManager, Q_STATUS: state };
}
