/** `"1"` running, `"0"` anything else. Kept as a string for existing item prototypes. */
export type CommandServerState = '0' | '1' | 'INVALID';

export type CommandServerRecord = {
  Q_MANAGER: string;
  Q_STATUS: CommandServerState;
};
