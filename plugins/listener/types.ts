export type ListenerStatusRecord = {
  Q_MANAGER: string;
  Q_COUNT: number;
  /** Comma-joined listener names in output order; `INVALID` for a rejected manager name. */
  LISTENER: string;
};
