export type DeadLetterQueueRecord = {
  Q_MANAGER: string;
  /** Current depth; -1 when no dead-letter queue is set or the depth could not be read. */
  Q_STATUS: number;
  Q_DLNAME: string;
};
