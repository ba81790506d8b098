export type MessageAgeRecord = {
  Q_MANAGER: string;
  Q_NAME: string;
  /** Age of the oldest message in seconds; 0 when MQ reports none. */
  Q_MSGAGE: number;
};

export type QueueAge = { queue: string | null; age: string | null };
