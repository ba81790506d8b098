import type { QueueManagerStateType } from '@/lib/registry/registry-schema';

export type ManagerStatusRecord = {
  Q_MANAGER: string;
  Q_STATUS: QueueManagerStateType;
};
