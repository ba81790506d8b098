const QUEUE_MANAGER_NAME = /^[A-Za-z0-9._-]+$/;

/** Tag written in place of a value for a manager whose name is never passed to a tool. */
export const INVALID_TAG = 'INVALID';

export function isValidQueueManagerName(name: string): boolean {
  return QUEUE_MANAGER_NAME.test(name);
}
