import Ajv from 'ajv/dist/2020';

import registryV1Schema from './registry-v1.schema.json';

export const QueueManagerState = {
  NOT_RUNNING: 0,
  RUNNING: 1,
  STANDBY_RUNNING: 2,
} as const;

export type QueueManagerStateType = (typeof QueueManagerState)[keyof typeof QueueManagerState];

export type RegistryEntry = {
  Q_MANAGER: string;
  /** One of {@link QueueManagerState}; enforced by the schema. */
  Q_STATUS: number;
};

type Issue = { instancePath: string; message: string };

export type RegistryValidationResult = { ok: true; entries: RegistryEntry[] } | { ok: false; issues: Issue[] };

const ajv = new Ajv({ allErrors: true, strict: false });

const validateRegistry = ajv.compile<RegistryEntry[]>(registryV1Schema);

function toIssues(errors: typeof validateRegistry.errors): Issue[] {
  if (!errors) return [];
  return errors.map((err) => ({
    instancePath: err.instancePath,
    message: err.message ?? 'invalid',
  }));
}

export function validateRegistryEntries(input: unknown): RegistryValidationResult {
  if (validateRegistry(input)) return { ok: true, entries: input };
  return { ok: false, issues: toIssues(validateRegistry.errors) };
}
