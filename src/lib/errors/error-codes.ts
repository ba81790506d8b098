export const ErrorCode = {
  MISSING_DEPENDENCY: 'MISSING_DEPENDENCY',
  ADMIN_TOOL_MISSING: 'ADMIN_TOOL_MISSING',
  REGISTRY_MISSING: 'REGISTRY_MISSING',
  REGISTRY_DIR_UNWRITABLE: 'REGISTRY_DIR_UNWRITABLE',
  REGISTRY_PARSE_FAILED: 'REGISTRY_PARSE_FAILED',
  REGISTRY_WRITE_FAILED: 'REGISTRY_WRITE_FAILED',
  PRIVILEGE_DENIED: 'PRIVILEGE_DENIED',
  CONFIG_INVALID: 'CONFIG_INVALID',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const ExitCode = {
  SUCCESS: 0,
  MISSING_TOOL: 1,
  MISSING_REGISTRY: 2,
  DENIED_OR_PARSE: 3,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

// Uniform across collectors; the message distinguishes codes that share an exit status.
const EXIT_CODE_BY_ERROR: Record<ErrorCodeType, ExitCodeType> = {
  MISSING_DEPENDENCY: ExitCode.MISSING_TOOL,
  ADMIN_TOOL_MISSING: ExitCode.MISSING_TOOL,
  REGISTRY_MISSING: ExitCode.MISSING_REGISTRY,
  REGISTRY_DIR_UNWRITABLE: ExitCode.MISSING_REGISTRY,
  REGISTRY_PARSE_FAILED: ExitCode.DENIED_OR_PARSE,
  REGISTRY_WRITE_FAILED: ExitCode.MISSING_REGISTRY,
  PRIVILEGE_DENIED: ExitCode.DENIED_OR_PARSE,
  CONFIG_INVALID: ExitCode.DENIED_OR_PARSE,
  INTERNAL_ERROR: ExitCode.DENIED_OR_PARSE,
};

export function exitCodeFor(code: ErrorCodeType): ExitCodeType {
  return EXIT_CODE_BY_ERROR[code];
}
