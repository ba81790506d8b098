import { ErrorCode, exitCodeFor } from '@/lib/errors/error-codes';

import type { ErrorCodeType, ExitCodeType } from '@/lib/errors/error-codes';

export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory = 'dependency' | 'registry' | 'permission' | 'config' | 'parse' | 'unknown';

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
};

/**
 * A precondition failure that aborts the whole invocation before (or instead of)
 * processing any queue manager. Recoverable per-manager failures never use this type.
 */
export class CollectorFatalError extends Error {
  readonly error: AppError;

  constructor(error: AppError) {
    super(error.message);
    this.name = 'CollectorFatalError';
    this.error = error;
  }

  get exitCode(): ExitCodeType {
    return exitCodeFor(this.error.code);
  }
}

export function fatal(
  code: ErrorCodeType,
  category: ErrorCategory,
  message: string,
  redacted_context?: Record<string, JsonValue>,
): CollectorFatalError {
  return new CollectorFatalError({
    code,
    category,
    message,
    retryable: false,
    ...(redacted_context ? { redacted_context } : {}),
  });
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

function isErrorCode(value: unknown): value is ErrorCodeType {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    isErrorCode(err.code) &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

export function toFatalError(err: unknown): CollectorFatalError {
  if (err instanceof CollectorFatalError) return err;
  if (isAppError(err)) return new CollectorFatalError(err);
  const cause = err instanceof Error ? err.message : String(err);
  return fatal(ErrorCode.INTERNAL_ERROR, 'unknown', 'Unexpected collector failure', { cause });
}
