import { describe, expect, it } from 'vitest';

import { ErrorCode, exitCodeFor } from '@/lib/errors/error-codes';

describe('exitCodeFor', () => {
  it('maps missing dependencies and tools to 1', () => {
    expect(exitCodeFor(ErrorCode.MISSING_DEPENDENCY)).toBe(1);
    expect(exitCodeFor(ErrorCode.ADMIN_TOOL_MISSING)).toBe(1);
  });

  it('maps registry location problems to 2', () => {
    expect(exitCodeFor(ErrorCode.REGISTRY_MISSING)).toBe(2);
    expect(exitCodeFor(ErrorCode.REGISTRY_DIR_UNWRITABLE)).toBe(2);
  });

  it('maps denial, parse and configuration failures to 3', () => {
    expect(exitCodeFor(ErrorCode.PRIVILEGE_DENIED)).toBe(3);
    expect(exitCodeFor(ErrorCode.REGISTRY_PARSE_FAILED)).toBe(3);
    expect(exitCodeFor(ErrorCode.CONFIG_INVALID)).toBe(3);
    expect(exitCodeFor(ErrorCode.INTERNAL_ERROR)).toBe(3);
  });
});
