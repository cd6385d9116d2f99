import { describe, it, expect } from 'vitest';
import { resolveRequestId } from '../../../../src/shared/http/request-context';

describe('resolveRequestId', () => {
  it('reuses a well-formed inbound id', () => {
    expect(resolveRequestId('req-123_abc.def')).toBe('req-123_abc.def');
  });

  it('mints a UUID for missing or suspicious ids', () => {
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

    expect(resolveRequestId(undefined)).toMatch(uuid);
    expect(resolveRequestId('')).toMatch(uuid);
    expect(resolveRequestId('bad id\nwith newline')).toMatch(uuid);
    expect(resolveRequestId(['a', 'b'])).toMatch(uuid);
  });
});
