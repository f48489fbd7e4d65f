import { describe, expect, it } from 'vitest';

import { formatSessionId, nextSessionId, parseSessionId } from '../src/utils/id.js';

describe('session id', () => {
  it('formats and parses s-YYYYMMDD-NNN', () => {
    expect(formatSessionId({ yyyyMMdd: '20261018', nnn: '007' })).toBe('s-20261018-007');
    expect(parseSessionId('s-20261018-007')).toEqual({ yyyyMMdd: '20261018', nnn: '007' });
    expect(parseSessionId('j-20261018-007')).toBeNull();
    expect(parseSessionId('s-2026101-007')).toBeNull();
  });

  it('numbers sessions per UTC day', () => {
    const now = new Date('2026-10-18T23:30:00Z');
    expect(nextSessionId([], now)).toBe('s-20261018-001');
    expect(nextSessionId(['s-20261018-001', 's-20261018-004', 's-20261017-009', 'junk'], now)).toBe('s-20261018-005');
    expect(nextSessionId(['s-20261018-004'], new Date('2026-10-19T00:00:01Z'))).toBe('s-20261019-001');
  });

  it('refuses to go past 999 sessions a day', () => {
    expect(() => nextSessionId(['s-20261018-999'], new Date('2026-10-18T12:00:00Z'))).toThrow('Session ids exhausted for 20261018');
  });
});
