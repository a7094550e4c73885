import { describe, expect, it } from 'vitest';
import { decodeJSON } from '../json.js';

describe('decodeJSON', () => {
  it('parses valid JSON', () => {
    expect(decodeJSON('[7,"Alice"]')).toEqual({ ok: true, value: [7, 'Alice'] });
    expect(decodeJSON('false')).toEqual({ ok: true, value: false });
  });

  it('returns a decode error for invalid JSON', () => {
    const result = decodeJSON('{');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DECODE_ERROR');
      expect(result.error.message).toMatch(/^Invalid JSON: /);
    }
  });
});
