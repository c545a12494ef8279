import { describe, expect, it } from 'vitest';
import { parseInt64 } from './int.js';

describe('parseInt64', () => {
  it('parses digits up to the signed 64-bit maximum', () => {
    expect(parseInt64('0042')).toBe(42n);
    expect(parseInt64('9223372036854775807')).toBe(9223372036854775807n);
  });

  it('returns undefined above the maximum or for non-digits', () => {
    expect(parseInt64('9223372036854775808')).toBeUndefined();
    expect(parseInt64('')).toBeUndefined();
    expect(parseInt64('-1')).toBeUndefined();
  });
});
