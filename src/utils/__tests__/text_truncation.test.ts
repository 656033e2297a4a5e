import { describe, expect, it } from 'vitest';
import { TRUNCATION_MARKER, clipLine, excerptUtf8, truncateChars, truncateUtf8 } from '../text_truncation.js';

describe('truncateUtf8', () => {
  it('returns text that fits unchanged', () => {
    expect(truncateUtf8('héllo', 6)).toBe('héllo');
  });

  it('stops before a multi-byte character that would cross the budget', () => {
    expect(truncateUtf8('abcé', 4)).toBe('abc');
  });

  it('never splits a surrogate pair', () => {
    expect(truncateUtf8('😀x', 3)).toBe('');
    expect(truncateUtf8('x😀', 4)).toBe('x');
  });

  it('is total for degenerate budgets', () => {
    expect(truncateUtf8('abc', -1)).toBe('');
    expect(truncateUtf8('abc', Number.NaN)).toBe('');
    expect(truncateUtf8('abc', 2.9)).toBe('ab');
  });
});

describe('excerptUtf8', () => {
  it('appends the marker only when something was cut', () => {
    expect(excerptUtf8('héllo', 2)).toBe(`h${TRUNCATION_MARKER}`);
    expect(excerptUtf8('hi', 10)).toBe('hi');
  });
});

describe('truncateChars', () => {
  it('counts code points rather than UTF-16 units', () => {
    expect(truncateChars('😀😀😀', 2)).toBe('😀😀');
  });
});

describe('clipLine', () => {
  it('collapses whitespace', () => {
    expect(clipLine('  a   b\n c ', 20)).toBe('a b c');
  });

  it('ends a clipped line with an ellipsis inside the budget', () => {
    expect(clipLine('abcdefghij', 5)).toBe('ab...');
  });
});
