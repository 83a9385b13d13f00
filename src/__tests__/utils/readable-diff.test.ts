import { readableDiff } from '@/utils/readable-diff';
import { describe, expect, it } from 'vitest';

describe('readableDiff', () => {
  it('should return an empty string for equal values', () => {
    expect(readableDiff({ a: 1 }, { a: 1 })).toBe('');
  });

  it('should number changed lines by default', () => {
    expect(readableDiff({ a: 1 }, { a: 2 })).toBe(['1   -a: 1', '  1 +a: 2'].join('\n'));
  });

  it('should elide unchanged regions with the separator', () => {
    const before = { a: 1, b: 2, c: 3, d: 4, e: 5 };
    const after = { ...before, c: 30 };

    expect(readableDiff(before, after, { contextLines: 1, separator: '~~', numberLines: false })).toBe(
      ['~~', ' b: 2', '-c: 3', '+c: 30', ' d: 4', '~~'].join('\n'),
    );
  });

  it('should render keys in sorted order', () => {
    expect(readableDiff(undefined, { b: 1, a: 1 }, { numberLines: false })).toBe(['+a: 1', '+b: 1'].join('\n'));
  });
});
