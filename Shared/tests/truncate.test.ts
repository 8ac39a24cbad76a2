import { describe, it, expect } from 'vitest';
import { truncateOutput, truncateTail } from '../Utils/truncate.js';

describe('truncateOutput', () => {
  it('returns short output unchanged', () => {
    expect(truncateOutput('hello', { maxChars: 10, head: 3, tail: 3 })).toEqual({
      text: 'hello',
      truncated: false,
    });
  });

  it('keeps head and tail with a separator naming the dropped count', () => {
    const result = truncateOutput('abcdefghijklmnop', { maxChars: 10, head: 3, tail: 4 });
    expect(result.truncated).toBe(true);
    expect(result.text).toBe('abc\n\n[... truncated 9 characters ...]\n\nmnop');
  });
});

describe('truncateTail', () => {
  it('returns short text unchanged', () => {
    expect(truncateTail('boom', 10)).toEqual({ text: 'boom', truncated: false });
  });

  it('keeps only the last maxChars characters', () => {
    expect(truncateTail('0123456789', 4)).toEqual({
      text: '[... truncated 6 characters ...]\n6789',
      truncated: true,
    });
  });
});
