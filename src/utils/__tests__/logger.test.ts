import { describe, it, expect } from 'vitest';

import { preview } from '../logger.js';

describe('preview', () => {
  it('collapses whitespace', () => {
    expect(preview('  The cat\n  sat.  ')).toBe('The cat sat.');
  });

  it('truncates long text', () => {
    expect(preview('abcdefghij', 4)).toBe('abcd...');
    expect(preview('abcd', 4)).toBe('abcd');
  });
});
