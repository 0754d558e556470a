import { describe, it, expect } from 'vitest';
import { codePointLength } from '../structure.js';

describe('codePointLength', () => {
  it('counts surrogate pairs once', () => {
    expect(codePointLength('a😀b')).toBe(3);
    expect(codePointLength('')).toBe(0);
  });

  it('counts unpaired surrogates on their own', () => {
    expect(codePointLength('\ud800x')).toBe(2);
    expect(codePointLength('x\udc00')).toBe(2);
  });
});
