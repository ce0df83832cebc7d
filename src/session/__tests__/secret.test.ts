import { describe, it, expect } from 'vitest';
import { generateSecret, hashSecret, splitSecret, verifySecret } from '../secret.js';

describe('generateSecret', () => {
  it('encodes 32 random bytes as base64url', () => {
    const secret = generateSecret();
    expect(secret).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateSecret()).not.toBe(secret);
  });
});

describe('splitSecret', () => {
  it('cuts three contiguous pieces with the remainder on the last', () => {
    expect(splitSecret('abcdefghij')).toEqual(['abc', 'def', 'ghij']);
  });

  it('reassembles a generated secret', () => {
    const secret = generateSecret();
    const fragments = splitSecret(secret);
    expect(fragments.map(f => f.length)).toEqual([14, 14, 15]);
    expect(fragments.join('')).toBe(secret);
  });
});

describe('verifySecret', () => {
  it('accepts only the secret that produced the hash', () => {
    const hash = hashSecret('test-secret');
    expect(verifySecret('test-secret', hash)).toBe(true);
    expect(verifySecret('test-secreT', hash)).toBe(false);
    expect(verifySecret('test-secret', 'not-a-hash')).toBe(false);
  });
});
