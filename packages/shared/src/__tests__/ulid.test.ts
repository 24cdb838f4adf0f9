import { describe, it, expect } from 'vitest';
import { generateUlid, isValidUlid, ulidTimestamp } from '../utils/ulid';

describe('generateUlid', () => {
  it('mints 26-character Crockford ids', () => {
    const id = generateUlid();
    expect(id).toHaveLength(26);
    expect(isValidUlid(id)).toBe(true);
  });

  it('sorts ids minted in quick succession in creation order', () => {
    const ids = Array.from({ length: 5 }, () => generateUlid());
    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(5);
  });

  it('encodes the seed time', () => {
    // later than any id minted so far, so the factory takes the seed as is
    const seed = Date.UTC(2100, 5, 30, 12, 0, 0);
    expect(ulidTimestamp(generateUlid(seed))).toBe(seed);
  });
});

describe('isValidUlid', () => {
  it('rejects malformed strings', () => {
    expect(isValidUlid('')).toBe(false);
    expect(isValidUlid('too-short')).toBe(false);
    expect(isValidUlid('01HZZZZZZZZZZZZZZZZZZZZZZI')).toBe(false);
  });
});
