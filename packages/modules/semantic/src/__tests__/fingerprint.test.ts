import { describe, it, expect } from 'vitest';
import { normalizeRequestText, requestFingerprint } from '../cache/fingerprint';

describe('normalizeRequestText', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeRequestText('  Compare  SALES\tin\nJongno ')).toBe('compare sales in jongno');
  });

  it('folds compatibility characters', () => {
    expect(normalizeRequestText('Ｓａｌｅｓ　2024')).toBe('sales 2024');
  });
});

describe('requestFingerprint', () => {
  const base = { text: 'compare sales in jongno', parserId: 'openai:gpt-test:abc', schemaVersion: 'v1' };

  it('is a stable sha-256 hex digest', () => {
    const fp = requestFingerprint(base);
    expect(fp).toMatch(/^[0-9a-f]{64}$/);
    expect(requestFingerprint({ ...base })).toBe(fp);
  });

  it('changes with parser identity and schema version', () => {
    const fp = requestFingerprint(base);
    expect(requestFingerprint({ ...base, parserId: 'openai:gpt-test:def' })).not.toBe(fp);
    expect(requestFingerprint({ ...base, schemaVersion: 'v2' })).not.toBe(fp);
  });

  it('does not collide when component boundaries shift', () => {
    expect(requestFingerprint({ text: 'b', parserId: 'a', schemaVersion: 'v1' })).not.toBe(
      requestFingerprint({ text: '', parserId: 'ab', schemaVersion: 'v1' }),
    );
  });
});
