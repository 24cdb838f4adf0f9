import { describe, it, expect } from 'vitest';
import { SpatialDirectory } from '../spatial/directory';
import { SpatialResolver } from '../spatial/resolver';
import type { ResolverStrategy } from '../spatial/strategies';
import { DEFAULT_STRATEGIES } from '../spatial/strategies';
import type { SpatialDirectorySnapshot } from '../types';
import { DIRECTORY } from './fixtures';

function resolver(snapshot: SpatialDirectorySnapshot = DIRECTORY) {
  return new SpatialResolver(new SpatialDirectory(snapshot));
}

describe('SpatialResolver', () => {
  it('resolves a directory key at every level through its code', () => {
    expect(resolver().resolve('1111051500')).toEqual({
      rawKey: '1111051500',
      code: '1111051500',
      finest: 'Cheongun',
      intermediate: 'Jongno',
      coarsest: 'Seoul',
    });
  });

  it('matches a raw key equal to a finest label and uses that entry code', () => {
    const unit = resolver().resolve('Cheongun');
    expect(unit.finest).toBe('Cheongun');
    expect(unit.intermediate).toBe('Jongno');
    expect(unit.coarsest).toBe('Seoul');
  });

  it('falls back to the finest label when a coarser level does not resolve', () => {
    const r = resolver();
    expect(r.resolve('grid-7').intermediate).toBeNull();
    expect(r.labels('grid-7')).toEqual({
      finest: 'Sajik',
      intermediate: 'Sajik',
      coarsest: 'Sajik',
    });
  });

  it('resolves coarser levels by name when there is no code', () => {
    const r = resolver();
    expect(r.resolve('Jung')).toMatchObject({ finest: null, intermediate: 'Jung', coarsest: 'Seoul' });
    expect(r.labelAt('Jung', 'finest')).toBe('Jung');
    expect(r.resolve('Busan').coarsest).toBe('Busan');
  });

  it('treats a numeric raw key as a code', () => {
    const r = resolver();
    expect(r.resolve('26440')).toMatchObject({ code: '26440', intermediate: null, coarsest: 'Busan' });
    expect(r.labels('26440')).toEqual({
      finest: '26440',
      intermediate: '26440',
      coarsest: 'Busan',
    });
  });

  it('keeps the raw key at every level when nothing resolves', () => {
    const r = resolver();
    for (const rawKey of ['unknown-key', 'X-99']) {
      expect(r.labels(rawKey)).toEqual({ finest: rawKey, intermediate: rawKey, coarsest: rawKey });
    }
    expect(resolver({ finest: [], intermediate: [], coarsest: [] }).labels('1111051500')).toEqual({
      finest: '1111051500',
      intermediate: '1111051500',
      coarsest: '1111051500',
    });
  });

  it('honors a configured prefix length', () => {
    const r = new SpatialResolver(new SpatialDirectory(DIRECTORY), {
      codePrefixLength: 4,
      coarsestPrefixLength: 2,
    });
    // no intermediate code is four digits long, so only the name rules remain
    expect(r.resolve('1111051500').intermediate).toBeNull();
    expect(r.resolve('1111051500').coarsest).toBe('Seoul');
  });

  it('stops at the first strategy that answers', () => {
    const calls: string[] = [];
    const tracking = (name: string, label: string | null): ResolverStrategy => ({
      name,
      resolve: () => {
        calls.push(name);
        return label;
      },
    });
    const r = new SpatialResolver(new SpatialDirectory(DIRECTORY), undefined, {
      ...DEFAULT_STRATEGIES,
      intermediate: [tracking('first', null), tracking('second', 'Picked'), tracking('third', 'Late')],
    });
    expect(r.resolve('anything').intermediate).toBe('Picked');
    expect(calls).toEqual(['first', 'second']);
  });

  it('prefers the smallest key when labels collide', () => {
    const r = resolver({
      finest: [
        { spatialKey: 'b-key', spatialLabel: 'Shared', spatialType: null, code: '11140' },
        { spatialKey: 'a-key', spatialLabel: 'Shared', spatialType: null, code: '11110' },
      ],
      intermediate: DIRECTORY.intermediate,
      coarsest: DIRECTORY.coarsest,
    });
    expect(r.resolve('Shared').intermediate).toBe('Jongno');
  });
});
