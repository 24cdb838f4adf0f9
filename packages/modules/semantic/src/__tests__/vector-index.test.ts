import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@geoinsight/shared';
import { InMemoryVectorIndex, cosineSimilarity } from '../cache/vector-index';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('is 0 against a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different width', () => {
    expect(() => cosineSimilarity([1], [1, 0])).toThrow(InvalidArgumentError);
  });
});

describe('InMemoryVectorIndex', () => {
  const scope = { parserId: 'p', schemaVersion: 'v1' };

  async function seeded() {
    const index = new InMemoryVectorIndex();
    await index.add({ requestHash: 'x', ...scope, embedding: [1, 0] });
    await index.add({ requestHash: 'y', ...scope, embedding: [0.6, 0.8] });
    await index.add({ requestHash: 'z', ...scope, embedding: [0, 1] });
    await index.add({ requestHash: 'old', parserId: 'p', schemaVersion: 'v0', embedding: [1, 0] });
    await index.add({ requestHash: 'other', parserId: 'q', schemaVersion: 'v1', embedding: [1, 0] });
    return index;
  }

  it('returns the closest vectors of the same parser and version first', async () => {
    const index = await seeded();
    const matches = await index.search({ embedding: [1, 0], ...scope, topK: 2 });
    expect(matches.map((m) => m.requestHash)).toEqual(['x', 'y']);
    expect(matches[0]?.similarity).toBeCloseTo(1, 10);
    expect(matches[1]?.similarity).toBeCloseTo(0.6, 10);
  });

  it('returns nothing for a scope without vectors', async () => {
    const index = await seeded();
    expect(await index.search({ embedding: [1, 0], parserId: 'none', schemaVersion: 'v1', topK: 5 })).toEqual([]);
  });

  it('replaces a vector added again under the same hash', async () => {
    const index = await seeded();
    await index.add({ requestHash: 'x', ...scope, embedding: [0, 1] });
    expect(index.size).toBe(5);
    const [best] = await index.search({ embedding: [0, 1], ...scope, topK: 1 });
    expect(best?.requestHash).toBe('x');
  });
});
