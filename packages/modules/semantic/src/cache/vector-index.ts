import { InvalidArgumentError } from '@geoinsight/shared';
import { compareKeys } from '@geoinsight/module-insights';

export interface IndexedVector {
  requestHash: string;
  parserId: string;
  schemaVersion: string;
  embedding: readonly number[];
}

export interface VectorSearch {
  embedding: readonly number[];
  parserId: string;
  schemaVersion: string;
  topK: number;
}

export interface VectorMatch {
  requestHash: string;
  /** Cosine similarity in [-1, 1]. */
  similarity: number;
}

/**
 * Nearest-neighbour search over request embeddings. Only vectors with the
 * same parser identity and schema version are candidates.
 */
export interface VectorIndex {
  add(vector: IndexedVector): Promise<void>;
  /** Best matches first. */
  search(query: VectorSearch): Promise<VectorMatch[]>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new InvalidArgumentError(`embedding width mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

/** Exhaustive in-memory search. */
export class InMemoryVectorIndex implements VectorIndex {
  private vectors = new Map<string, IndexedVector>();

  async add(vector: IndexedVector): Promise<void> {
    this.vectors.set(vector.requestHash, { ...vector, embedding: [...vector.embedding] });
  }

  async search({ embedding, parserId, schemaVersion, topK }: VectorSearch): Promise<VectorMatch[]> {
    const matches: VectorMatch[] = [];
    for (const v of this.vectors.values()) {
      if (v.parserId !== parserId || v.schemaVersion !== schemaVersion) continue;
      matches.push({ requestHash: v.requestHash, similarity: cosineSimilarity(embedding, v.embedding) });
    }
    matches.sort((a, b) => b.similarity - a.similarity || compareKeys(a.requestHash, b.requestHash));
    return matches.slice(0, topK);
  }

  get size(): number {
    return this.vectors.size;
  }
}
