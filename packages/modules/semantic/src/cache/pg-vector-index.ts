import { and, asc, cosineDistance, eq, isNotNull, sql } from 'drizzle-orm';
import { db, guardedQuery, queryMappingCache, EMBEDDING_DIMENSIONS } from '@geoinsight/db';
import type { Database } from '@geoinsight/db';
import { InvalidArgumentError } from '@geoinsight/shared';
import type { IndexedVector, VectorIndex, VectorMatch, VectorSearch } from './vector-index';

function assertWidth(embedding: readonly number[]): void {
  if (embedding.length !== EMBEDDING_DIMENSIONS) {
    throw new InvalidArgumentError(
      `embedding has ${embedding.length} dimensions; query_mapping_cache stores ${EMBEDDING_DIMENSIONS}`,
    );
  }
}

/**
 * pgvector search over `query_mapping_cache.embedding` (hnsw, cosine).
 * The row must already exist: `add` fills its embedding column.
 */
export class PgVectorIndex implements VectorIndex {
  constructor(
    private readonly database: Database = db,
    private readonly timeoutMs?: number,
  ) {}

  async add({ requestHash, embedding }: IndexedVector): Promise<void> {
    assertWidth(embedding);
    await guardedQuery(
      'query-cache.index.add',
      () =>
        this.database
          .update(queryMappingCache)
          .set({ embedding: [...embedding] })
          .where(eq(queryMappingCache.requestHash, requestHash)),
      { timeoutMs: this.timeoutMs },
    );
  }

  async search({ embedding, parserId, schemaVersion, topK }: VectorSearch): Promise<VectorMatch[]> {
    assertWidth(embedding);
    const distance = sql<number>`${cosineDistance(queryMappingCache.embedding, [...embedding])}`;
    const rows = await guardedQuery(
      'query-cache.index.search',
      () =>
        this.database
          .select({ requestHash: queryMappingCache.requestHash, distance })
          .from(queryMappingCache)
          .where(
            and(
              eq(queryMappingCache.parserId, parserId),
              eq(queryMappingCache.schemaVersion, schemaVersion),
              isNotNull(queryMappingCache.embedding),
            ),
          )
          .orderBy(asc(distance))
          .limit(topK),
      { timeoutMs: this.timeoutMs },
    );
    return rows.map((row) => ({ requestHash: row.requestHash, similarity: 1 - Number(row.distance) }));
  }
}
