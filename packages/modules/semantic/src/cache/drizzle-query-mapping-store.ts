import { eq, sql } from 'drizzle-orm';
import { db, guardedQuery, queryMappingCache } from '@geoinsight/db';
import type { Database } from '@geoinsight/db';
import { InternalError } from '@geoinsight/shared';
import { logger } from '@geoinsight/core';
import { parseStructuredQuery } from '../structured-query';
import type { NewQueryMappingEntry, QueryMappingEntry, QueryMappingStore } from './query-mapping-store';

type Row = typeof queryMappingCache.$inferSelect;

function toEntry(row: Row): QueryMappingEntry | null {
  const query = parseStructuredQuery(row.queryJson);
  if (!query) {
    logger.warn('Stored structured query no longer parses; ignoring entry', {
      operation: 'query-cache.store',
      requestHash: row.requestHash,
      schemaVersion: row.schemaVersion,
    });
    return null;
  }
  return {
    requestHash: row.requestHash,
    requestText: row.requestText,
    parserId: row.parserId,
    schemaVersion: row.schemaVersion,
    query,
    aliasOf: row.aliasOf,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

/** `query_mapping_cache` rows. Embeddings are written by `PgVectorIndex`. */
export class DrizzleQueryMappingStore implements QueryMappingStore {
  constructor(
    private readonly database: Database = db,
    private readonly timeoutMs?: number,
  ) {}

  async get(requestHash: string): Promise<QueryMappingEntry | null> {
    const [row] = await guardedQuery(
      'query-cache.get',
      () =>
        this.database
          .select()
          .from(queryMappingCache)
          .where(eq(queryMappingCache.requestHash, requestHash))
          .limit(1),
      { timeoutMs: this.timeoutMs },
    );
    return row ? toEntry(row) : null;
  }

  async put(entry: NewQueryMappingEntry): Promise<QueryMappingEntry> {
    const [row] = await guardedQuery(
      'query-cache.put',
      () =>
        this.database
          .insert(queryMappingCache)
          .values({
            requestHash: entry.requestHash,
            requestText: entry.requestText,
            parserId: entry.parserId,
            schemaVersion: entry.schemaVersion,
            queryJson: entry.query,
            aliasOf: entry.aliasOf,
          })
          // the first stored translation wins; a repeat only touches updated_at
          .onConflictDoUpdate({
            target: queryMappingCache.requestHash,
            set: { updatedAt: sql`now()` },
          })
          .returning(),
      { timeoutMs: this.timeoutMs },
    );
    const stored = row ? toEntry(row) : null;
    if (!stored) {
      throw new InternalError(`query mapping ${entry.requestHash} was not readable after upsert`);
    }
    return stored;
  }
}
