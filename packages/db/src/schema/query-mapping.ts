import { pgTable, text, jsonb, timestamp, vector, index } from 'drizzle-orm/pg-core';

export const EMBEDDING_DIMENSIONS = 1536;

// ── Query Mapping Cache ──────────────────────────────────────────
// Free-text analytical request → structured query. Keyed by the exact
// fingerprint of (normalized text, parser identity, schema version);
// searchable by cosine distance over `embedding` for near-duplicates.
// Rows from an older schema version stay in place but never match.

export const queryMappingCache = pgTable(
  'query_mapping_cache',
  {
    requestHash: text('request_hash').primaryKey(),
    requestText: text('request_text').notNull(),
    parserId: text('parser_id').notNull(),
    schemaVersion: text('schema_version').notNull(),
    queryJson: jsonb('query_json').$type<Record<string, unknown>>().notNull(),
    // filled by the vector index once the request has been embedded
    embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }),
    aliasOf: text('alias_of'), // request_hash of the entry a near-hit reused
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    index('idx_query_mapping_cache_version').on(t.schemaVersion, t.parserId),
    index('idx_query_mapping_cache_embedding').using('hnsw', t.embedding.op('vector_cosine_ops')),
  ],
);
