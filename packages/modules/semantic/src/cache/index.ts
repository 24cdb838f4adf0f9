export { normalizeRequestText, requestFingerprint } from './fingerprint';
export type { FingerprintInput } from './fingerprint';
export { InMemoryVectorIndex, cosineSimilarity } from './vector-index';
export type { VectorIndex, IndexedVector, VectorSearch, VectorMatch } from './vector-index';
export { PgVectorIndex } from './pg-vector-index';
export { InMemoryQueryMappingStore } from './query-mapping-store';
export type { QueryMappingStore, QueryMappingEntry, NewQueryMappingEntry } from './query-mapping-store';
export { DrizzleQueryMappingStore } from './drizzle-query-mapping-store';
export { SemanticQueryCache } from './semantic-query-cache';
export type {
  CacheLookup,
  CacheOutcome,
  SemanticQueryCacheDeps,
  SemanticQueryCacheOptions,
  ResolveOptions,
} from './semantic-query-cache';
export { createSemanticQueryCache } from './create-query-cache';
