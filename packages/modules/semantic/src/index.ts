export const MODULE_KEY = 'semantic' as const;
export const MODULE_NAME = 'Semantic Query Cache';
export const MODULE_VERSION = '0.1.0';

/** SQL tables owned by this module */
export const MODULE_TABLES = ['query_mapping_cache'] as const;

// ── Structured queries ────────────────────────────────────────
export {
  STRUCTURED_QUERY_SCHEMA_VERSION,
  DEFAULT_STRUCTURED_QUERY,
  structuredQuerySchema,
  parseStructuredQuery,
} from './structured-query';
export type { StructuredQuery, QueryOperation } from './structured-query';

// ── Cache layer ───────────────────────────────────────────────
export * from './cache';

// ── LLM integration layer ─────────────────────────────────────
export * from './llm';

// ── Request answering ─────────────────────────────────────────
export * from './assistant';
