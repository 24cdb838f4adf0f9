import { getInsightsConfig } from '@geoinsight/core';
import { OpenAITranslator, UnavailableTranslator } from '../llm/translator';
import { OpenAIEmbeddingProvider, UnavailableEmbeddingProvider } from '../llm/embeddings';
import { DrizzleQueryMappingStore } from './drizzle-query-mapping-store';
import { PgVectorIndex } from './pg-vector-index';
import { SemanticQueryCache } from './semantic-query-cache';

/**
 * Postgres-backed cache configured from the environment. Without
 * `OPENAI_API_KEY` every request that misses falls back to the default
 * query. Call `init()` on the result before use.
 */
export function createSemanticQueryCache(): SemanticQueryCache {
  const config = getInsightsConfig();
  const { apiKey, model, embeddingModel, timeoutMs } = config.translator;
  const lookupTimeoutMs = config.queryCache.lookupTimeoutMs;
  return new SemanticQueryCache(
    {
      store: new DrizzleQueryMappingStore(undefined, lookupTimeoutMs),
      index: new PgVectorIndex(undefined, lookupTimeoutMs),
      translator: apiKey
        ? new OpenAITranslator({ apiKey, model, timeoutMs })
        : new UnavailableTranslator(model),
      embeddings: apiKey
        ? new OpenAIEmbeddingProvider({ apiKey, model: embeddingModel, timeoutMs: lookupTimeoutMs })
        : new UnavailableEmbeddingProvider(),
    },
    {
      similarityThreshold: config.queryCache.similarityThreshold,
      topK: config.queryCache.topK,
      lookupTimeoutMs,
      translatorTimeoutMs: timeoutMs,
    },
  );
}
