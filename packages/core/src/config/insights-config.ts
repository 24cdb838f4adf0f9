import { z } from 'zod';
import { SPATIAL_LEVELS, DEFAULT_SPATIAL_LEVEL, assertValidated } from '@geoinsight/shared';
import { setLogLevel } from '../observability/logger';

/**
 * Engine configuration from environment variables. Parsed once and cached;
 * tests call `resetInsightsConfig()` after changing `process.env`.
 */

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const insightsEnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: intFromEnv(2),
  DB_QUERY_TIMEOUT: intFromEnv(15_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  INSIGHTS_DEFAULT_LEVEL: z.enum(SPATIAL_LEVELS).default(DEFAULT_SPATIAL_LEVEL),
  INSIGHTS_CODE_PREFIX_LENGTH: intFromEnv(5),
  INSIGHTS_COARSEST_PREFIX_LENGTH: intFromEnv(2),
  INSIGHTS_REFRESH_TIMEOUT_MS: intFromEnv(60_000),
  INSIGHTS_REFRESH_LOCK_TTL_MS: intFromEnv(300_000),
  QUERY_CACHE_SIMILARITY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.92),
  QUERY_CACHE_TOP_K: intFromEnv(5),
  QUERY_CACHE_LOOKUP_TIMEOUT_MS: intFromEnv(2_000),
  TRANSLATOR_TIMEOUT_MS: intFromEnv(30_000),
  TRANSLATOR_MODEL: z.string().min(1).default('gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  OPENAI_API_KEY: z.string().min(1).optional(),
});

export interface InsightsConfig {
  databaseUrl?: string;
  db: {
    poolMax: number;
    queryTimeoutMs: number;
  };
  logLevel: z.infer<typeof insightsEnvSchema>['LOG_LEVEL'];
  insights: {
    defaultLevel: z.infer<typeof insightsEnvSchema>['INSIGHTS_DEFAULT_LEVEL'];
    codePrefixLength: number;
    coarsestPrefixLength: number;
    refreshTimeoutMs: number;
    refreshLockTtlMs: number;
  };
  queryCache: {
    similarityThreshold: number;
    topK: number;
    lookupTimeoutMs: number;
  };
  translator: {
    model: string;
    timeoutMs: number;
    embeddingModel: string;
    apiKey?: string;
  };
}

// Empty strings count as unset so `FOO=` in a .env file keeps the default.
function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function parseInsightsConfig(env: NodeJS.ProcessEnv): InsightsConfig {
  const result = insightsEnvSchema.safeParse(definedEntries(env));
  assertValidated(result, 'Invalid insights configuration');
  const parsed = result.data;

  return {
    databaseUrl: parsed.DATABASE_URL,
    db: {
      poolMax: parsed.DB_POOL_MAX,
      queryTimeoutMs: parsed.DB_QUERY_TIMEOUT,
    },
    logLevel: parsed.LOG_LEVEL,
    insights: {
      defaultLevel: parsed.INSIGHTS_DEFAULT_LEVEL,
      codePrefixLength: parsed.INSIGHTS_CODE_PREFIX_LENGTH,
      coarsestPrefixLength: parsed.INSIGHTS_COARSEST_PREFIX_LENGTH,
      refreshTimeoutMs: parsed.INSIGHTS_REFRESH_TIMEOUT_MS,
      refreshLockTtlMs: parsed.INSIGHTS_REFRESH_LOCK_TTL_MS,
    },
    queryCache: {
      similarityThreshold: parsed.QUERY_CACHE_SIMILARITY_THRESHOLD,
      topK: parsed.QUERY_CACHE_TOP_K,
      lookupTimeoutMs: parsed.QUERY_CACHE_LOOKUP_TIMEOUT_MS,
    },
    translator: {
      model: parsed.TRANSLATOR_MODEL,
      timeoutMs: parsed.TRANSLATOR_TIMEOUT_MS,
      embeddingModel: parsed.EMBEDDING_MODEL,
      apiKey: parsed.OPENAI_API_KEY,
    },
  };
}

let _config: InsightsConfig | null = null;

export function getInsightsConfig(): InsightsConfig {
  if (_config) return _config;
  _config = parseInsightsConfig(process.env);
  setLogLevel(_config.logLevel);
  return _config;
}

/** Reset cached config (for testing) */
export function resetInsightsConfig(): void {
  _config = null;
}
