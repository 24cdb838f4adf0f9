import { InvalidArgumentError } from '@geoinsight/shared';
import type { ApiResponse } from '@geoinsight/shared';
import {
  compareDomains,
  detectAnomaly,
  getAdvancedInsight,
  getRankings,
} from '@geoinsight/module-insights';
import type {
  AdvancedInsightResult,
  AnomalyResult,
  CompareDomainsResult,
  InsightsContext,
  RankingsResult,
} from '@geoinsight/module-insights';
import type { CacheLookup, SemanticQueryCache } from '../cache/semantic-query-cache';
import type { StructuredQuery } from '../structured-query';

export interface AnswerDefaults {
  /** Region used when the request names none, and by the fallback query. */
  region?: string;
  level?: string;
}

export interface AnswerDeps {
  cache: SemanticQueryCache;
  insights: InsightsContext;
  signal?: AbortSignal;
}

type Answer<Op extends StructuredQuery['operation'], T> = {
  operation: Op;
  lookup: CacheLookup;
  response: ApiResponse<T>;
};

export type AnswerResult =
  | Answer<'compare_domains', CompareDomainsResult>
  | Answer<'get_rankings', RankingsResult>
  | Answer<'detect_anomaly', AnomalyResult>
  | Answer<'get_advanced_insight', AdvancedInsightResult>;

export const FALLBACK_WARNING = 'request could not be translated; answered with the default comparison';

function requireRegion(region: string | null | undefined, defaults: AnswerDefaults): string {
  const resolved = region ?? defaults.region;
  if (!resolved) {
    throw new InvalidArgumentError('region is required', [
      { field: 'region', message: 'the request names no region and no default region is set' },
    ]);
  }
  return resolved;
}

function withWarning<T>(response: ApiResponse<T>, lookup: CacheLookup): ApiResponse<T> {
  if (!lookup.fallback) return response;
  return { ...response, meta: { ...response.meta, warnings: [FALLBACK_WARNING, ...response.meta.warnings] } };
}

/**
 * Answers a free-text analytical request: resolves it to a structured
 * query through the cache, then runs the matching insight operation.
 * An untranslatable request still gets the default comparison.
 */
export async function answerRequest(
  text: string,
  defaults: AnswerDefaults,
  { cache, insights, signal }: AnswerDeps,
): Promise<AnswerResult> {
  const lookup = await cache.resolve(text, { signal });
  const query = lookup.query;
  const level = query.level ?? defaults.level ?? undefined;
  const ctx: InsightsContext = signal ? { ...insights, signal } : insights;

  switch (query.operation) {
    case 'compare_domains': {
      const response = await compareDomains(ctx, {
        region: requireRegion(query.region, defaults),
        periodFrom: query.periodFrom,
        periodTo: query.periodTo,
        domains: query.domains ?? undefined,
        level,
      });
      return { operation: query.operation, lookup, response: withWarning(response, lookup) };
    }
    case 'get_rankings': {
      const response = await getRankings(ctx, {
        metric: query.metric,
        period: query.period,
        topK: query.topK ?? undefined,
        level,
      });
      return { operation: query.operation, lookup, response: withWarning(response, lookup) };
    }
    case 'detect_anomaly': {
      const response = await detectAnomaly(ctx, {
        region: requireRegion(query.region, defaults),
        domain: query.domain,
        period: query.period,
        zThreshold: query.zThreshold ?? undefined,
        level,
      });
      return { operation: query.operation, lookup, response: withWarning(response, lookup) };
    }
    case 'get_advanced_insight': {
      const response = await getAdvancedInsight(ctx, {
        region: requireRegion(query.region, defaults),
        period: query.period,
        domains: query.domains ?? undefined,
        level,
      });
      return { operation: query.operation, lookup, response: withWarning(response, lookup) };
    }
  }
}
