import type { SpatialLevel } from '@geoinsight/shared';
import { getInsightsConfig, DistributedRefreshLock } from '@geoinsight/core';
import type { FactStore } from '../facts/fact-store';
import { DrizzleFactStore } from '../facts/drizzle-fact-store';
import type { ResolutionRules } from '../spatial/strategies';
import { AdvancedInsightService } from '../advanced/advanced-insight-service';
import { DrizzleAdvancedInsightRepository } from '../advanced/drizzle-repository';

/** Collaborators and settings every insight operation runs against. */
export interface InsightsContext {
  factStore: FactStore;
  advancedInsights: AdvancedInsightService;
  defaultLevel: SpatialLevel;
  rules: ResolutionRules;
  /** Caller cancellation for the fact reads. */
  signal?: AbortSignal;
}

/** Postgres-backed context configured from the environment. */
export function createInsightsContext(): InsightsContext {
  const config = getInsightsConfig();
  const rules: ResolutionRules = {
    codePrefixLength: config.insights.codePrefixLength,
    coarsestPrefixLength: config.insights.coarsestPrefixLength,
  };
  const factStore = new DrizzleFactStore(undefined, config.db.queryTimeoutMs);
  return {
    factStore,
    rules,
    defaultLevel: config.insights.defaultLevel,
    advancedInsights: new AdvancedInsightService({
      factStore,
      rules,
      repository: new DrizzleAdvancedInsightRepository(),
      lock: new DistributedRefreshLock(config.insights.refreshLockTtlMs, { trigger: 'refresh' }),
      refreshTimeoutMs: config.insights.refreshTimeoutMs,
    }),
  };
}

let _context: InsightsContext | null = null;

export function getInsightsContext(): InsightsContext {
  if (!_context) {
    _context = createInsightsContext();
  }
  return _context;
}

export function setInsightsContext(context: InsightsContext | null): void {
  _context = context;
}
