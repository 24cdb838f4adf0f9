import { InProcessRefreshLock } from '@geoinsight/core';
import type { RefreshLock } from '@geoinsight/core';
import { InMemoryFactStore } from '../facts/in-memory-fact-store';
import { InMemoryAdvancedInsightRepository } from '../advanced/repository';
import { AdvancedInsightService } from '../advanced/advanced-insight-service';
import { DEFAULT_RESOLUTION_RULES } from '../spatial/resolver';
import type { InsightsContext } from '../queries/context';
import type { ActivityFact, DemographicFact, SpatialDirectorySnapshot } from '../types';

export const DIRECTORY: SpatialDirectorySnapshot = {
  finest: [
    { spatialKey: '1111051500', spatialLabel: 'Cheongun', spatialType: 'emd', code: '1111051500' },
    { spatialKey: 'grid-7', spatialLabel: 'Sajik', spatialType: 'grid', code: null },
  ],
  intermediate: [
    { code: '11110', name: 'Jongno', parentCode: '11', parentName: 'Seoul' },
    { code: '11140', name: 'Jung', parentCode: '11', parentName: 'Seoul' },
  ],
  coarsest: [
    { code: '11', name: 'Seoul' },
    { code: '26', name: 'Busan' },
  ],
};

/** First day of a month as `YYYY-MM-DD`. */
export function month(year: number, m: number): string {
  return `${year}-${String(m).padStart(2, '0')}-01`;
}

export function activity(
  spatialKey: string,
  date: string,
  values: { footTraffic?: number | null; sales?: number | null; salesCount?: number | null } = {},
  source = 'card',
  granularity = 'month',
): ActivityFact {
  return {
    spatialKey,
    date,
    granularity,
    source,
    footTraffic: values.footTraffic ?? null,
    sales: values.sales ?? null,
    salesCount: values.salesCount ?? null,
  };
}

export function demographic(
  spatialKey: string,
  date: string,
  sex: string,
  ageGroup: string,
  value: number | null,
  source = 'survey',
): DemographicFact {
  return { spatialKey, date, granularity: 'month', source, sex, ageGroup, value };
}

export function createTestContext(
  init: {
    activity?: ActivityFact[];
    demographics?: DemographicFact[];
    directory?: SpatialDirectorySnapshot;
    lock?: RefreshLock;
  } = {},
): InsightsContext & { factStore: InMemoryFactStore; repository: InMemoryAdvancedInsightRepository } {
  const factStore = new InMemoryFactStore({
    activity: init.activity ?? [],
    demographics: init.demographics ?? [],
    directory: init.directory ?? DIRECTORY,
  });
  const repository = new InMemoryAdvancedInsightRepository();
  return {
    factStore,
    repository,
    rules: DEFAULT_RESOLUTION_RULES,
    defaultLevel: 'intermediate',
    advancedInsights: new AdvancedInsightService({
      factStore,
      repository,
      lock: init.lock ?? new InProcessRefreshLock(),
      rules: DEFAULT_RESOLUTION_RULES,
      refreshTimeoutMs: 5_000,
    }),
  };
}
