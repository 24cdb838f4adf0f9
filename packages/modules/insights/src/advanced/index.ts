export { computeAdvancedInsights } from './advanced-aggregator';
export { InMemoryAdvancedInsightRepository } from './repository';
export type { AdvancedInsightRepository, CurrentInsight } from './repository';
export { DrizzleAdvancedInsightRepository } from './drizzle-repository';
export { AdvancedInsightService } from './advanced-insight-service';
export type {
  AdvancedInsightServiceDeps,
  RefreshOptions,
  RefreshResult,
} from './advanced-insight-service';
