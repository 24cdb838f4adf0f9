export { createInsightsContext, getInsightsContext, setInsightsContext } from './context';
export type { InsightsContext } from './context';
export {
  compareDomainsSchema,
  getRankingsSchema,
  detectAnomalySchema,
  getAdvancedInsightSchema,
} from './validation';
export type {
  CompareDomainsInput,
  GetRankingsInput,
  DetectAnomalyInput,
  GetAdvancedInsightInput,
} from './validation';
export { resolvePeriodDate } from './helpers';
export {
  compareDomains,
  trendLabel,
  signalLabel,
  MODERATE_CHANGE_THRESHOLD,
  STRONG_CHANGE_THRESHOLD,
} from './compare-domains';
export type { CompareDomainsResult, DomainComparison, TrendLabel, SignalLabel } from './compare-domains';
export { getRankings } from './get-rankings';
export type { RankingsResult, RankingEntry } from './get-rankings';
export { detectAnomaly } from './detect-anomaly';
export type { AnomalyResult } from './detect-anomaly';
export { getAdvancedInsight, ADVANCED_INSIGHT_SOURCE } from './get-advanced-insight';
export type { AdvancedInsightResult, AdvancedInsightPayload } from './get-advanced-insight';
