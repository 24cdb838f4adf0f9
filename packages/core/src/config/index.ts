export { getInsightsConfig, resetInsightsConfig, parseInsightsConfig } from './insights-config';
export type { InsightsConfig } from './insights-config';
