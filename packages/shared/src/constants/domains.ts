export const ACTIVITY_METRICS = ['foot_traffic', 'sales', 'sales_count'] as const;
export type ActivityMetric = (typeof ACTIVITY_METRICS)[number];

/** Metrics that carry a correlation/impact pair in advanced insights. */
export const RANKABLE_METRICS = ['foot_traffic', 'sales'] as const;
export type RankableMetric = (typeof RANKABLE_METRICS)[number];

export const DOMAINS = ['population', 'sales'] as const;
export type Domain = (typeof DOMAINS)[number];

export const DOMAIN_METRIC: Readonly<Record<Domain, RankableMetric>> = {
  population: 'foot_traffic',
  sales: 'sales',
};

/** Caller-facing metric names that map onto a stored metric. */
export const METRIC_ALIASES: Readonly<Record<string, RankableMetric>> = {
  activity_volume: 'foot_traffic',
  foot_traffic: 'foot_traffic',
  sales: 'sales',
};

/** Metric a caller-facing name maps to; only the table's own keys count. */
export function metricForAlias(name: string): RankableMetric | undefined {
  return Object.hasOwn(METRIC_ALIASES, name) ? METRIC_ALIASES[name] : undefined;
}
