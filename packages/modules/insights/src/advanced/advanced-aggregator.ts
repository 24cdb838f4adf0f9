import { compareCandidates } from '../candidates/aggregator';
import { meanAbsolute, olsSlope, pearson } from '../metrics/stats';
import type { Pair } from '../metrics/stats';
import type { AdvancedInsight, InsightCandidate } from '../types';

/**
 * Correlation and impact per (level, label), over candidates where both
 * sales and foot traffic are present. Correlation and slope are null below
 * two pairs or when either metric is constant; impact scores are the mean
 * absolute z-score of each metric across those rows.
 */
export function computeAdvancedInsights(candidates: readonly InsightCandidate[]): AdvancedInsight[] {
  const groups = new Map<string, InsightCandidate[]>();
  for (const c of [...candidates].sort(compareCandidates)) {
    if (c.metrics.sales.value === null || c.metrics.foot_traffic.value === null) continue;
    const key = `${c.level}\u0000${c.spatialLabel}`;
    const group = groups.get(key);
    if (group) group.push(c);
    else groups.set(key, [c]);
  }

  const insights: AdvancedInsight[] = [];
  for (const rows of groups.values()) {
    const [first] = rows;
    if (!first) continue;
    const pairs: Pair[] = [];
    for (const r of rows) {
      const x = r.metrics.foot_traffic.value;
      const y = r.metrics.sales.value;
      if (x !== null && y !== null) pairs.push({ x, y });
    }
    insights.push({
      level: first.level,
      spatialLabel: first.spatialLabel,
      pairCount: pairs.length,
      corrSalesFootTraffic: pearson(pairs),
      salesImpactSlope: olsSlope(pairs),
      salesImpactScore: meanAbsolute(rows.map((r) => r.metrics.sales.zScore)),
      footTrafficImpactScore: meanAbsolute(rows.map((r) => r.metrics.foot_traffic.zScore)),
    });
  }
  return insights;
}
