import { DOMAIN_METRIC, assertValidated } from '@geoinsight/shared';
import type { ApiResponse, RankableMetric } from '@geoinsight/shared';
import type { InsightsContext } from './context';
import { detectAnomalySchema } from './validation';
import type { DetectAnomalyInput } from './validation';
import { buildMeta, candidatesAt, loadCandidates, resolvePeriodDate } from './helpers';

export interface AnomalyResult {
  region: string;
  metric: RankableMetric;
  period: string | null;
  value: number | null;
  zScore: number | null;
  threshold: number;
  isAnomaly: boolean;
}

/** Flags a region's value as anomalous when |z| ≥ threshold. */
export async function detectAnomaly(
  ctx: InsightsContext,
  input: DetectAnomalyInput,
): Promise<ApiResponse<AnomalyResult>> {
  const parsed = detectAnomalySchema.safeParse(input);
  assertValidated(parsed, 'Invalid detectAnomaly request');
  const { region, domain, period, zThreshold } = parsed.data;
  const level = parsed.data.level ?? ctx.defaultLevel;
  const metric = DOMAIN_METRIC[domain];

  const collection = await loadCandidates(ctx);
  const rows = candidatesAt(collection, level, region);
  const date = resolvePeriodDate(period, rows);
  const window = rows.find((r) => r.date === date)?.metrics[metric];
  const zScore = window?.zScore ?? null;

  return {
    data: {
      region,
      metric,
      period: date,
      value: window?.value ?? null,
      zScore,
      threshold: zThreshold,
      isAnomaly: zScore !== null && Math.abs(zScore) >= zThreshold,
    },
    meta: buildMeta({
      level,
      periodFrom: date,
      periodTo: date,
      sources: collection.sources,
      warnings: collection.warnings,
    }),
  };
}
