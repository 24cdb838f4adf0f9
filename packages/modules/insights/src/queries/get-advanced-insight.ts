import { assertValidated, parsePeriod } from '@geoinsight/shared';
import type { ApiResponse, Domain, SpatialLevel } from '@geoinsight/shared';
import type { InsightsContext } from './context';
import { getAdvancedInsightSchema } from './validation';
import type { GetAdvancedInsightInput } from './validation';
import { buildMeta } from './helpers';

export const ADVANCED_INSIGHT_SOURCE = 'insight_advanced';

export interface AdvancedInsightPayload {
  level: SpatialLevel;
  region: string;
  period: string;
  domains: Domain[];
  pairCount: number;
  correlation: {
    salesVsFootTraffic: number | null;
  };
  impact: {
    salesImpactSlope: number | null;
    salesImpactScore: number | null;
    footTrafficImpactScore: number | null;
  };
}

export interface AdvancedInsightResult {
  insight: AdvancedInsightPayload | null;
  /** When the serving generation was computed; null before the first refresh. */
  refreshedAt: string | null;
  generationId: string | null;
}

/**
 * Reads a region's correlation and impact scores from the last published
 * generation. Never triggers a refresh.
 */
export async function getAdvancedInsight(
  ctx: InsightsContext,
  input: GetAdvancedInsightInput,
): Promise<ApiResponse<AdvancedInsightResult>> {
  const parsed = getAdvancedInsightSchema.safeParse(input);
  assertValidated(parsed, 'Invalid getAdvancedInsight request');
  const { region, domains } = parsed.data;
  const level = parsed.data.level ?? ctx.defaultLevel;
  const period = parsePeriod(parsed.data.period)?.start ?? null;

  const current = await ctx.advancedInsights.getCurrent(level, region);
  const insight = current?.insight;

  const warnings: string[] = [];
  if (!current) warnings.push('advanced insights have not been computed yet');
  else if (!insight) warnings.push(`no advanced insight for ${region} at ${level} level`);

  return {
    data: {
      insight:
        insight && period
          ? {
              level: insight.level,
              region: insight.spatialLabel,
              period,
              domains,
              pairCount: insight.pairCount,
              correlation: { salesVsFootTraffic: insight.corrSalesFootTraffic },
              impact: {
                salesImpactSlope: insight.salesImpactSlope,
                salesImpactScore: insight.salesImpactScore,
                footTrafficImpactScore: insight.footTrafficImpactScore,
              },
            }
          : null,
      refreshedAt: current?.generation.refreshedAt ?? null,
      generationId: current?.generation.id ?? null,
    },
    meta: buildMeta({
      level,
      periodFrom: period,
      periodTo: period,
      sources: [ADVANCED_INSIGHT_SOURCE],
      warnings,
    }),
  };
}
