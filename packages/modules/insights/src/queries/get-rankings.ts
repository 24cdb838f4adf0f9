import { assertValidated } from '@geoinsight/shared';
import type { ApiResponse, RankableMetric } from '@geoinsight/shared';
import { compareKeys } from '../spatial/directory';
import type { InsightsContext } from './context';
import { getRankingsSchema } from './validation';
import type { GetRankingsInput } from './validation';
import { buildMeta, candidatesAt, loadCandidates, resolvePeriodDate } from './helpers';

export interface RankingEntry {
  spatialLabel: string;
  value: number;
  /** Dense rank among every unit of the level on that date. */
  rank: number;
}

export interface RankingsResult {
  metric: RankableMetric;
  /** Date the ranking was taken on; null when a bare year has no data. */
  period: string | null;
  rankings: RankingEntry[];
}

/** Top-K units of a level by one metric on one date. */
export async function getRankings(
  ctx: InsightsContext,
  input: GetRankingsInput,
): Promise<ApiResponse<RankingsResult>> {
  const parsed = getRankingsSchema.safeParse(input);
  assertValidated(parsed, 'Invalid getRankings request');
  const { metric, period, topK } = parsed.data;
  const level = parsed.data.level ?? ctx.defaultLevel;

  const collection = await loadCandidates(ctx);
  const rows = candidatesAt(collection, level);
  const date = resolvePeriodDate(period, rows);

  const rankings: RankingEntry[] = [];
  if (date !== null) {
    for (const row of rows) {
      const window = row.metrics[metric];
      if (row.date !== date || window.value === null) continue;
      rankings.push({ spatialLabel: row.spatialLabel, value: window.value, rank: window.rank });
    }
    rankings.sort((a, b) => a.rank - b.rank || compareKeys(a.spatialLabel, b.spatialLabel));
  }

  return {
    data: { metric, period: date, rankings: rankings.slice(0, topK) },
    meta: buildMeta({
      level,
      periodFrom: date,
      periodTo: date,
      sources: collection.sources,
      warnings: date === null ? [`no data in period ${period}`, ...collection.warnings] : collection.warnings,
    }),
  };
}
