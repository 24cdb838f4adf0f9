import { nowUTC, parsePeriod } from '@geoinsight/shared';
import type { ResponseMetadata, SpatialLevel } from '@geoinsight/shared';
import { loadInsightCandidates } from '../candidates/load-candidates';
import type { CandidateCollection, InsightCandidate } from '../types';
import type { InsightsContext } from './context';

export async function loadCandidates(ctx: InsightsContext): Promise<CandidateCollection> {
  return loadInsightCandidates(ctx.factStore, { rules: ctx.rules, signal: ctx.signal });
}

export function candidatesAt(
  collection: CandidateCollection,
  level: SpatialLevel,
  spatialLabel?: string,
): InsightCandidate[] {
  return collection.candidates.filter(
    (c) => c.level === level && (spatialLabel === undefined || c.spatialLabel === spatialLabel),
  );
}

/**
 * Date a single-period argument points at. A bare year means the latest
 * date in that year that has data among `rows`; a month means its first
 * day; a full date means itself.
 */
export function resolvePeriodDate(period: string, rows: readonly InsightCandidate[]): string | null {
  const parsed = parsePeriod(period);
  if (!parsed) return null;
  if (parsed.precision === 'month') return parsed.start;
  if (parsed.precision === 'day') return parsed.start;

  let latest: string | null = null;
  for (const row of rows) {
    if (row.date >= parsed.start && row.date <= parsed.end && (latest === null || row.date > latest)) {
      latest = row.date;
    }
  }
  return latest;
}

export function buildMeta(
  fields: Pick<ResponseMetadata, 'level' | 'periodFrom' | 'periodTo'> &
    Partial<Pick<ResponseMetadata, 'sources' | 'warnings'>>,
): ResponseMetadata {
  return {
    sources: fields.sources ?? [],
    generatedAt: nowUTC(),
    periodFrom: fields.periodFrom,
    periodTo: fields.periodTo,
    level: fields.level,
    warnings: fields.warnings ?? [],
  };
}
