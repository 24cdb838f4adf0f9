import { DOMAIN_METRIC, assertValidated, toDateRange, isWithinRange, InvalidArgumentError } from '@geoinsight/shared';
import type { ApiResponse, Domain, RankableMetric } from '@geoinsight/shared';
import type { InsightsContext } from './context';
import { compareDomainsSchema } from './validation';
import type { CompareDomainsInput } from './validation';
import { buildMeta, candidatesAt, loadCandidates } from './helpers';

export type TrendLabel = 'up' | 'down' | 'flat';
export type SignalLabel = 'insufficient_data' | 'minor_change' | 'moderate_change' | 'strong_change';

export interface DomainComparison {
  domain: Domain;
  metric: RankableMetric;
  value: number | null;
  prior: number | null;
  /** Month-over-month change. */
  changeRate: number | null;
  priorYear: number | null;
  yoyChangeRate: number | null;
  trend: TrendLabel;
  signal: SignalLabel;
}

export interface CompareDomainsResult {
  region: string;
  /** Latest date in range with data for the region; null when none. */
  date: string | null;
  comparisons: DomainComparison[];
}

export const MODERATE_CHANGE_THRESHOLD = 0.05;
export const STRONG_CHANGE_THRESHOLD = 0.2;

export function trendLabel(changeRate: number | null): TrendLabel {
  if (changeRate === null || changeRate === 0) return 'flat';
  return changeRate > 0 ? 'up' : 'down';
}

export function signalLabel(changeRate: number | null): SignalLabel {
  if (changeRate === null) return 'insufficient_data';
  const magnitude = Math.abs(changeRate);
  if (magnitude >= STRONG_CHANGE_THRESHOLD) return 'strong_change';
  if (magnitude >= MODERATE_CHANGE_THRESHOLD) return 'moderate_change';
  return 'minor_change';
}

/**
 * Latest-period comparison of each requested domain for one region:
 * current value, month-over-month and year-over-year change, with trend
 * and signal labels.
 */
export async function compareDomains(
  ctx: InsightsContext,
  input: CompareDomainsInput,
): Promise<ApiResponse<CompareDomainsResult>> {
  const parsed = compareDomainsSchema.safeParse(input);
  assertValidated(parsed, 'Invalid compareDomains request');
  const { region, periodFrom, periodTo, domains } = parsed.data;
  const level = parsed.data.level ?? ctx.defaultLevel;

  const range = toDateRange(periodFrom, periodTo);
  if (!range) throw new InvalidArgumentError('period must be YYYY, YYYY-MM, or YYYY-MM-DD');

  const collection = await loadCandidates(ctx);
  const rows = candidatesAt(collection, level, region).filter((c) => isWithinRange(c.date, range));
  const latest = rows.reduce<(typeof rows)[number] | null>(
    (acc, row) => (acc === null || row.date > acc.date ? row : acc),
    null,
  );

  const comparisons = domains.map((domain): DomainComparison => {
    const metric = DOMAIN_METRIC[domain];
    const window = latest?.metrics[metric];
    const changeRate = window?.momPct ?? null;
    return {
      domain,
      metric,
      value: window?.value ?? null,
      prior: window?.prior ?? null,
      changeRate,
      priorYear: window?.priorYear ?? null,
      yoyChangeRate: window?.yoyPct ?? null,
      trend: trendLabel(changeRate),
      signal: signalLabel(changeRate),
    };
  });

  return {
    data: { region, date: latest?.date ?? null, comparisons },
    meta: buildMeta({
      level,
      periodFrom: range.from,
      periodTo: range.to,
      sources: collection.sources,
      warnings: collection.warnings,
    }),
  };
}
