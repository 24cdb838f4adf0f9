import { InternalError } from '@geoinsight/shared';
import type { ActivityMetric } from '@geoinsight/shared';
import { compareKeys } from '../spatial/directory';
import { denseRanks, mean, percentDelta, sampleStdDev, zScore } from './stats';
import type { MetricValues, MetricWindow, MetricWindows } from '../types';

/** Facts of one level already summed per (label, date). */
export interface AggregatedRow {
  spatialLabel: string;
  date: string;
  values: MetricValues;
}

export interface WindowedRow {
  spatialLabel: string;
  date: string;
  metrics: MetricWindows;
}

export const PRIOR_LAG = 1;
export const PRIOR_YEAR_LAG = 12;

/** Row indexes grouped by key, in first-seen order. */
function groupIndexes<T>(rows: readonly T[], keyOf: (row: T) => string): number[][] {
  const groups = new Map<string, number[]>();
  rows.forEach((row, i) => {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) group.push(i);
    else groups.set(key, [i]);
  });
  return [...groups.values()];
}

function lagged(series: ReadonlyArray<number | null>, i: number, lag: number): number | null {
  return i >= lag ? (series[i - lag] ?? null) : null;
}

type SeriesStats = Omit<MetricWindow, 'crossSectionalMean' | 'rank'>;
type CrossSectionStats = Pick<MetricWindow, 'crossSectionalMean' | 'rank'>;

function metricWindows(ordered: readonly AggregatedRow[], metric: ActivityMetric): MetricWindow[] {
  const values = ordered.map((r) => r.values[metric]);

  // ── Per series: lag buffers, mean, std-dev, z-score ──
  const seriesStats = new Map<number, SeriesStats>();
  for (const indexes of groupIndexes(ordered, (r) => r.spatialLabel)) {
    const series = indexes.map((i) => values[i] ?? null);
    const seriesMean = mean(series);
    const seriesStdDev = sampleStdDev(series);
    indexes.forEach((rowIndex, pos) => {
      const value = series[pos] ?? null;
      const prior = lagged(series, pos, PRIOR_LAG);
      const priorYear = lagged(series, pos, PRIOR_YEAR_LAG);
      seriesStats.set(rowIndex, {
        value,
        prior,
        momPct: percentDelta(value, prior),
        priorYear,
        yoyPct: percentDelta(value, priorYear),
        seriesMean,
        seriesStdDev,
        zScore: zScore(value, seriesMean, seriesStdDev),
      });
    });
  }

  // ── Per date: cross-sectional mean and dense rank ──
  const crossSection = new Map<number, CrossSectionStats>();
  for (const indexes of groupIndexes(ordered, (r) => r.date)) {
    const cohort = indexes.map((i) => values[i] ?? null);
    const crossSectionalMean = mean(cohort);
    const ranks = denseRanks(cohort);
    indexes.forEach((rowIndex, pos) => {
      crossSection.set(rowIndex, { crossSectionalMean, rank: ranks[pos] ?? cohort.length });
    });
  }

  return ordered.map((row, i) => {
    const s = seriesStats.get(i);
    const c = crossSection.get(i);
    if (!s || !c) {
      throw new InternalError(`windowed ${metric} missing for ${row.spatialLabel} on ${row.date}`);
    }
    return { ...s, ...c };
  });
}

function at<T>(items: readonly T[], i: number): T {
  const item = items[i];
  if (item === undefined) throw new InternalError(`windowed row ${i} out of range`);
  return item;
}

/**
 * Per-series and cross-sectional statistics for every metric of every row.
 *
 * Series are partitioned by label and ordered by date. Lags count observed
 * rows, not calendar months, so a gap in a series shifts the comparison
 * point. Series mean and std-dev span the unit's whole history. Rows come
 * back ordered by label, then date.
 */
export function computeWindowedMetrics(rows: readonly AggregatedRow[]): WindowedRow[] {
  const ordered = [...rows].sort(
    (a, b) => compareKeys(a.spatialLabel, b.spatialLabel) || compareKeys(a.date, b.date),
  );
  const footTraffic = metricWindows(ordered, 'foot_traffic');
  const sales = metricWindows(ordered, 'sales');
  const salesCount = metricWindows(ordered, 'sales_count');

  return ordered.map((row, i) => ({
    spatialLabel: row.spatialLabel,
    date: row.date,
    metrics: {
      foot_traffic: at(footTraffic, i),
      sales: at(sales, i),
      sales_count: at(salesCount, i),
    },
  }));
}
