import { SPATIAL_LEVELS, MONTHLY_GRANULARITY, InternalError } from '@geoinsight/shared';
import type { SpatialLevel } from '@geoinsight/shared';
import { compareKeys } from '../spatial/directory';
import type { SpatialResolver } from '../spatial/resolver';
import { sumNullable } from '../metrics/stats';
import { computeWindowedMetrics } from '../metrics/windowed-metrics';
import type { AggregatedRow } from '../metrics/windowed-metrics';
import { computeDominance, dominanceKey } from '../demographics/dominance';
import { assertUniqueFactKeys, findSourceOverlaps, reportSourceOverlaps } from './source-overlap';
import type { CandidateCollection, FactSnapshot, InsightCandidate } from '../types';

const LEVEL_ORDER: Record<SpatialLevel, number> = { finest: 0, intermediate: 1, coarsest: 2 };

export function compareCandidates(a: InsightCandidate, b: InsightCandidate): number {
  return (
    LEVEL_ORDER[a.level] - LEVEL_ORDER[b.level] ||
    compareKeys(a.spatialLabel, b.spatialLabel) ||
    compareKeys(a.date, b.date)
  );
}

/** Sums a level's activity facts per (label, date). */
function aggregateLevel(
  snapshot: FactSnapshot,
  resolver: SpatialResolver,
  level: SpatialLevel,
): AggregatedRow[] {
  const cells = new Map<
    string,
    { spatialLabel: string; date: string; footTraffic: Array<number | null>; sales: Array<number | null>; salesCount: Array<number | null> }
  >();
  for (const fact of snapshot.activity) {
    const spatialLabel = resolver.labelAt(fact.spatialKey, level);
    const key = `${spatialLabel}\u0000${fact.date}`;
    const cell = cells.get(key) ?? {
      spatialLabel,
      date: fact.date,
      footTraffic: [],
      sales: [],
      salesCount: [],
    };
    cell.footTraffic.push(fact.footTraffic);
    cell.sales.push(fact.sales);
    cell.salesCount.push(fact.salesCount);
    cells.set(key, cell);
  }

  return [...cells.values()].map((cell) => ({
    spatialLabel: cell.spatialLabel,
    date: cell.date,
    values: {
      foot_traffic: sumNullable(cell.footTraffic),
      sales: sumNullable(cell.sales),
      sales_count: sumNullable(cell.salesCount),
    },
  }));
}

/**
 * Builds the unified candidate collection: every level aggregates the facts
 * at its own granularity and computes its own windowed metrics, and the
 * three results are concatenated. Demographic dominance is attached at the
 * finest level only.
 *
 * Pure over its inputs. Output is sorted by level, label and date, so the
 * same snapshot always serializes to the same bytes.
 */
export function buildInsightCandidates(
  snapshot: FactSnapshot,
  resolver: SpatialResolver,
  granularity: string = MONTHLY_GRANULARITY,
): CandidateCollection {
  const facts: FactSnapshot = {
    activity: snapshot.activity.filter((f) => f.granularity === granularity),
    demographics: snapshot.demographics.filter((f) => f.granularity === granularity),
  };
  assertUniqueFactKeys(facts.activity, facts.demographics);
  const warnings = reportSourceOverlaps(findSourceOverlaps(facts.activity));

  const dominance = computeDominance(
    facts.demographics.map((f) => ({
      spatialLabel: resolver.labelAt(f.spatialKey, 'finest'),
      date: f.date,
      sex: f.sex,
      ageGroup: f.ageGroup,
      value: f.value,
    })),
  );

  const candidates: InsightCandidate[] = [];
  for (const level of SPATIAL_LEVELS) {
    for (const row of computeWindowedMetrics(aggregateLevel(facts, resolver, level))) {
      const dominant = level === 'finest' ? dominance.get(dominanceKey(row.spatialLabel, row.date)) : undefined;
      candidates.push({
        level,
        spatialLabel: row.spatialLabel,
        date: row.date,
        metrics: row.metrics,
        dominantGroup: dominant?.group ?? null,
        dominantShare: dominant?.share ?? null,
      });
    }
  }
  candidates.sort(compareCandidates);
  assertOneRowPerKey(candidates);

  const sources = [
    ...new Set([...facts.activity, ...facts.demographics].map((f) => f.source)),
  ].sort(compareKeys);
  return { candidates, sources, warnings };
}

/** Exactly one candidate per (level, label, date); input must be sorted. */
function assertOneRowPerKey(candidates: readonly InsightCandidate[]): void {
  for (let i = 1; i < candidates.length; i++) {
    const prev = candidates[i - 1];
    const cur = candidates[i];
    if (prev && cur && compareCandidates(prev, cur) === 0) {
      throw new InternalError(
        `duplicate insight candidate for ${cur.level} ${cur.spatialLabel} on ${cur.date}`,
      );
    }
  }
}
