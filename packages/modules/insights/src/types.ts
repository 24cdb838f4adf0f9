import type { ActivityMetric, SpatialLevel } from '@geoinsight/shared';

// ── Facts ────────────────────────────────────────────────────────

export interface ActivityFact {
  spatialKey: string;
  /** `YYYY-MM-DD` */
  date: string;
  granularity: string;
  source: string;
  footTraffic: number | null;
  sales: number | null;
  salesCount: number | null;
}

export interface DemographicFact {
  spatialKey: string;
  date: string;
  granularity: string;
  source: string;
  sex: string;
  ageGroup: string;
  value: number | null;
}

export interface FactSnapshot {
  activity: ActivityFact[];
  demographics: DemographicFact[];
}

// ── Spatial directories ──────────────────────────────────────────

export interface FinestDirectoryEntry {
  spatialKey: string;
  spatialLabel: string | null;
  spatialType: string | null;
  code: string | null;
}

export interface IntermediateDirectoryEntry {
  code: string;
  name: string;
  parentCode: string | null;
  parentName: string | null;
}

export interface CoarsestDirectoryEntry {
  code: string;
  name: string;
}

export interface SpatialDirectorySnapshot {
  finest: FinestDirectoryEntry[];
  intermediate: IntermediateDirectoryEntry[];
  coarsest: CoarsestDirectoryEntry[];
}

/** Labels a raw key resolved to; `null` where no strategy matched. */
export interface ResolvedSpatialUnit {
  rawKey: string;
  code: string | null;
  finest: string | null;
  intermediate: string | null;
  coarsest: string | null;
}

// ── Windowed metrics ─────────────────────────────────────────────

export type MetricValues = Record<ActivityMetric, number | null>;

export interface MetricWindow {
  value: number | null;
  /** Value one observed period earlier. */
  prior: number | null;
  momPct: number | null;
  /** Value twelve observed periods earlier. */
  priorYear: number | null;
  yoyPct: number | null;
  seriesMean: number | null;
  seriesStdDev: number | null;
  zScore: number | null;
  /** Mean across every unit of the level on the same date. */
  crossSectionalMean: number | null;
  /** Dense descending rank among units of the level on the same date. */
  rank: number;
}

export type MetricWindows = Record<ActivityMetric, MetricWindow>;

export interface InsightCandidate {
  level: SpatialLevel;
  spatialLabel: string;
  date: string;
  metrics: MetricWindows;
  /** `${sex}_${ageGroup}`; finest level only. */
  dominantGroup: string | null;
  dominantShare: number | null;
}

export interface CandidateCollection {
  candidates: InsightCandidate[];
  /** Distinct fact sources, sorted. */
  sources: string[];
  /** Data-quality warnings such as overlapping sources. */
  warnings: string[];
}

// ── Advanced insights ────────────────────────────────────────────

export interface AdvancedInsight {
  level: SpatialLevel;
  spatialLabel: string;
  pairCount: number;
  corrSalesFootTraffic: number | null;
  salesImpactSlope: number | null;
  salesImpactScore: number | null;
  footTrafficImpactScore: number | null;
}

export interface AdvancedInsightGeneration {
  id: string;
  /** ISO timestamp */
  refreshedAt: string;
  candidateCount: number;
  rowCount: number;
  durationMs: number;
}
