import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

// ── Advanced Insight Generations ─────────────────────────────────
// Each refresh writes a complete generation, then moves the single
// `insight_refresh_state` pointer in the same transaction. Readers join
// through the pointer and never observe a half-written generation.

export const insightAdvancedGenerations = pgTable('insight_advanced_generations', {
  id: text('id').primaryKey(), // ULID
  refreshedAt: timestamp('refreshed_at', { withTimezone: true }).notNull(),
  candidateCount: integer('candidate_count').notNull(),
  rowCount: integer('row_count').notNull(),
  durationMs: integer('duration_ms').notNull(),
});

export const insightAdvanced = pgTable(
  'insight_advanced',
  {
    generationId: text('generation_id').notNull(),
    level: text('level').notNull(), // finest | intermediate | coarsest
    spatialLabel: text('spatial_label').notNull(),
    pairCount: integer('pair_count').notNull(),
    corrSalesFootTraffic: doublePrecision('corr_sales_foot_traffic'),
    salesImpactSlope: doublePrecision('sales_impact_slope'),
    salesImpactScore: doublePrecision('sales_impact_score'),
    footTrafficImpactScore: doublePrecision('foot_traffic_impact_score'),
  },
  (t) => [
    primaryKey({ columns: [t.generationId, t.level, t.spatialLabel] }),
    index('idx_insight_advanced_label').on(t.level, t.spatialLabel),
  ],
);

// Single row, id = 'current'.
export const insightRefreshState = pgTable('insight_refresh_state', {
  id: text('id').primaryKey().default('current'),
  generationId: text('generation_id').notNull(),
  refreshedAt: timestamp('refreshed_at', { withTimezone: true }).notNull(),
});
