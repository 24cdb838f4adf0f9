import { pgTable, text, date, doublePrecision, primaryKey, index } from 'drizzle-orm/pg-core';

// ── Normalized Facts ─────────────────────────────────────────────
// Written by the ingestion pipeline, read-only for the insight engine.
// Rows for the same unit/date from different sources are SUMMED on read,
// so source identifiers must stay disjoint across overlapping feeds.

export const goldActivity = pgTable(
  'gold_activity',
  {
    spatialKey: text('spatial_key').notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    granularity: text('granularity').notNull(), // "month"
    source: text('source').notNull(),
    footTraffic: doublePrecision('foot_traffic'),
    sales: doublePrecision('sales'),
    salesCount: doublePrecision('sales_count'),
  },
  (t) => [
    primaryKey({ columns: [t.spatialKey, t.date, t.granularity, t.source] }),
    index('idx_gold_activity_date').on(t.date),
    index('idx_gold_activity_spatial').on(t.spatialKey),
  ],
);

export const goldDemographics = pgTable(
  'gold_demographics',
  {
    spatialKey: text('spatial_key').notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    granularity: text('granularity').notNull(),
    source: text('source').notNull(),
    sex: text('sex').notNull(),
    ageGroup: text('age_group').notNull(),
    value: doublePrecision('value'),
  },
  (t) => [
    primaryKey({
      columns: [t.spatialKey, t.date, t.granularity, t.source, t.sex, t.ageGroup],
    }),
    index('idx_gold_demographics_date').on(t.date),
    index('idx_gold_demographics_group').on(t.sex, t.ageGroup),
  ],
);
