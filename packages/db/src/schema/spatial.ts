import { pgTable, text, doublePrecision, index } from 'drizzle-orm/pg-core';

// ── Spatial Directories ──────────────────────────────────────────
// Three nested administrative levels. Raw keys arriving with facts are
// reconciled against these directories by the spatial resolver; a key
// that matches nothing keeps its raw value as its label at every level.

// ── Finest Level (neighborhood) ──────────────────────────────────

export const dimSpatial = pgTable(
  'dim_spatial',
  {
    spatialKey: text('spatial_key').primaryKey(), // raw key as delivered by a source
    spatialLabel: text('spatial_label'),          // canonical finest-level label
    spatialType: text('spatial_type'),            // e.g. "emd", "grid", "poi"
    code: text('code'),                           // numeric administrative code, when known
    lat: doublePrecision('lat'),
    lon: doublePrecision('lon'),
  },
  (t) => [index('idx_dim_spatial_label').on(t.spatialLabel)],
);

// ── Intermediate Level (district) ────────────────────────────────
// `code` is the fixed-width prefix of finest-level codes inside this unit.

export const adminIntermediate = pgTable(
  'admin_intermediate',
  {
    code: text('code').primaryKey(),
    name: text('name').notNull(),
    parentCode: text('parent_code'),
    parentName: text('parent_name'),
  },
  (t) => [index('idx_admin_intermediate_name').on(t.name)],
);

// ── Coarsest Level (province) ────────────────────────────────────

export const adminCoarsest = pgTable('admin_coarsest', {
  code: text('code').primaryKey(),
  name: text('name').notNull(),
});
