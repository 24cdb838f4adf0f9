import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import {
  dimSpatial,
  adminIntermediate,
  adminCoarsest,
  goldActivity,
  goldDemographics,
  insightAdvanced,
  insightAdvancedGenerations,
  insightRefreshState,
  queryMappingCache,
  distributedLocks,
  EMBEDDING_DIMENSIONS,
} from '../schema';

function columnNames(table: Parameters<typeof getTableConfig>[0]): string[] {
  return getTableConfig(table).columns.map((c) => c.name);
}

// ── Table names ──────────────────────────────────────────────────
describe('table names', () => {
  const expected: Array<[Parameters<typeof getTableConfig>[0], string]> = [
    [dimSpatial, 'dim_spatial'],
    [adminIntermediate, 'admin_intermediate'],
    [adminCoarsest, 'admin_coarsest'],
    [goldActivity, 'gold_activity'],
    [goldDemographics, 'gold_demographics'],
    [insightAdvancedGenerations, 'insight_advanced_generations'],
    [insightAdvanced, 'insight_advanced'],
    [insightRefreshState, 'insight_refresh_state'],
    [queryMappingCache, 'query_mapping_cache'],
    [distributedLocks, 'distributed_locks'],
  ];

  for (const [table, name] of expected) {
    it(`maps to "${name}"`, () => {
      expect(getTableConfig(table).name).toBe(name);
    });
  }
});

// ── Fact keys ────────────────────────────────────────────────────
describe('fact primary keys', () => {
  it('gold_activity is keyed by unit, date, granularity and source', () => {
    const [pk] = getTableConfig(goldActivity).primaryKeys;
    expect(pk?.columns.map((c) => c.name)).toEqual([
      'spatial_key',
      'date',
      'granularity',
      'source',
    ]);
  });

  it('gold_demographics adds sex and age group to the key', () => {
    const [pk] = getTableConfig(goldDemographics).primaryKeys;
    expect(pk?.columns.map((c) => c.name)).toEqual([
      'spatial_key',
      'date',
      'granularity',
      'source',
      'sex',
      'age_group',
    ]);
  });

  it('activity measures are nullable', () => {
    const nullable = getTableConfig(goldActivity)
      .columns.filter((c) => !c.notNull)
      .map((c) => c.name);
    expect(nullable).toEqual(['foot_traffic', 'sales', 'sales_count']);
  });
});

// ── Advanced insights ────────────────────────────────────────────
describe('insight_advanced', () => {
  it('is keyed by generation, level and label', () => {
    const [pk] = getTableConfig(insightAdvanced).primaryKeys;
    expect(pk?.columns.map((c) => c.name)).toEqual(['generation_id', 'level', 'spatial_label']);
  });

  it('keeps statistic columns nullable', () => {
    const cols = getTableConfig(insightAdvanced).columns;
    const corr = cols.find((c) => c.name === 'corr_sales_foot_traffic');
    expect(corr?.notNull).toBe(false);
  });
});

// ── Query mapping cache ──────────────────────────────────────────
describe('query_mapping_cache', () => {
  it('is keyed by request_hash', () => {
    const pkCol = getTableConfig(queryMappingCache).columns.find((c) => c.primary);
    expect(pkCol?.name).toBe('request_hash');
  });

  it('stores parser identity, schema version and alias link', () => {
    expect(columnNames(queryMappingCache)).toEqual([
      'request_hash',
      'request_text',
      'parser_id',
      'schema_version',
      'query_json',
      'embedding',
      'alias_of',
      'created_at',
      'updated_at',
    ]);
  });

  it('declares an embedding vector of the configured width', () => {
    const embedding = getTableConfig(queryMappingCache).columns.find((c) => c.name === 'embedding');
    expect(embedding?.getSQLType()).toBe(`vector(${EMBEDDING_DIMENSIONS})`);
    expect(embedding?.notNull).toBe(false);
  });

  it('indexes the embedding with hnsw', () => {
    const names = getTableConfig(queryMappingCache).indexes.map((i) => i.config.name);
    expect(names).toContain('idx_query_mapping_cache_embedding');
  });
});
