export const MODULE_KEY = 'insights' as const;
export const MODULE_NAME = 'Insight Computation';
export const MODULE_VERSION = '0.1.0';

/** SQL tables read or written by this module */
export const MODULE_TABLES = [
  'dim_spatial',
  'admin_intermediate',
  'admin_coarsest',
  'gold_activity',
  'gold_demographics',
  'insight_advanced_generations',
  'insight_advanced',
  'insight_refresh_state',
] as const;

// ── Types ─────────────────────────────────────────────────────
export type * from './types';

// ── Spatial Resolver ──────────────────────────────────────────
export * from './spatial';

// ── Fact Store ────────────────────────────────────────────────
export * from './facts';

// ── Windowed Metrics ──────────────────────────────────────────
export * from './metrics';

// ── Demographic Dominance ─────────────────────────────────────
export * from './demographics';

// ── Insight Candidates ────────────────────────────────────────
export * from './candidates';

// ── Advanced Insights ─────────────────────────────────────────
export * from './advanced';

// ── Query Operations ──────────────────────────────────────────
export * from './queries';
