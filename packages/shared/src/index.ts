// ── Errors ────────────────────────────────────────────────────
export {
  AppError,
  InvalidArgumentError,
  UpstreamUnavailableError,
  InternalError,
  isAppError,
  errorMessage,
} from './errors';
export type { UpstreamFailureReason } from './errors';

// ── Validation ────────────────────────────────────────────────
export {
  assertValidated,
  spatialLevelSchema,
  domainSchema,
  regionSchema,
  periodSchema,
} from './validation';

// ── Constants ─────────────────────────────────────────────────
export {
  SPATIAL_LEVELS,
  DEFAULT_SPATIAL_LEVEL,
  LEVEL_ALIASES,
  levelForName,
  MONTHLY_GRANULARITY,
} from './constants/spatial-levels';
export type { SpatialLevel } from './constants/spatial-levels';
export {
  ACTIVITY_METRICS,
  RANKABLE_METRICS,
  DOMAINS,
  DOMAIN_METRIC,
  METRIC_ALIASES,
  metricForAlias,
} from './constants/domains';
export type { ActivityMetric, RankableMetric, Domain } from './constants/domains';
export { LOCK_KEYS } from './constants/lock-keys';
export type { LockKey } from './constants/lock-keys';

// ── Utils ─────────────────────────────────────────────────────
export * from './utils';

// ── Types ─────────────────────────────────────────────────────
export type * from './types';
