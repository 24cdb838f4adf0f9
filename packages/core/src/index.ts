// ── Observability ─────────────────────────────────────────────
export { logger, log, setLogLevel, getLogLevel, isLogLevel, errorField } from './observability';
export type { LogLevel, LogEntry } from './observability';

// ── Configuration ─────────────────────────────────────────────
export { getInsightsConfig, resetInsightsConfig, parseInsightsConfig } from './config';
export type { InsightsConfig } from './config';

// ── Deadlines ─────────────────────────────────────────────────
export { withDeadline, toUpstreamError } from './helpers';
export type { DeadlineOptions } from './helpers';

// ── Locks ─────────────────────────────────────────────────────
export {
  Lease,
  acquireLease,
  withLease,
  generateHolderId,
  InProcessRefreshLock,
  DistributedRefreshLock,
} from './locks';
export type { LeaseMetadata, LeaseOptions, RefreshLock, LockOutcome } from './locks';
