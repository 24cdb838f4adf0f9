export { Lease, acquireLease, withLease, generateHolderId } from './distributed-lock';
export type { LeaseMetadata, LeaseOptions } from './distributed-lock';
export { InProcessRefreshLock, DistributedRefreshLock } from './refresh-lock';
export type { RefreshLock, LockOutcome } from './refresh-lock';
