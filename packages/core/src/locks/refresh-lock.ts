import { withLease } from './distributed-lock';
import type { LeaseMetadata } from './distributed-lock';

/**
 * Single-writer guard for jobs that mutate shared derived state.
 * `run` returns `{ acquired: false }` without calling `fn` when another
 * writer holds the key.
 */
export interface RefreshLock {
  run<T>(key: string, fn: () => Promise<T>): Promise<LockOutcome<T>>;
}

export type LockOutcome<T> = { acquired: true; value: T } | { acquired: false };

/** Guards writers within one process. */
export class InProcessRefreshLock implements RefreshLock {
  private held = new Set<string>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<LockOutcome<T>> {
    if (this.held.has(key)) return { acquired: false };
    this.held.add(key);
    try {
      return { acquired: true, value: await fn() };
    } finally {
      this.held.delete(key);
    }
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }
}

/**
 * Guards writers across processes through the `distributed_locks` table.
 * The lease is renewed while the writer runs, so `ttlMs` only bounds how
 * long a crashed holder blocks the next one.
 */
export class DistributedRefreshLock implements RefreshLock {
  constructor(
    private readonly ttlMs: number,
    private readonly metadata: LeaseMetadata = {},
  ) {}

  run<T>(key: string, fn: () => Promise<T>): Promise<LockOutcome<T>> {
    return withLease(key, { ttlMs: this.ttlMs, metadata: this.metadata }, fn);
  }
}
