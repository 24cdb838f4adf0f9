import { hostname } from 'node:os';
import { db, sql, guardedQuery } from '@geoinsight/db';
import { generateUlid } from '@geoinsight/shared';
import { logger, errorField } from '../observability/logger';

export interface LeaseMetadata {
  trigger?: string;
  [key: string]: unknown;
}

export interface LeaseOptions {
  ttlMs: number;
  /** Renewal period while the holder works; defaults to a third of the TTL. */
  renewEveryMs?: number;
  metadata?: LeaseMetadata;
}

/** Row-backed lease on one `distributed_locks` key. */
export class Lease {
  private released = false;

  constructor(
    readonly lockKey: string,
    readonly holderId: string,
    private readonly ttlMs: number,
  ) {}

  /** Pushes `expires_at` forward; false when another holder took the key over. */
  async renew(): Promise<boolean> {
    if (this.released) return false;
    const rows = await guardedQuery('lease.renew', () =>
      db.execute(sql`
        UPDATE distributed_locks
        SET expires_at = NOW() + (${this.ttlMs} || ' milliseconds')::interval
        WHERE lock_key = ${this.lockKey} AND holder_id = ${this.holderId}
        RETURNING lock_key
      `),
    );
    return rows.length > 0;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await guardedQuery('lease.release', () =>
      db.execute(sql`
        DELETE FROM distributed_locks
        WHERE lock_key = ${this.lockKey} AND holder_id = ${this.holderId}
      `),
    );
  }
}

export function generateHolderId(): string {
  return `${hostname()}-${process.pid}-${generateUlid()}`;
}

/**
 * Takes the lease on `lockKey`, or returns null while a live holder has it.
 * An expired row is taken over in the same statement.
 */
export async function acquireLease(
  lockKey: string,
  { ttlMs, metadata = {} }: Pick<LeaseOptions, 'ttlMs' | 'metadata'>,
): Promise<Lease | null> {
  const holderId = generateHolderId();
  const rows = await guardedQuery('lease.acquire', () =>
    db.execute(sql`
      INSERT INTO distributed_locks (lock_key, holder_id, expires_at, metadata)
      VALUES (
        ${lockKey},
        ${holderId},
        NOW() + (${ttlMs} || ' milliseconds')::interval,
        ${JSON.stringify(metadata)}::jsonb
      )
      ON CONFLICT (lock_key) DO UPDATE SET
        holder_id = EXCLUDED.holder_id,
        acquired_at = NOW(),
        expires_at = EXCLUDED.expires_at,
        metadata = EXCLUDED.metadata
      WHERE distributed_locks.expires_at < NOW()
      RETURNING lock_key
    `),
  );
  return rows.length > 0 ? new Lease(lockKey, holderId, ttlMs) : null;
}

/**
 * Runs `fn` under the lease on `lockKey`, renewing it until `fn` settles.
 * Returns `{ acquired: false }` without calling `fn` when the key is held.
 */
export async function withLease<T>(
  lockKey: string,
  options: LeaseOptions,
  fn: () => Promise<T>,
): Promise<{ acquired: true; value: T } | { acquired: false }> {
  const lease = await acquireLease(lockKey, options);
  if (!lease) return { acquired: false };

  const renewEveryMs = options.renewEveryMs ?? Math.max(1, Math.floor(options.ttlMs / 3));
  const timer = setInterval(() => {
    lease
      .renew()
      .then((held) => {
        if (!held) logger.warn('Lease lost to another holder', { operation: 'lease.renew', lockKey });
      })
      .catch((err: unknown) => {
        logger.warn('Lease renewal failed', { operation: 'lease.renew', lockKey, error: errorField(err) });
      });
  }, renewEveryMs);
  timer.unref();

  try {
    return { acquired: true, value: await fn() };
  } finally {
    clearInterval(timer);
    try {
      await lease.release();
    } catch (err) {
      // the row expires on its own
      logger.warn('Failed to release lease', { operation: 'lease.release', lockKey, error: errorField(err) });
    }
  }
}
