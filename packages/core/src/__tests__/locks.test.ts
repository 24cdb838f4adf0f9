import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// ── Hoisted mocks ─────────────────────────────────────────────────────

const { mockExecute } = vi.hoisted(() => ({
  mockExecute: vi.fn(),
}));

vi.mock('@geoinsight/db', () => ({
  db: { execute: mockExecute },
  sql: Object.assign(vi.fn((...args: unknown[]) => args), {
    raw: vi.fn((str: string) => str),
  }),
  guardedQuery: vi.fn().mockImplementation((_op: string, fn: () => Promise<unknown>) => fn()),
}));

import { acquireLease, withLease } from '../locks/distributed-lock';
import { InProcessRefreshLock, DistributedRefreshLock } from '../locks/refresh-lock';
import { logger } from '../observability/logger';

beforeEach(() => {
  mockExecute.mockReset();
});

afterEach(() => {
  vi.useRealTimers();
});

// ── Leases ───────────────────────────────────────────────────────────

describe('acquireLease', () => {
  it('returns a lease when the upsert returns a row', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'k' }]);
    const lease = await acquireLease('k', { ttlMs: 1_000 });
    expect(lease?.lockKey).toBe('k');
    expect(lease?.holderId).toContain(`-${process.pid}-`);
  });

  it('returns null on an empty RETURNING', async () => {
    mockExecute.mockResolvedValueOnce([]);
    await expect(acquireLease('k', { ttlMs: 1_000 })).resolves.toBeNull();
  });

  it('renews only while held and releases once', async () => {
    mockExecute
      .mockResolvedValueOnce([{ lock_key: 'k' }])
      .mockResolvedValueOnce([{ lock_key: 'k' }])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([]);
    const lease = await acquireLease('k', { ttlMs: 1_000 });
    if (!lease) throw new Error('expected a lease');

    await expect(lease.renew()).resolves.toBe(true);
    await expect(lease.renew()).resolves.toBe(false);
    await lease.release();
    await lease.release();
    await expect(lease.renew()).resolves.toBe(false);
    // acquire, two renewals, one release
    expect(mockExecute).toHaveBeenCalledTimes(4);
  });
});

describe('withLease', () => {
  it('reports contention without running fn', async () => {
    mockExecute.mockResolvedValueOnce([]);
    const fn = vi.fn().mockResolvedValue('ran');
    await expect(withLease('k', { ttlMs: 1_000 }, fn)).resolves.toEqual({ acquired: false });
    expect(fn).not.toHaveBeenCalled();
    expect(mockExecute).toHaveBeenCalledTimes(1);
  });

  it('runs fn and releases the lease', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'k' }]).mockResolvedValueOnce([]);
    await expect(withLease('k', { ttlMs: 1_000 }, async () => 'ran')).resolves.toEqual({
      acquired: true,
      value: 'ran',
    });
    // acquire + release
    expect(mockExecute).toHaveBeenCalledTimes(2);
  });

  it('releases the lease when fn throws', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'k' }]).mockResolvedValueOnce([]);
    await expect(
      withLease('k', { ttlMs: 1_000 }, async () => {
        throw new Error('refresh failed');
      }),
    ).rejects.toThrow('refresh failed');
    expect(mockExecute).toHaveBeenCalledTimes(2);
  });

  it('keeps the result when the release fails', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    mockExecute
      .mockResolvedValueOnce([{ lock_key: 'k' }])
      .mockRejectedValueOnce(new Error('connection lost'));
    await expect(withLease('k', { ttlMs: 1_000 }, async () => 42)).resolves.toEqual({
      acquired: true,
      value: 42,
    });
    expect(warn).toHaveBeenCalledWith('Failed to release lease', expect.objectContaining({ lockKey: 'k' }));
    warn.mockRestore();
  });

  it('renews the lease while fn runs', async () => {
    vi.useFakeTimers();
    mockExecute.mockResolvedValue([{ lock_key: 'k' }]);
    let finish: () => void = () => {};
    const running = withLease('k', { ttlMs: 3_000 }, () => new Promise<void>((resolve) => {
      finish = resolve;
    }));

    // acquire resolves on a microtask; then two renewal periods pass
    await vi.advanceTimersByTimeAsync(2_000);
    expect(mockExecute).toHaveBeenCalledTimes(3);

    finish();
    await running;
    // the release; no renewals after fn settles
    await vi.advanceTimersByTimeAsync(5_000);
    expect(mockExecute).toHaveBeenCalledTimes(4);
  });
});

// ── Refresh locks ────────────────────────────────────────────────────

describe('InProcessRefreshLock', () => {
  it('lets one writer in and turns a concurrent one away', async () => {
    const lock = new InProcessRefreshLock();
    let release: () => void = () => {};
    const first = lock.run('refresh', () => new Promise<string>((resolve) => {
      release = () => resolve('first');
    }));

    await expect(lock.run('refresh', async () => 'second')).resolves.toEqual({ acquired: false });

    release();
    await expect(first).resolves.toEqual({ acquired: true, value: 'first' });
    expect(lock.isHeld('refresh')).toBe(false);
  });

  it('frees the key when the writer throws', async () => {
    const lock = new InProcessRefreshLock();
    await expect(
      lock.run('refresh', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lock.run('refresh', async () => 1)).resolves.toEqual({ acquired: true, value: 1 });
  });
});

describe('DistributedRefreshLock', () => {
  it('reports a contended key as not acquired', async () => {
    mockExecute.mockResolvedValueOnce([]);
    const lock = new DistributedRefreshLock(1_000);
    await expect(lock.run('refresh', async () => 'x')).resolves.toEqual({ acquired: false });
  });

  it('distinguishes a null result from contention', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'refresh' }]).mockResolvedValueOnce([]);
    const lock = new DistributedRefreshLock(1_000);
    await expect(lock.run('refresh', async () => null)).resolves.toEqual({
      acquired: true,
      value: null,
    });
  });
});
