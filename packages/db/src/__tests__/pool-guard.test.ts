import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  guardedQuery,
  singleFlight,
  isPoolExhaustion,
  resetBreaker,
  isBreakerOpen,
  getPoolGuardStats,
  PoolGuardError,
} from '../pool-guard';

beforeEach(() => {
  resetBreaker();
});

describe('guardedQuery', () => {
  it('returns the wrapped result', async () => {
    await expect(guardedQuery('test.ok', async () => 42)).resolves.toBe(42);
    expect(getPoolGuardStats().active).toBe(0);
  });

  it('rejects with QUERY_TIMEOUT when the query outlives its timeout', async () => {
    const never = () => new Promise<number>(() => {});
    await expect(guardedQuery('test.slow', never, { timeoutMs: 10 })).rejects.toMatchObject({
      name: 'PoolGuardError',
      code: 'QUERY_TIMEOUT',
    });
    // a timeout counts as exhaustion and trips the breaker
    expect(isBreakerOpen()).toBe(true);
  });

  it('fails fast while the breaker is open', async () => {
    await expect(
      guardedQuery('test.slow', () => new Promise<number>(() => {}), { timeoutMs: 5 }),
    ).rejects.toBeInstanceOf(PoolGuardError);

    let called = false;
    await expect(
      guardedQuery('test.after', async () => {
        called = true;
        return 1;
      }),
    ).rejects.toMatchObject({ code: 'CIRCUIT_BREAKER_OPEN' });
    expect(called).toBe(false);
  });

  it('propagates ordinary errors without tripping the breaker', async () => {
    await expect(
      guardedQuery('test.fail', async () => {
        throw new Error('syntax error at or near "FROM"');
      }),
    ).rejects.toThrow('syntax error');
    expect(isBreakerOpen()).toBe(false);
  });
});

describe('guardedQuery cancellation', () => {
  it('drops a queued operation when its caller aborts', async () => {
    // default concurrency: DB_POOL_MAX (2) + 1
    const releases: Array<() => void> = [];
    const hold = () =>
      new Promise<void>((resolve) => {
        releases.push(resolve);
      });
    const running = [1, 2, 3].map(() => guardedQuery('test.hold', hold));

    const controller = new AbortController();
    let called = false;
    const queued = guardedQuery(
      'test.queued',
      async () => {
        called = true;
      },
      { signal: controller.signal },
    );
    expect(getPoolGuardStats().pending).toBe(1);

    controller.abort(new Error('caller went away'));
    await expect(queued).rejects.toThrow('caller went away');
    expect(getPoolGuardStats().pending).toBe(0);

    await vi.waitFor(() => expect(releases).toHaveLength(3));
    releases.forEach((release) => release());
    await Promise.all(running);
    expect(called).toBe(false);
    expect(getPoolGuardStats().active).toBe(0);
  });

  it('stops waiting for a running query when its caller aborts', async () => {
    const controller = new AbortController();
    const pending = guardedQuery('test.running', () => new Promise<number>(() => {}), {
      signal: controller.signal,
    });
    controller.abort(new Error('cancelled'));

    await expect(pending).rejects.toThrow('cancelled');
    expect(getPoolGuardStats().active).toBe(0);
    expect(isBreakerOpen()).toBe(false);
  });

  it('rejects an already aborted caller without taking a slot', async () => {
    const controller = new AbortController();
    controller.abort(new Error('too late'));
    await expect(guardedQuery('test.late', async () => 1, { signal: controller.signal })).rejects.toThrow(
      'too late',
    );
    expect(getPoolGuardStats().active).toBe(0);
  });
});

describe('isPoolExhaustion', () => {
  it('recognizes postgres too_many_connections', () => {
    expect(isPoolExhaustion(Object.assign(new Error('boom'), { code: '53300' }))).toBe(true);
  });

  it('recognizes connection slot messages', () => {
    expect(isPoolExhaustion(new Error('remaining connection slots are reserved'))).toBe(true);
  });

  it('ignores unrelated errors', () => {
    expect(isPoolExhaustion(new Error('relation "x" does not exist'))).toBe(false);
  });
});

describe('singleFlight', () => {
  it('shares one execution between concurrent callers', async () => {
    let calls = 0;
    let release: (v: string) => void = () => {};
    const fn = () => {
      calls++;
      return new Promise<string>((resolve) => {
        release = resolve;
      });
    };

    const a = singleFlight('k', fn);
    const b = singleFlight('k', fn);
    release('done');

    await expect(Promise.all([a, b])).resolves.toEqual(['done', 'done']);
    expect(calls).toBe(1);
  });

  it('runs again once the previous flight settles', async () => {
    let calls = 0;
    const fn = async () => ++calls;
    await singleFlight('again', fn);
    await singleFlight('again', fn);
    expect(calls).toBe(2);
  });
});
