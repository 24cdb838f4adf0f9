/**
 * Pool guard: bounds concurrent DB work, times out stuck queries and
 * trips a circuit breaker when the pool looks exhausted.
 *
 * Fact loads are a few wide scans fired with Promise.all, so the slot
 * count is the pool size plus one queued operation.
 *
 * @module
 */

const POOL_MAX = parseInt(process.env.DB_POOL_MAX || '2', 10);

const settings = {
  concurrency: parseInt(process.env.DB_CONCURRENCY || String(POOL_MAX + 1), 10),
  queryTimeoutMs: parseInt(process.env.DB_QUERY_TIMEOUT || '15000', 10),
  queueTimeoutMs: parseInt(process.env.DB_QUEUE_TIMEOUT || '5000', 10),
  breakerCooldownMs: 10_000,
  queueWarnDepth: 5,
  slowQueryMs: 5_000,
} as const;

export type GuardErrorCode = 'QUERY_TIMEOUT' | 'QUEUE_TIMEOUT' | 'CIRCUIT_BREAKER_OPEN';

export class PoolGuardError extends Error {
  constructor(
    public code: GuardErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'PoolGuardError';
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('aborted');
}

// ── Slots ────────────────────────────────────────────────────────────────────

interface Waiter {
  grant: () => void;
  fail: (err: unknown) => void;
}

class SlotQueue {
  private waiters: Waiter[] = [];
  private inUse = 0;

  constructor(private readonly size: number) {}

  /** Resolves once a slot is held; the caller must `release()` it. */
  acquire(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));
    if (this.inUse < this.size) {
      this.inUse++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const leave = () => {
        const at = this.waiters.indexOf(waiter);
        if (at >= 0) this.waiters.splice(at, 1);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const waiter: Waiter = {
        grant: () => {
          leave();
          resolve();
        },
        fail: (err) => {
          leave();
          reject(err);
        },
      };
      const onAbort = () => waiter.fail(signal ? abortReason(signal) : new Error('aborted'));
      const timer = setTimeout(() => {
        waiter.fail(
          new PoolGuardError(
            'QUEUE_TIMEOUT',
            `[pool-guard] Queue timeout: waited ${timeoutMs}ms for DB slot ` +
              `(${this.inUse} active, ${this.waiters.length - 1} queued)`,
          ),
        );
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters[0];
    if (next) {
      // the slot passes straight to the next waiter
      next.grant();
    } else {
      this.inUse--;
    }
  }

  get pending(): number {
    return this.waiters.length;
  }

  get active(): number {
    return this.inUse;
  }
}

const slots = new SlotQueue(settings.concurrency);

// ── Circuit breaker ──────────────────────────────────────────────────────────

let breakerOpenUntil = 0;
let breakerTripCount = 0;

export function isBreakerOpen(): boolean {
  return Date.now() < breakerOpenUntil;
}

function tripBreaker(): void {
  breakerOpenUntil = Date.now() + settings.breakerCooldownMs;
  breakerTripCount++;
  console.error(
    `[pool-guard] Circuit breaker OPEN (trip #${breakerTripCount}). ` +
      `DB operations will fail fast for ${settings.breakerCooldownMs / 1000}s`,
  );
}

export function resetBreaker(): void {
  breakerOpenUntil = 0;
}

export function isPoolExhaustion(err: unknown): boolean {
  if (err instanceof PoolGuardError) {
    return err.code === 'QUERY_TIMEOUT' || err.code === 'QUEUE_TIMEOUT';
  }
  const msg = (err instanceof Error ? err.message : String(err)).toLowerCase();
  const code =
    err !== null && typeof err === 'object' && 'code' in err ? String(err.code) : undefined;
  return (
    msg.includes('too many clients') ||
    msg.includes('connection slots') ||
    (msg.includes('timeout') && msg.includes('connect')) ||
    (msg.includes('pool') && msg.includes('exhaust')) ||
    code === '53300' // too_many_connections
  );
}

// ── Guarded execution ────────────────────────────────────────────────────────

export interface GuardOptions {
  timeoutMs?: number;
  /**
   * Caller cancellation. An aborted caller leaves the queue or stops
   * waiting for its query; postgres.js still finishes the statement.
   */
  signal?: AbortSignal;
}

/**
 * Runs one DB operation under the pool guard. Fails fast while the
 * breaker is open, waits for a slot, and rejects with QUERY_TIMEOUT when
 * the operation outlives `timeoutMs`. Exhaustion-looking failures trip
 * the breaker.
 */
export async function guardedQuery<T>(
  opName: string,
  fn: () => Promise<T>,
  { timeoutMs = settings.queryTimeoutMs, signal }: GuardOptions = {},
): Promise<T> {
  if (isBreakerOpen()) {
    throw new PoolGuardError(
      'CIRCUIT_BREAKER_OPEN',
      `[pool-guard] Circuit breaker open, DB temporarily unavailable (op: ${opName})`,
    );
  }
  if (slots.pending >= settings.queueWarnDepth) {
    console.warn(`[pool-guard] DB queue depth: ${slots.pending} waiting, ${slots.active} active (op: ${opName})`);
  }

  await slots.acquire(settings.queueTimeoutMs, signal);
  const start = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  try {
    const stop = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new PoolGuardError('QUERY_TIMEOUT', `[pool-guard] Query timeout: ${opName} exceeded ${timeoutMs}ms`));
      }, timeoutMs);
      if (signal?.aborted) {
        reject(abortReason(signal));
      } else if (signal) {
        onAbort = () => reject(abortReason(signal));
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
    const result = await Promise.race([fn(), stop]);

    const duration = Date.now() - start;
    if (duration > settings.slowQueryMs) {
      console.warn(`[pool-guard] Slow DB op: ${opName} took ${duration}ms`);
    }
    return result;
  } catch (err) {
    if (isPoolExhaustion(err)) {
      console.error(`[pool-guard] Pool exhaustion detected in ${opName} after ${Date.now() - start}ms`);
      tripBreaker();
    }
    throw err;
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
    slots.release();
  }
}

// ── Single flight ────────────────────────────────────────────────────────────
// Concurrent callers with the same key share the first caller's promise.

const inFlight = new Map<string, Promise<unknown>>();

export function singleFlight<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const existing = inFlight.get(key);
  if (existing) return existing as Promise<T>;
  const flight = fn().finally(() => inFlight.delete(key));
  inFlight.set(key, flight);
  return flight;
}

export function getPoolGuardStats() {
  return {
    active: slots.active,
    pending: slots.pending,
    breakerOpen: isBreakerOpen(),
    breakerTripCount,
  };
}
