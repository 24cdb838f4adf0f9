import { describe, it, expect } from 'vitest';
import { UpstreamUnavailableError } from '@geoinsight/shared';
import { withDeadline, toUpstreamError } from '../helpers/deadline';

const hang = (signal: AbortSignal) =>
  new Promise<string>((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('stopped')));
  });

describe('withDeadline', () => {
  it('resolves with the result when it finishes in time', async () => {
    await expect(withDeadline('translator', async () => 'ok', { timeoutMs: 1_000 })).resolves.toBe(
      'ok',
    );
  });

  it('rejects with a retryable timeout error and aborts the work', async () => {
    let seen: AbortSignal | undefined;
    const promise = withDeadline(
      'translator',
      (signal) => {
        seen = signal;
        return hang(signal);
      },
      { timeoutMs: 10 },
    );

    await expect(promise).rejects.toMatchObject({
      code: 'UPSTREAM_UNAVAILABLE',
      upstream: 'translator',
      reason: 'timeout',
      retryable: true,
    });
    expect(seen?.aborted).toBe(true);
  });

  it('rejects as aborted when the caller cancels', async () => {
    const caller = new AbortController();
    const promise = withDeadline('refresh', hang, { timeoutMs: 5_000, signal: caller.signal });
    caller.abort();
    await expect(promise).rejects.toMatchObject({ reason: 'aborted' });
  });

  it('rejects without calling fn when already cancelled', async () => {
    const caller = new AbortController();
    caller.abort();
    let called = false;
    await expect(
      withDeadline(
        'refresh',
        async () => {
          called = true;
        },
        { timeoutMs: 100, signal: caller.signal },
      ),
    ).rejects.toBeInstanceOf(UpstreamUnavailableError);
    expect(called).toBe(false);
  });

  it('propagates errors thrown by fn unchanged', async () => {
    const failure = new Error('bad request');
    await expect(
      withDeadline(
        'translator',
        async () => {
          throw failure;
        },
        { timeoutMs: 100 },
      ),
    ).rejects.toBe(failure);
  });
});

describe('toUpstreamError', () => {
  it('wraps arbitrary failures as unreachable', () => {
    const err = toUpstreamError('embeddings', new Error('ECONNRESET'));
    expect(err.reason).toBe('unreachable');
    expect(err.message).toBe('embeddings unavailable: ECONNRESET');
  });

  it('keeps upstream errors as they are', () => {
    const original = new UpstreamUnavailableError('embeddings', 'timeout');
    expect(toUpstreamError('other', original)).toBe(original);
  });
});
