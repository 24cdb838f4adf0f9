import { UpstreamUnavailableError, errorMessage } from '@geoinsight/shared';

export interface DeadlineOptions {
  /** Upper bound for the whole call, in milliseconds. */
  timeoutMs: number;
  /** Caller cancellation. Aborting it rejects the call immediately. */
  signal?: AbortSignal;
}

/**
 * Runs `fn` with an AbortSignal that fires on timeout or when the caller's
 * signal aborts. Either way the returned promise rejects with a retryable
 * `UpstreamUnavailableError` and `fn` is told to stop through its signal.
 * Errors thrown by `fn` itself propagate unchanged.
 */
export async function withDeadline<T>(
  upstream: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    throw new UpstreamUnavailableError(upstream, 'aborted');
  }

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onCallerAbort: (() => void) | undefined;

  const cutoff = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(
        new UpstreamUnavailableError(upstream, 'timeout', `${upstream} exceeded ${timeoutMs}ms`),
      );
    }, timeoutMs);

    if (signal) {
      onCallerAbort = () => {
        controller.abort();
        reject(new UpstreamUnavailableError(upstream, 'aborted'));
      };
      signal.addEventListener('abort', onCallerAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), cutoff]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (signal && onCallerAbort) signal.removeEventListener('abort', onCallerAbort);
  }
}

/**
 * Maps any failure of an upstream call onto `UpstreamUnavailableError`,
 * keeping one that already is.
 */
export function toUpstreamError(upstream: string, err: unknown): UpstreamUnavailableError {
  if (err instanceof UpstreamUnavailableError) return err;
  return new UpstreamUnavailableError(
    upstream,
    'unreachable',
    `${upstream} unavailable: ${errorMessage(err)}`,
  );
}
