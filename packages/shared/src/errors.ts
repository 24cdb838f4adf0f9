export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }

  /** Whether the caller may retry the same request unchanged. */
  get retryable(): boolean {
    return false;
  }
}

export class InvalidArgumentError extends AppError {
  constructor(
    message: string = 'Invalid argument',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('INVALID_ARGUMENT', message, 400, details);
    this.name = 'InvalidArgumentError';
  }
}

export type UpstreamFailureReason = 'timeout' | 'aborted' | 'unreachable' | 'rejected';

export class UpstreamUnavailableError extends AppError {
  constructor(
    public upstream: string,
    public reason: UpstreamFailureReason,
    message?: string,
  ) {
    super('UPSTREAM_UNAVAILABLE', message ?? `${upstream} unavailable (${reason})`, 503);
    this.name = 'UpstreamUnavailableError';
  }

  override get retryable(): boolean {
    return true;
  }
}

export class InternalError extends AppError {
  constructor(message: string) {
    super('INTERNAL', message, 500);
    this.name = 'InternalError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
