import { AppError } from '../errors/app-error';

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

/**
 * Race a task against a deadline and reject with `TIMEOUT` when it passes.
 *
 * A task given as a function receives a signal that aborts at the deadline.
 */
export async function withTimeout<T>(
  task: Promise<T> | ((signal: AbortSignal) => Promise<T>),
  timeoutMs: number,
  operation: string,
): Promise<T> {
  assertPositiveInteger(timeoutMs, 'timeoutMs');

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new AppError('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, undefined, { timeoutMs });
      // Reject before aborting so the race settles on the timeout, not on the abort it causes.
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    const pending = typeof task === 'function' ? task(controller.signal) : task;
    return await Promise.race([pending, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  operationName: string;
  /** Return false to stop retrying and surface the error immediately. Defaults to always retry. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run `operation` up to `retries + 1` times with exponential backoff between attempts.
 *
 * Failures are surfaced as `EXTERNAL_CALL_FAILED` with the last error as `cause` and the
 * number of attempts made in `details.attempts`.
 */
export async function retry<T>(operation: () => Promise<T>, opts: RetryOptions): Promise<T> {
  if (!Number.isInteger(opts.retries) || opts.retries < 0) {
    throw new RangeError('retries must be a non-negative integer');
  }
  assertPositiveInteger(opts.baseDelayMs, 'baseDelayMs');

  let lastError: unknown;
  let attempts = 0;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    attempts = attempt + 1;
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt === opts.retries) break;
      if (opts.shouldRetry && !opts.shouldRetry(error)) break;
      opts.onRetry?.(error, attempts);
      await new Promise((resolve) => setTimeout(resolve, opts.baseDelayMs * 2 ** attempt));
    }
  }

  throw new AppError(
    'EXTERNAL_CALL_FAILED',
    `${opts.operationName} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}`,
    lastError,
    { attempts },
  );
}
