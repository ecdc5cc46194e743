export const ERROR_CODES = [
  'CONFIG_INVALID',
  'BOOTSTRAP_FAILED',
  'INVALID_REQUEST',
  'EXTERNAL_CALL_FAILED',
  'TIMEOUT',
  'ALL_WORKERS_FAILED',
  'REVIEWER_FAILED',
  'UNEXPECTED',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Error with a stable code. `details` holds structured context for logs and callers; it is
 * never folded into the message.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

export function toErrorWithCode(error: unknown, fallbackCode: ErrorCode): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error) return new AppError(fallbackCode, error.message, error);
  return new AppError(fallbackCode, String(error));
}
