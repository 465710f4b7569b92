/**
 * @fileoverview Standardized error handling utilities.
 *
 * - AppError: base class for application-specific errors
 * - errorMessage: normalises anything thrown into a message string
 */

export type ErrorCode =
  | 'INVALID_POLLING_INTERVAL'
  | 'MAIL_CONNECT_FAILED'
  | 'CONFIG_MISSING';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Log fields for a caught value; AppErrors add their code, recoverability and context. */
export function errorDetails(error: unknown): Record<string, unknown> {
  if (!isAppError(error)) {
    return { error: errorMessage(error) };
  }
  return {
    error: error.message,
    code: error.code,
    recoverable: error.recoverable,
    ...(error.context ? { errorContext: error.context } : {}),
  };
}
