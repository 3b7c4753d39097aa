/**
 * Error handling utilities for consistent error processing.
 */

/**
 * Application error types for categorizing errors.
 */
export enum ErrorType {
  IO = 'IO_ERROR',
  NoPath = 'NO_PATH',
  AIUnavailable = 'AI_UNAVAILABLE',
  Network = 'NETWORK_ERROR',
  Unauthorized = 'UNAUTHORIZED',
  RateLimited = 'RATE_LIMITED',
  Conflict = 'CONFLICT',
  ServerError = 'SERVER_ERROR',
  Unknown = 'UNKNOWN_ERROR',
}

/**
 * Application error with type and user-friendly message.
 * `code` carries the underlying system code (e.g. ENOENT) when there is one.
 */
export class AppError extends Error {
  constructor(
    public type: ErrorType,
    public message: string,
    public originalError?: Error,
    public code: string | null = null
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Extract user-friendly error message from various error types.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.message
  }

  if (error instanceof Error) {
    return error.message
  }

  if (typeof error === 'string') {
    return error
  }

  return 'An unexpected error occurred'
}

/**
 * Convert HTTP response to AppError based on status code.
 */
export function httpErrorToAppError(status: number, message?: string): AppError {
  switch (status) {
    case 401:
    case 403:
      return new AppError(
        ErrorType.Unauthorized,
        message || 'The AI provider rejected the API key.'
      )
    case 408:
      return new AppError(ErrorType.Network, message || 'The AI provider timed out.')
    case 409:
      return new AppError(ErrorType.Conflict, message || 'Request conflicts with current state.')
    case 429:
      return new AppError(
        ErrorType.RateLimited,
        message || 'Rate limit reached. Please wait before trying again.'
      )
    case 500:
    case 502:
    case 503:
    case 504:
      return new AppError(
        ErrorType.ServerError,
        message || 'AI provider error. Please try again later.'
      )
    default:
      return new AppError(ErrorType.Unknown, message || 'An unexpected error occurred.')
  }
}

/**
 * Narrow an AbortError emitted by fetch/AbortController.
 */
export function isAbortError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * Narrow the TimeoutError raised by `AbortSignal.timeout`.
 */
export function isTimeoutError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'TimeoutError'
}

/**
 * Best-effort guard for AppError across module boundaries.
 */
export function isAppError(error: unknown): error is AppError {
  if (error instanceof AppError) return true
  if (!error || typeof error !== 'object') return false

  const candidate: { name?: unknown; message?: unknown; type?: unknown } = error
  return (
    candidate.name === 'AppError' &&
    typeof candidate.message === 'string' &&
    typeof candidate.type === 'string'
  )
}

export function isErrorOfType(error: unknown, type: ErrorType): error is AppError {
  return isAppError(error) && error.type === type
}

/**
 * Read the `code` property Node attaches to system errors.
 */
export function getSystemErrorCode(error: unknown): string | null {
  if (!error || typeof error !== 'object') return null
  const candidate: { code?: unknown } = error
  return typeof candidate.code === 'string' ? candidate.code : null
}

/**
 * Centralized conversion used at operation boundaries so callers always
 * receive an AppError. `detail` replaces the underlying message.
 */
export function toAppError(error: unknown, type: ErrorType, context: string, detail?: string): AppError {
  if (isAppError(error)) {
    return error
  }

  const original = error instanceof Error ? error : undefined
  return new AppError(type, `${context}: ${detail ?? getErrorMessage(error)}`, original, getSystemErrorCode(error))
}
