/**
 * Result Pattern
 *
 * Service methods whose outcome the caller must branch on return Result<T>
 * instead of throwing.
 */

/**
 * Error codes shared by services and the HTTP layer
 */
export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'INVALID_STATE'
  | 'INVALID_GRANT'
  | 'OAUTH_PROVIDER_ERROR'
  | 'STORE_UNAVAILABLE'
  | 'UNSUPPORTED_OPERATION'
  | 'LLM_CHAT_COMPLETION_ERROR'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.success;
}
