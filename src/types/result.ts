/**
 * Result Pattern
 *
 * Service methods return Result<T> and never throw to their caller.
 * Adapters below the service layer may throw; the service maps what
 * they throw onto one of the error codes below.
 */

/**
 * Error codes a service failure can carry
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'INVALID_SIZE'
  | 'INVALID_EXPIRY'
  | 'INVALID_STATE'
  | 'PART_CONFLICT'
  | 'INCOMPLETE_TRANSFER'
  | 'CONFLICT'
  | 'STORE_UNAVAILABLE'
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

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
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

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}
