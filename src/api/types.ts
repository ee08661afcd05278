/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { GrantService, TransferService } from '@/services/index.js';
import type { ActorContext } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 413 | 429 | 500 | 503;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<string, ErrorStatus> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  INVALID_SIZE: 400,
  INVALID_EXPIRY: 400,
  INVALID_STATE: 409,
  PART_CONFLICT: 409,
  INCOMPLETE_TRANSFER: 409,
  CONFLICT: 409,
  PAYLOAD_TOO_LARGE: 413,
  RATE_LIMITED: 429,
  STORE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return ERROR_STATUS_MAP[code] ?? 500;
}

/**
 * Service context for dependency injection
 */
export interface ApiServices {
  transferService: TransferService;
  grantService: GrantService;
}
