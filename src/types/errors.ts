/**
 * Adapter Errors
 *
 * Thrown by the storage and database adapters. Services never let these
 * escape; they become Result failures.
 */

/**
 * Transient failure of the object store or metadata store.
 * Safe to retry when the operation being attempted is idempotent.
 */
export class StoreUnavailableError extends Error {
  readonly store: 'object' | 'metadata';

  constructor(
    store: 'object' | 'metadata',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreUnavailableError';
    this.store = store;
  }
}

/**
 * The object store no longer knows the multipart session
 * (already completed, aborted, or expired by a lifecycle rule)
 */
export class UploadSessionNotFoundError extends Error {
  readonly uploadId: string;

  constructor(uploadId: string) {
    super(`Multipart session not found: ${uploadId}`);
    this.name = 'UploadSessionNotFoundError';
    this.uploadId = uploadId;
  }
}

export function isStoreUnavailable(error: unknown): error is StoreUnavailableError {
  return error instanceof StoreUnavailableError;
}
