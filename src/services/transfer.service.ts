/**
 * TransferService Implementation
 *
 * Drives a file from "declared" to "stored as one object" through the
 * object store's multipart API, tolerating interruption at any point.
 *
 * Owns: transfers, transfer_parts
 * Dependencies: metadata store, object store, AuditService, TransferLock
 *
 * GUARDRAILS:
 * - All durable state lives in the metadata store; nothing is cached
 *   between calls
 * - A part is visible as stored only after the object store confirmed it
 * - complete() runs under a per-transfer lock and re-checks the parts
 *   immediately before committing
 * - abort() never throws
 */

import { nanoid } from 'nanoid';

import type { RetryPolicy, TransferConfig } from '@/config.js';
import type { LockHandle, Sleep, TransferLock } from '@/lib/index.js';
import { defaultSleep, lockKey, withRetry } from '@/lib/index.js';
import type {
  ActorContext,
  AuditEvent,
  BeginTransferParams,
  Failure,
  PartRecord,
  Result,
  StoredPart,
  SweepParams,
  SweepResult,
  Transfer,
  TransferProgress,
  TransferStatus,
  UploadPartParams,
} from '@/types/index.js';
import {
  UploadSessionNotFoundError,
  failure,
  isPrivilegedActor,
  isStoredPart,
  isStoreUnavailable,
  success,
} from '@/types/index.js';

import { canActOnTransfer, canTargetKey, validateStorageKey } from './key-scope.js';
import {
  computePartCount,
  expectedPartLength,
  findMissingParts,
  multipartEtag,
  normalizeChecksum,
  partByteRange,
  sameEtag,
  samePartSnapshot,
  sha256Hex,
} from './transfer.parts.js';

/**
 * Metadata store interface for TransferService
 */
export interface TransferServiceDb {
  createTransfer: (transfer: Transfer) => Promise<Transfer>;
  getTransfer: (transferId: string) => Promise<Transfer | null>;
  /**
   * Compare-and-set on status. Resolves null when the transfer was not
   * in one of the `from` states.
   */
  transitionTransfer: (
    transferId: string,
    params: { from: TransferStatus[]; to: TransferStatus; at: Date }
  ) => Promise<Transfer | null>;
  /**
   * Bump updatedAt so an active transfer is not swept as stale
   */
  touchTransfer: (transferId: string, at: Date) => Promise<void>;
  listStaleTransfers: (updatedBefore: Date) => Promise<Transfer[]>;
  listParts: (transferId: string) => Promise<PartRecord[]>;
  getPart: (transferId: string, partIndex: number) => Promise<PartRecord | null>;
  /**
   * Insert a pending record; leaves an existing row untouched
   */
  insertPendingPart: (part: PartRecord) => Promise<void>;
  /**
   * Single-statement pending -> stored update carrying the token.
   * Resolves null when the row is gone (the transfer was aborted).
   */
  markPartStored: (params: {
    transferId: string;
    partIndex: number;
    checksum: string;
    storageToken: string;
    at: Date;
  }) => Promise<StoredPart | null>;
  /**
   * stored -> pending, only while the row still carries `storageToken`
   */
  demotePart: (params: {
    transferId: string;
    partIndex: number;
    storageToken: string;
    at: Date;
  }) => Promise<void>;
  deleteParts: (transferId: string) => Promise<void>;
}

/**
 * Object store interface for TransferService
 */
export interface TransferServiceStorage {
  createMultipartUpload: (key: string) => Promise<{ uploadId: string }>;
  uploadPart: (params: {
    key: string;
    uploadId: string;
    partIndex: number;
    bytes: Uint8Array;
  }) => Promise<{ token: string }>;
  completeMultipartUpload: (params: {
    key: string;
    uploadId: string;
    parts: Array<{ partIndex: number; token: string }>;
  }) => Promise<{ etag: string }>;
  abortMultipartUpload: (params: {
    key: string;
    uploadId: string;
  }) => Promise<void>;
  /**
   * Parts the store holds for the session, ascending by index
   */
  listParts: (params: {
    key: string;
    uploadId: string;
  }) => Promise<Array<{ partIndex: number; token: string; size: number }>>;
  headObject: (key: string) => Promise<{ size: number; etag: string } | null>;
}

/**
 * Minimal AuditService interface (subset needed by TransferService)
 */
export interface TransferServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * TransferService interface
 */
export interface TransferService {
  begin(
    actor: ActorContext,
    params: BeginTransferParams
  ): Promise<Result<Transfer>>;
  uploadPart(
    actor: ActorContext,
    params: UploadPartParams
  ): Promise<Result<PartRecord>>;
  complete(actor: ActorContext, transferId: string): Promise<Result<string>>;
  abort(actor: ActorContext, transferId: string): Promise<Result<void>>;
  status(actor: ActorContext, transferId: string): Promise<Result<Transfer>>;
  listParts(
    actor: ActorContext,
    transferId: string
  ): Promise<Result<TransferProgress>>;
  sweepStale(
    actor: ActorContext,
    params: SweepParams
  ): Promise<Result<SweepResult>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

const OPEN_STATES: TransferStatus[] = ['initiated', 'in_progress'];

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map an adapter error onto a Result failure
 */
function storeFailure(action: string, error: unknown): Failure {
  console.error(`[transfer] ${action} failed:`, error);
  return failure(
    'STORE_UNAVAILABLE',
    isStoreUnavailable(error)
      ? `Storage temporarily unavailable during ${action}`
      : `Storage error during ${action}: ${describeError(error)}`
  );
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create TransferService instance
 */
export function createTransferService(deps: {
  db: TransferServiceDb;
  storage: TransferServiceStorage;
  auditService: TransferServiceAudit;
  lock: TransferLock;
  config: TransferConfig;
  retry: RetryPolicy;
  now?: () => Date;
  sleep?: Sleep;
}): TransferService {
  const { db, storage, auditService, lock, config, retry } = deps;
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;

  function retrying<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(label, operation, retry, sleep);
  }

  /**
   * Audit failures are reported, never propagated
   */
  async function audit(actor: ActorContext, event: AuditEvent): Promise<void> {
    try {
      const result = await auditService.log(actor, event);
      if (!result.success) {
        console.error(
          `[transfer] audit ${event.action} not recorded: ${result.error.message}`
        );
      }
    } catch (error) {
      console.error(`[transfer] audit ${event.action} not recorded:`, error);
    }
  }

  /**
   * Load a transfer the actor may act on
   */
  async function loadTransfer(
    actor: ActorContext,
    transferId: string
  ): Promise<Result<Transfer>> {
    if (!transferId || transferId.trim() === '') {
      return failure('VALIDATION_ERROR', 'Transfer ID is required');
    }

    const transfer = await retrying('getTransfer', () =>
      db.getTransfer(transferId)
    );
    if (transfer === null) {
      return failure('NOT_FOUND', 'Transfer not found');
    }
    if (!canActOnTransfer(actor, transfer)) {
      return failure('PERMISSION_DENIED', 'Cannot access this transfer');
    }
    return success(transfer);
  }

  /**
   * Read the parts twice and accept the listing only when both reads agree
   */
  async function stablePartSnapshot(
    transfer: Transfer
  ): Promise<Result<StoredPart[]>> {
    for (let attempt = 0; attempt < config.completeSnapshotAttempts; attempt++) {
      const parts = await retrying('listParts', () =>
        db.listParts(transfer.id)
      );

      const missingParts = findMissingParts(parts, transfer.partCount);
      if (missingParts.length > 0) {
        return failure(
          'INCOMPLETE_TRANSFER',
          `Transfer is missing parts: ${missingParts.join(', ')}`,
          { missingParts }
        );
      }

      const recheck = await retrying('listParts', () =>
        db.listParts(transfer.id)
      );
      if (samePartSnapshot(parts, recheck)) {
        return success(
          parts
            .filter(isStoredPart)
            .filter((part) => part.partIndex <= transfer.partCount)
            .sort((a, b) => a.partIndex - b.partIndex)
        );
      }
    }

    return failure(
      'CONFLICT',
      'Parts changed while completing; retry once uploads settle'
    );
  }

  /**
   * Compare the recorded tokens with the parts the store holds. Two
   * writers racing on one index can leave the record naming one body
   * while the store kept the other; such parts go back to pending.
   */
  async function verifyStoredParts(
    transfer: Transfer,
    parts: StoredPart[]
  ): Promise<Result<void>> {
    let held: Array<{ partIndex: number; token: string }>;
    try {
      held = await retrying('listStoredParts', () =>
        storage.listParts({
          key: transfer.targetKey,
          uploadId: transfer.uploadId,
        })
      );
    } catch (error) {
      // commitObject decides what a missing session means
      if (error instanceof UploadSessionNotFoundError) {
        return success(undefined);
      }
      throw error;
    }

    const heldTokens = new Map(held.map((part) => [part.partIndex, part.token]));
    const mismatched = parts.filter((part) => {
      const token = heldTokens.get(part.partIndex);
      return token === undefined || !sameEtag(token, part.storageToken);
    });
    if (mismatched.length === 0) {
      return success(undefined);
    }

    for (const part of mismatched) {
      await retrying('demotePart', () =>
        db.demotePart({
          transferId: transfer.id,
          partIndex: part.partIndex,
          storageToken: part.storageToken,
          at: now(),
        })
      );
    }

    const mismatchedParts = mismatched.map((part) => part.partIndex);
    console.warn(
      `[transfer] ${transfer.id}: parts ${mismatchedParts.join(', ')} differ from the object store`
    );
    return failure(
      'INCOMPLETE_TRANSFER',
      `Parts must be uploaded again: ${mismatchedParts.join(', ')}`,
      { missingParts: mismatchedParts, mismatchedParts }
    );
  }

  /**
   * Commit the multipart session. When the session is already gone, an
   * object at the key whose ETag matches these parts counts as a prior
   * successful commit.
   */
  async function commitObject(
    transfer: Transfer,
    parts: StoredPart[]
  ): Promise<Result<{ etag: string }>> {
    const tokens = parts.map((part) => part.storageToken);
    try {
      const committed = await retrying('completeMultipartUpload', () =>
        storage.completeMultipartUpload({
          key: transfer.targetKey,
          uploadId: transfer.uploadId,
          parts: parts.map((part) => ({
            partIndex: part.partIndex,
            token: part.storageToken,
          })),
        })
      );
      return success(committed);
    } catch (error) {
      if (!(error instanceof UploadSessionNotFoundError)) {
        throw error;
      }

      const existing = await retrying('headObject', () =>
        storage.headObject(transfer.targetKey)
      );
      const expectedEtag = multipartEtag(tokens);
      if (
        existing !== null &&
        existing.size === transfer.totalSize &&
        expectedEtag !== null &&
        sameEtag(existing.etag, expectedEtag)
      ) {
        return success({ etag: existing.etag });
      }
      return failure(
        'STORE_UNAVAILABLE',
        'Multipart session is gone and no matching object was assembled'
      );
    }
  }

  /**
   * Failure for an upload whose session or rows vanished mid-call
   */
  async function transferGone(transferId: string): Promise<Failure> {
    const current = await retrying('getTransfer', () =>
      db.getTransfer(transferId)
    );
    if (current?.status === 'completed') {
      return failure('INVALID_STATE', 'Transfer is already completed');
    }
    return failure('NOT_FOUND', 'Transfer has been aborted');
  }

  const service: TransferService = {
    /**
     * Begin a transfer
     * Opens the multipart session, then records the transfer as initiated
     */
    async begin(
      actor: ActorContext,
      params: BeginTransferParams
    ): Promise<Result<Transfer>> {
      const { fileSize, partSize, targetKey } = params;

      if (!isPositiveInteger(fileSize)) {
        return failure('INVALID_SIZE', 'fileSize must be a positive integer');
      }
      if (!isPositiveInteger(partSize)) {
        return failure('INVALID_SIZE', 'partSize must be a positive integer');
      }
      if (partSize > config.maxPartSize) {
        return failure(
          'INVALID_SIZE',
          `partSize exceeds the maximum of ${config.maxPartSize} bytes`
        );
      }

      const partCount = computePartCount(fileSize, partSize);
      if (partCount > config.maxPartCount) {
        return failure(
          'INVALID_SIZE',
          `Transfer would need ${partCount} parts; the maximum is ${config.maxPartCount}`
        );
      }

      const keyProblem = validateStorageKey(targetKey);
      if (keyProblem !== null) {
        return failure('VALIDATION_ERROR', keyProblem);
      }
      if (!canTargetKey(actor, targetKey)) {
        return failure('PERMISSION_DENIED', 'Cannot write to this key');
      }

      let uploadId: string;
      try {
        // Not idempotent: a retry could open a second session
        ({ uploadId } = await storage.createMultipartUpload(targetKey));
      } catch (error) {
        return storeFailure('createMultipartUpload', error);
      }

      const createdAt = now();
      const draft: Transfer = {
        id: nanoid(),
        ownerId: actor.userId ?? null,
        targetKey,
        totalSize: fileSize,
        partSize,
        partCount,
        uploadId,
        status: 'initiated',
        createdAt,
        updatedAt: createdAt,
        completedAt: null,
      };

      let transfer: Transfer;
      try {
        transfer = await retrying('createTransfer', () =>
          db.createTransfer(draft)
        );
      } catch (error) {
        // Cleanup guard: do not leave an orphaned session behind
        try {
          await storage.abortMultipartUpload({ key: targetKey, uploadId });
        } catch (abortError) {
          console.error(
            `[transfer] failed to abort orphaned session ${uploadId}:`,
            abortError
          );
        }
        return storeFailure('createTransfer', error);
      }

      await audit(actor, {
        action: 'transfer:begun',
        resourceType: 'transfer',
        resourceId: transfer.id,
        details: { targetKey, fileSize, partSize, partCount },
      });

      return success(transfer);
    },

    /**
     * Upload one part
     * Idempotent for the same checksum; a different checksum for an
     * already stored index is a conflict
     */
    async uploadPart(
      actor: ActorContext,
      params: UploadPartParams
    ): Promise<Result<PartRecord>> {
      const { transferId, partIndex, bytes } = params;

      try {
        const loaded = await loadTransfer(actor, transferId);
        if (!loaded.success) {
          return loaded;
        }
        const transfer = loaded.data;

        if (transfer.status === 'aborted') {
          return failure('NOT_FOUND', 'Transfer has been aborted');
        }
        if (transfer.status === 'completed') {
          return failure('INVALID_STATE', 'Transfer is already completed');
        }

        if (
          !Number.isInteger(partIndex) ||
          partIndex < 1 ||
          partIndex > transfer.partCount
        ) {
          return failure(
            'INVALID_SIZE',
            `partIndex must be between 1 and ${transfer.partCount}`
          );
        }

        const expectedLength = expectedPartLength(transfer, partIndex);
        if (bytes.byteLength !== expectedLength) {
          return failure(
            'INVALID_SIZE',
            `Part ${partIndex} must be ${expectedLength} bytes, got ${bytes.byteLength}`
          );
        }

        const checksum = normalizeChecksum(params.checksum);
        if (checksum === null) {
          return failure(
            'VALIDATION_ERROR',
            'checksum must be a hex-encoded SHA-256 digest'
          );
        }
        if (sha256Hex(bytes) !== checksum) {
          return failure(
            'VALIDATION_ERROR',
            'checksum does not match the part bytes'
          );
        }

        const existing = await retrying('getPart', () =>
          db.getPart(transferId, partIndex)
        );
        if (
          existing !== null &&
          existing.status === 'stored' &&
          existing.checksum !== checksum
        ) {
          return failure(
            'PART_CONFLICT',
            `Part ${partIndex} is already stored with a different checksum`,
            { partIndex, storedChecksum: existing.checksum }
          );
        }

        if (existing === null) {
          await retrying('insertPendingPart', () =>
            db.insertPendingPart({
              transferId,
              partIndex,
              ...partByteRange(transfer, partIndex),
              size: expectedLength,
              checksum,
              status: 'pending',
              storageToken: null,
              updatedAt: now(),
            })
          );
        }

        let token: string;
        try {
          ({ token } = await retrying('uploadPart', () =>
            storage.uploadPart({
              key: transfer.targetKey,
              uploadId: transfer.uploadId,
              partIndex,
              bytes,
            })
          ));
        } catch (error) {
          if (error instanceof UploadSessionNotFoundError) {
            return await transferGone(transferId);
          }
          throw error;
        }

        const part = await retrying('markPartStored', () =>
          db.markPartStored({
            transferId,
            partIndex,
            checksum,
            storageToken: token,
            at: now(),
          })
        );
        if (part === null) {
          return await transferGone(transferId);
        }

        if (transfer.status === 'initiated') {
          await retrying('transitionTransfer', () =>
            db.transitionTransfer(transferId, {
              from: ['initiated'],
              to: 'in_progress',
              at: now(),
            })
          );
        } else {
          await retrying('touchTransfer', () =>
            db.touchTransfer(transferId, now())
          );
        }

        await audit(actor, {
          action: 'transfer:part_stored',
          resourceType: 'transfer',
          resourceId: transferId,
          details: { partIndex, size: expectedLength, checksum },
        });

        return success(part);
      } catch (error) {
        return storeFailure('uploadPart', error);
      }
    },

    /**
     * Assemble the stored parts into the target object
     * Safe to retry: a completed transfer returns its key again
     */
    async complete(
      actor: ActorContext,
      transferId: string
    ): Promise<Result<string>> {
      try {
        const loaded = await loadTransfer(actor, transferId);
        if (!loaded.success) {
          return loaded;
        }
        if (loaded.data.status === 'completed') {
          return success(loaded.data.targetKey);
        }
        if (loaded.data.status === 'aborted') {
          return failure('NOT_FOUND', 'Transfer has been aborted');
        }

        const handle = await lock.acquire(
          lockKey(transferId),
          config.lockTtlSeconds
        );
        if (handle === null) {
          return failure(
            'CONFLICT',
            'Transfer is already being completed by another request'
          );
        }

        try {
          // Another request may have finished while we waited for the lock
          const transfer = await retrying('getTransfer', () =>
            db.getTransfer(transferId)
          );
          if (transfer === null || transfer.status === 'aborted') {
            return failure('NOT_FOUND', 'Transfer has been aborted');
          }
          if (transfer.status === 'completed') {
            return success(transfer.targetKey);
          }

          const snapshot = await stablePartSnapshot(transfer);
          if (!snapshot.success) {
            return snapshot;
          }

          const verified = await verifyStoredParts(transfer, snapshot.data);
          if (!verified.success) {
            return verified;
          }

          const committed = await commitObject(transfer, snapshot.data);
          if (!committed.success) {
            return committed;
          }

          const updated = await retrying('transitionTransfer', () =>
            db.transitionTransfer(transferId, {
              from: OPEN_STATES,
              to: 'completed',
              at: now(),
            })
          );
          if (updated === null) {
            const current = await retrying('getTransfer', () =>
              db.getTransfer(transferId)
            );
            if (current?.status !== 'completed') {
              return failure('NOT_FOUND', 'Transfer has been aborted');
            }
          }

          await audit(actor, {
            action: 'transfer:completed',
            resourceType: 'transfer',
            resourceId: transferId,
            details: {
              targetKey: transfer.targetKey,
              partCount: transfer.partCount,
              totalSize: transfer.totalSize,
              etag: committed.data.etag,
            },
          });

          return success(transfer.targetKey);
        } finally {
          try {
            await handle.release();
          } catch (releaseError) {
            console.error(
              `[transfer] failed to release lock for ${transferId}:`,
              releaseError
            );
          }
        }
      } catch (error) {
        return storeFailure('complete', error);
      }
    },

    /**
     * Abort a transfer and release its session and parts
     * No-op for unknown, completed or already aborted transfers.
     * The session is released before the status changes, so a failed
     * release leaves the transfer open for a retry or the stale sweep.
     */
    async abort(
      actor: ActorContext,
      transferId: string
    ): Promise<Result<void>> {
      let found: Transfer | null;
      try {
        found = await retrying('getTransfer', () => db.getTransfer(transferId));
      } catch (error) {
        return storeFailure('abort', error);
      }

      if (found === null || !OPEN_STATES.includes(found.status)) {
        return success(undefined);
      }
      if (!canActOnTransfer(actor, found)) {
        return failure('PERMISSION_DENIED', 'Cannot abort this transfer');
      }

      let handle: LockHandle | null;
      try {
        handle = await lock.acquire(lockKey(transferId), config.lockTtlSeconds);
      } catch (error) {
        return storeFailure('abort', error);
      }
      if (handle === null) {
        return failure(
          'CONFLICT',
          'Transfer is being completed; retry the abort once it settles'
        );
      }

      try {
        const transfer = await retrying('getTransfer', () =>
          db.getTransfer(transferId)
        );
        if (transfer === null || !OPEN_STATES.includes(transfer.status)) {
          return success(undefined);
        }

        try {
          await retrying('abortMultipartUpload', () =>
            storage.abortMultipartUpload({
              key: transfer.targetKey,
              uploadId: transfer.uploadId,
            })
          );
        } catch (error) {
          if (!(error instanceof UploadSessionNotFoundError)) {
            console.error(
              `[transfer] failed to release session ${transfer.uploadId} for ${transferId}:`,
              error
            );
            return failure(
              'STORE_UNAVAILABLE',
              'Could not release the multipart session; the transfer stays open'
            );
          }
        }

        const aborted = await retrying('transitionTransfer', () =>
          db.transitionTransfer(transferId, {
            from: OPEN_STATES,
            to: 'aborted',
            at: now(),
          })
        );
        if (aborted === null) {
          return success(undefined);
        }

        try {
          await retrying('deleteParts', () => db.deleteParts(transferId));
        } catch (error) {
          console.error(
            `[transfer] failed to delete parts for ${transferId}:`,
            error
          );
        }

        await audit(actor, {
          action: 'transfer:aborted',
          resourceType: 'transfer',
          resourceId: transferId,
          details: { targetKey: transfer.targetKey },
        });

        return success(undefined);
      } catch (error) {
        return storeFailure('abort', error);
      } finally {
        try {
          await handle.release();
        } catch (releaseError) {
          console.error(
            `[transfer] failed to release lock for ${transferId}:`,
            releaseError
          );
        }
      }
    },

    /**
     * Read-only snapshot of a transfer
     */
    async status(
      actor: ActorContext,
      transferId: string
    ): Promise<Result<Transfer>> {
      try {
        return await loadTransfer(actor, transferId);
      } catch (error) {
        return storeFailure('status', error);
      }
    },

    /**
     * Stored parts plus the indices still missing, for resuming
     */
    async listParts(
      actor: ActorContext,
      transferId: string
    ): Promise<Result<TransferProgress>> {
      try {
        const loaded = await loadTransfer(actor, transferId);
        if (!loaded.success) {
          return loaded;
        }
        const transfer = loaded.data;
        if (transfer.status === 'aborted') {
          return failure('NOT_FOUND', 'Transfer has been aborted');
        }

        const parts = await retrying('listParts', () =>
          db.listParts(transferId)
        );
        const sorted = [...parts].sort((a, b) => a.partIndex - b.partIndex);
        const storedBytes = sorted
          .filter(isStoredPart)
          .reduce((sum, part) => sum + part.size, 0);

        return success({
          transfer,
          parts: sorted,
          missingParts: findMissingParts(sorted, transfer.partCount),
          storedBytes,
        });
      } catch (error) {
        return storeFailure('listParts', error);
      }
    },

    /**
     * Abort open transfers that have not moved for longer than the TTL
     * Admin or system only
     */
    async sweepStale(
      actor: ActorContext,
      params: SweepParams
    ): Promise<Result<SweepResult>> {
      if (!isPrivilegedActor(actor)) {
        return failure(
          'PERMISSION_DENIED',
          'Only administrators can sweep transfers'
        );
      }

      const olderThanSeconds =
        params.olderThanSeconds ?? config.staleTransferTtlSeconds;
      if (!isPositiveInteger(olderThanSeconds)) {
        return failure(
          'VALIDATION_ERROR',
          'olderThanSeconds must be a positive integer'
        );
      }

      let stale: Transfer[];
      try {
        const cutoff = new Date(now().getTime() - olderThanSeconds * 1000);
        stale = await retrying('listStaleTransfers', () =>
          db.listStaleTransfers(cutoff)
        );
      } catch (error) {
        return storeFailure('sweepStale', error);
      }

      const aborted: string[] = [];
      for (const transfer of stale) {
        const result = await service.abort(actor, transfer.id);
        if (result.success) {
          aborted.push(transfer.id);
        } else {
          console.error(
            `[transfer] sweep could not abort ${transfer.id}: ${result.error.message}`
          );
        }
      }

      return success({ aborted });
    },
  };

  return service;
}
