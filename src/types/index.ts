/**
 * Core type definitions for Vaultline
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ActorContext } from './auth.js';
export { SYSTEM_ACTOR, isPrivilegedActor, principalOf } from './auth.js';
export type { AuditAction, AuditEvent, AuditLogEntry } from './audit.js';
export type {
  Transfer,
  TransferStatus,
  PartRecord,
  PartStatus,
  StoredPart,
  BeginTransferParams,
  UploadPartParams,
  TransferProgress,
  SweepParams,
  SweepResult,
} from './transfer.js';
export { isStoredPart } from './transfer.js';
export type { AccessGrant, GrantOperation } from './grant.js';
export {
  StoreUnavailableError,
  UploadSessionNotFoundError,
  isStoreUnavailable,
} from './errors.js';
