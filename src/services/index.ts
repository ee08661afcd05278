/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the metadata and object stores.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// TransferService
export type {
  TransferService,
  TransferServiceDb,
  TransferServiceStorage,
  TransferServiceAudit,
} from './transfer.service.js';
export { createTransferService } from './transfer.service.js';
export { createTransferServiceDb } from './transfer.db.js';

// GrantService
export type {
  GrantService,
  GrantServiceStorage,
  GrantServiceAudit,
} from './grant.service.js';
export { createGrantService } from './grant.service.js';

// Object store adapter
export type { ObjectStorage } from './object.storage.js';
export { createS3ObjectStorage, isTransientS3Error } from './object.storage.js';
