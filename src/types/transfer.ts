/**
 * Transfer Domain Types
 *
 * A Transfer is one logical file upload, split into contiguous parts
 * numbered 1..partCount. Part Records are the durable acknowledgement
 * that the object store holds a part.
 */

/**
 * Transfer lifecycle
 * initiated -> in_progress -> completed
 *          \-> aborted (from initiated or in_progress)
 */
export type TransferStatus =
  | 'initiated'
  | 'in_progress'
  | 'completed'
  | 'aborted';

/**
 * Part acknowledgement status
 */
export type PartStatus = 'pending' | 'stored';

/**
 * Transfer entity
 */
export interface Transfer {
  id: string;
  ownerId: string | null;
  targetKey: string;
  totalSize: number;
  partSize: number;
  partCount: number;
  uploadId: string;
  status: TransferStatus;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

/**
 * Part Record entity
 * byteStart/byteEnd are inclusive offsets into the assembled object
 */
export interface PartRecord {
  transferId: string;
  partIndex: number;
  byteStart: number;
  byteEnd: number;
  size: number;
  checksum: string;
  status: PartStatus;
  storageToken: string | null;
  updatedAt: Date;
}

/**
 * A part the object store has acknowledged
 */
export interface StoredPart extends PartRecord {
  status: 'stored';
  storageToken: string;
}

/**
 * Parameters for beginning a transfer
 */
export interface BeginTransferParams {
  fileSize: number;
  partSize: number;
  targetKey: string;
}

/**
 * Parameters for uploading one part
 */
export interface UploadPartParams {
  transferId: string;
  partIndex: number;
  bytes: Uint8Array;
  checksum: string;
}

/**
 * Resume view of a transfer
 */
export interface TransferProgress {
  transfer: Transfer;
  parts: PartRecord[];
  missingParts: number[];
  storedBytes: number;
}

/**
 * Parameters for the stale transfer sweep
 */
export interface SweepParams {
  olderThanSeconds?: number;
}

/**
 * Outcome of the stale transfer sweep
 */
export interface SweepResult {
  aborted: string[];
}

export function isStoredPart(part: PartRecord): part is StoredPart {
  return part.status === 'stored' && part.storageToken !== null;
}
