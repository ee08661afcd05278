/**
 * Part arithmetic for transfers
 * Parts are numbered 1..partCount; every part but the last is exactly
 * partSize bytes.
 */

import { createHash } from 'node:crypto';

import type { PartRecord, Transfer } from '@/types/index.js';
import { isStoredPart } from '@/types/index.js';

const CHECKSUM_PATTERN = /^[0-9a-f]{64}$/;
const PART_ETAG_PATTERN = /^"?([0-9a-f]{32})"?$/i;

export function computePartCount(fileSize: number, partSize: number): number {
  return Math.ceil(fileSize / partSize);
}

/**
 * Byte length a part must have
 */
export function expectedPartLength(
  transfer: Pick<Transfer, 'totalSize' | 'partSize' | 'partCount'>,
  partIndex: number
): number {
  if (partIndex < transfer.partCount) {
    return transfer.partSize;
  }
  return transfer.totalSize - (transfer.partCount - 1) * transfer.partSize;
}

/**
 * Inclusive byte range of a part within the assembled object
 */
export function partByteRange(
  transfer: Pick<Transfer, 'totalSize' | 'partSize' | 'partCount'>,
  partIndex: number
): { byteStart: number; byteEnd: number } {
  const byteStart = (partIndex - 1) * transfer.partSize;
  return {
    byteStart,
    byteEnd: byteStart + expectedPartLength(transfer, partIndex) - 1,
  };
}

/**
 * Indices in 1..partCount without a stored record, ascending
 */
export function findMissingParts(
  parts: PartRecord[],
  partCount: number
): number[] {
  const stored = new Set(
    parts.filter(isStoredPart).map((part) => part.partIndex)
  );
  const missing: number[] = [];
  for (let index = 1; index <= partCount; index++) {
    if (!stored.has(index)) {
      missing.push(index);
    }
  }
  return missing;
}

/**
 * True when two part listings agree on every stored token and checksum
 */
export function samePartSnapshot(a: PartRecord[], b: PartRecord[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const byIndex = new Map(b.map((part) => [part.partIndex, part]));
  return a.every((part) => {
    const other = byIndex.get(part.partIndex);
    return (
      other !== undefined &&
      other.status === part.status &&
      other.storageToken === part.storageToken &&
      other.checksum === part.checksum
    );
  });
}

export function sha256Hex(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function md5Hex(bytes: Uint8Array): string {
  return createHash('md5').update(bytes).digest('hex');
}

/**
 * ETag comparison ignoring the surrounding quotes and hex case
 */
export function sameEtag(a: string, b: string): boolean {
  const strip = (etag: string) => etag.replace(/^"|"$/g, '').toLowerCase();
  return strip(a) === strip(b);
}

/**
 * ETag an S3-compatible store gives the object assembled from these part
 * tokens: MD5 of the concatenated binary part MD5s, suffixed with the part
 * count. Null when a token is not a plain MD5 (SSE-KMS, SSE-C).
 */
export function multipartEtag(partTokens: string[]): string | null {
  const digests: Buffer[] = [];
  for (const token of partTokens) {
    const hex = PART_ETAG_PATTERN.exec(token)?.[1];
    if (hex === undefined) {
      return null;
    }
    digests.push(Buffer.from(hex, 'hex'));
  }
  const digest = createHash('md5').update(Buffer.concat(digests)).digest('hex');
  return `"${digest}-${partTokens.length}"`;
}

/**
 * Lowercase a client checksum; null when it is not 64 hex characters
 */
export function normalizeChecksum(checksum: string): string | null {
  const normalized = checksum.trim().toLowerCase();
  return CHECKSUM_PATTERN.test(normalized) ? normalized : null;
}
