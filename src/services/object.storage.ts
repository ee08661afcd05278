/**
 * S3 Object Storage Adapter
 * Implements the TransferService and GrantService storage interfaces
 * against any S3-compatible store
 */

import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListPartsCommand,
  PutObjectCommand,
  S3ServiceException,
  UploadPartCommand,
  type ListPartsCommandOutput,
  type S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import type { GrantOperation } from '@/types/index.js';
import {
  StoreUnavailableError,
  UploadSessionNotFoundError,
} from '@/types/index.js';

import type { GrantServiceStorage } from './grant.service.js';
import type { TransferServiceStorage } from './transfer.service.js';

export type ObjectStorage = TransferServiceStorage & GrantServiceStorage;

const TRANSIENT_ERROR_NAMES = new Set([
  'SlowDown',
  'RequestTimeout',
  'RequestTimeTooSkewed',
  'ServiceUnavailable',
  'InternalError',
  'TimeoutError',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Whether an S3 SDK failure is worth retrying
 */
export function isTransientS3Error(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    const statusCode = error.$metadata.httpStatusCode ?? 0;
    return (
      error.$fault === 'server' ||
      statusCode >= 500 ||
      statusCode === 429 ||
      TRANSIENT_ERROR_NAMES.has(error.name)
    );
  }
  if (error instanceof Error) {
    const code = errorCode(error);
    return (
      TRANSIENT_ERROR_NAMES.has(error.name) ||
      (code !== undefined && TRANSIENT_NETWORK_CODES.has(code))
    );
  }
  return false;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.$metadata.httpStatusCode === 404)
  );
}

function isNoSuchUpload(error: unknown): boolean {
  return error instanceof S3ServiceException && error.name === 'NoSuchUpload';
}

/**
 * Wrap an SDK failure in the adapter error the services expect
 */
function storageError(action: string, error: unknown): Error {
  const reason = error instanceof Error ? error.message : String(error);
  if (isTransientS3Error(error)) {
    return new StoreUnavailableError('object', `${action}: ${reason}`, {
      cause: error,
    });
  }
  return new Error(`Failed to ${action}: ${reason}`, { cause: error });
}

/**
 * Create storage adapter bound to one bucket
 */
export function createS3ObjectStorage(
  client: S3Client,
  bucket: string
): ObjectStorage {
  return {
    async createMultipartUpload(key: string): Promise<{ uploadId: string }> {
      let uploadId: string | undefined;
      try {
        ({ UploadId: uploadId } = await client.send(
          new CreateMultipartUploadCommand({ Bucket: bucket, Key: key })
        ));
      } catch (error) {
        throw storageError('create multipart upload', error);
      }

      if (uploadId === undefined) {
        throw new Error('Object store returned no UploadId');
      }
      return { uploadId };
    },

    async uploadPart(params: {
      key: string;
      uploadId: string;
      partIndex: number;
      bytes: Uint8Array;
    }): Promise<{ token: string }> {
      let etag: string | undefined;
      try {
        ({ ETag: etag } = await client.send(
          new UploadPartCommand({
            Bucket: bucket,
            Key: params.key,
            UploadId: params.uploadId,
            PartNumber: params.partIndex,
            Body: params.bytes,
            ContentLength: params.bytes.byteLength,
          })
        ));
      } catch (error) {
        if (isNoSuchUpload(error)) {
          throw new UploadSessionNotFoundError(params.uploadId);
        }
        throw storageError(`upload part ${params.partIndex}`, error);
      }

      if (etag === undefined) {
        throw new Error(`Object store returned no ETag for part ${params.partIndex}`);
      }
      return { token: etag };
    },

    async completeMultipartUpload(params: {
      key: string;
      uploadId: string;
      parts: Array<{ partIndex: number; token: string }>;
    }): Promise<{ etag: string }> {
      try {
        const response = await client.send(
          new CompleteMultipartUploadCommand({
            Bucket: bucket,
            Key: params.key,
            UploadId: params.uploadId,
            MultipartUpload: {
              Parts: params.parts.map((part) => ({
                PartNumber: part.partIndex,
                ETag: part.token,
              })),
            },
          })
        );
        return { etag: response.ETag ?? '' };
      } catch (error) {
        if (isNoSuchUpload(error)) {
          throw new UploadSessionNotFoundError(params.uploadId);
        }
        throw storageError('complete multipart upload', error);
      }
    },

    async abortMultipartUpload(params: {
      key: string;
      uploadId: string;
    }): Promise<void> {
      try {
        await client.send(
          new AbortMultipartUploadCommand({
            Bucket: bucket,
            Key: params.key,
            UploadId: params.uploadId,
          })
        );
      } catch (error) {
        if (isNoSuchUpload(error)) {
          throw new UploadSessionNotFoundError(params.uploadId);
        }
        throw storageError('abort multipart upload', error);
      }
    },

    /**
     * Every part the store holds for the session, following pagination
     */
    async listParts(params: {
      key: string;
      uploadId: string;
    }): Promise<Array<{ partIndex: number; token: string; size: number }>> {
      const parts: Array<{ partIndex: number; token: string; size: number }> = [];
      let marker: string | undefined;

      for (;;) {
        let response: ListPartsCommandOutput;
        try {
          response = await client.send(
            new ListPartsCommand({
              Bucket: bucket,
              Key: params.key,
              UploadId: params.uploadId,
              PartNumberMarker: marker,
            })
          );
        } catch (error) {
          if (isNoSuchUpload(error)) {
            throw new UploadSessionNotFoundError(params.uploadId);
          }
          throw storageError('list parts', error);
        }

        for (const part of response.Parts ?? []) {
          if (part.PartNumber !== undefined && part.ETag !== undefined) {
            parts.push({
              partIndex: part.PartNumber,
              token: part.ETag,
              size: part.Size ?? 0,
            });
          }
        }

        if (!response.IsTruncated || response.NextPartNumberMarker === undefined) {
          return parts.sort((a, b) => a.partIndex - b.partIndex);
        }
        marker = response.NextPartNumberMarker;
      }
    },

    /**
     * Metadata probe; null when the key does not exist
     */
    async headObject(
      key: string
    ): Promise<{ size: number; etag: string } | null> {
      try {
        const response = await client.send(
          new HeadObjectCommand({ Bucket: bucket, Key: key })
        );
        return {
          size: response.ContentLength ?? 0,
          etag: response.ETag ?? '',
        };
      } catch (error) {
        if (isNotFound(error)) {
          return null;
        }
        throw storageError('head object', error);
      }
    },

    /**
     * Signed URL for exactly one operation on exactly one key
     * Signing is local; no request reaches the store
     */
    async presign(params: {
      key: string;
      operation: GrantOperation;
      expiresInSeconds: number;
    }): Promise<string> {
      const input = { Bucket: bucket, Key: params.key };
      const command =
        params.operation === 'get'
          ? new GetObjectCommand(input)
          : new PutObjectCommand(input);

      return getSignedUrl(client, command, {
        expiresIn: params.expiresInSeconds,
      });
    },
  };
}
