/**
 * S3 Object Storage Adapter Tests
 * Commands are answered by a middleware on the client's initialize step,
 * so nothing leaves the process
 */

import {
  NoSuchUpload,
  NotFound,
  S3Client,
  S3ServiceException,
  type ServiceInputTypes,
  type ServiceOutputTypes,
} from '@aws-sdk/client-s3';
import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import {
  createS3ObjectStorage,
  isTransientS3Error,
} from '@/services/object.storage.js';
import type { ObjectStorage } from '@/services/object.storage.js';
import {
  StoreUnavailableError,
  UploadSessionNotFoundError,
} from '@/types/index.js';

type Responder = (
  commandName: string | undefined,
  input: ServiceInputTypes
) => Promise<ServiceOutputTypes>;

function createClient(): S3Client {
  return new S3Client({
    region: 'us-east-1',
    credentials: {
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    },
    maxAttempts: 1,
  });
}

function stubResponses(client: S3Client, respond: Responder): void {
  client.middlewareStack.add(
    (_next, context) => async (args) => ({
      output: await respond(context.commandName, args.input),
      response: {},
    }),
    { step: 'initialize', name: 'stubResponses' }
  );
}

function serverError(name = 'InternalError'): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: 'server',
    $metadata: { httpStatusCode: 500 },
    message: 'We encountered an internal error. Please try again.',
  });
}

function accessDenied(): S3ServiceException {
  return new S3ServiceException({
    name: 'AccessDenied',
    $fault: 'client',
    $metadata: { httpStatusCode: 403 },
    message: 'Access Denied',
  });
}

function noSuchUpload(): NoSuchUpload {
  return new NoSuchUpload({
    $metadata: { httpStatusCode: 404 },
    message: 'The specified upload does not exist.',
  });
}

describe('S3 object storage', () => {
  let respond: Mock<Responder>;
  let storage: ObjectStorage;

  beforeEach(() => {
    respond = vi.fn<Responder>();
    const client = createClient();
    stubResponses(client, respond);
    storage = createS3ObjectStorage(client, 'test-bucket');
  });

  describe('createMultipartUpload', () => {
    it('should return the session ID', async () => {
      respond.mockResolvedValueOnce({ UploadId: 'upload-1', $metadata: {} });

      const result = await storage.createMultipartUpload('a.bin');

      expect(result).toEqual({ uploadId: 'upload-1' });
      expect(respond).toHaveBeenCalledWith(
        'CreateMultipartUploadCommand',
        expect.objectContaining({ Bucket: 'test-bucket', Key: 'a.bin' })
      );
    });

    it('should fail when the store returns no session ID', async () => {
      respond.mockResolvedValueOnce({ $metadata: {} });

      await expect(storage.createMultipartUpload('a.bin')).rejects.toThrow(
        'Object store returned no UploadId'
      );
    });

    it('should wrap server errors as StoreUnavailableError', async () => {
      respond.mockRejectedValueOnce(serverError());

      const error = await storage
        .createMultipartUpload('a.bin')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreUnavailableError);
      expect(error).toMatchObject({ store: 'object' });
    });

    it('should wrap client errors as plain errors', async () => {
      respond.mockRejectedValueOnce(accessDenied());

      const error = await storage
        .createMultipartUpload('a.bin')
        .catch((e: unknown) => e);

      expect(error).not.toBeInstanceOf(StoreUnavailableError);
      expect(error).toBeInstanceOf(Error);
      expect(error).toMatchObject({
        message: 'Failed to create multipart upload: Access Denied',
      });
    });
  });

  describe('uploadPart', () => {
    const bytes = new Uint8Array([1, 2, 3, 4]);

    it('should send the part and return its ETag', async () => {
      respond.mockResolvedValueOnce({ ETag: '"etag-2"', $metadata: {} });

      const result = await storage.uploadPart({
        key: 'a.bin',
        uploadId: 'upload-1',
        partIndex: 2,
        bytes,
      });

      expect(result).toEqual({ token: '"etag-2"' });
      expect(respond).toHaveBeenCalledWith(
        'UploadPartCommand',
        expect.objectContaining({
          Bucket: 'test-bucket',
          Key: 'a.bin',
          UploadId: 'upload-1',
          PartNumber: 2,
          ContentLength: 4,
        })
      );
    });

    it('should report a missing session', async () => {
      respond.mockRejectedValueOnce(noSuchUpload());

      await expect(
        storage.uploadPart({ key: 'a.bin', uploadId: 'upload-1', partIndex: 1, bytes })
      ).rejects.toBeInstanceOf(UploadSessionNotFoundError);
    });

    it('should wrap throttling as StoreUnavailableError', async () => {
      respond.mockRejectedValueOnce(
        new S3ServiceException({
          name: 'SlowDown',
          $fault: 'client',
          $metadata: { httpStatusCode: 503 },
          message: 'Please reduce your request rate.',
        })
      );

      await expect(
        storage.uploadPart({ key: 'a.bin', uploadId: 'upload-1', partIndex: 1, bytes })
      ).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });

  describe('completeMultipartUpload', () => {
    it('should send the parts with their part numbers', async () => {
      respond.mockResolvedValueOnce({ ETag: '"final-3"', $metadata: {} });

      const result = await storage.completeMultipartUpload({
        key: 'a.bin',
        uploadId: 'upload-1',
        parts: [
          { partIndex: 1, token: '"e1"' },
          { partIndex: 2, token: '"e2"' },
        ],
      });

      expect(result).toEqual({ etag: '"final-3"' });
      expect(respond).toHaveBeenCalledWith(
        'CompleteMultipartUploadCommand',
        expect.objectContaining({
          UploadId: 'upload-1',
          MultipartUpload: {
            Parts: [
              { PartNumber: 1, ETag: '"e1"' },
              { PartNumber: 2, ETag: '"e2"' },
            ],
          },
        })
      );
    });

    it('should report a session that was already completed', async () => {
      respond.mockRejectedValueOnce(noSuchUpload());

      await expect(
        storage.completeMultipartUpload({ key: 'a.bin', uploadId: 'upload-1', parts: [] })
      ).rejects.toBeInstanceOf(UploadSessionNotFoundError);
    });
  });

  describe('abortMultipartUpload', () => {
    it('should send the abort', async () => {
      respond.mockResolvedValueOnce({ $metadata: {} });

      await storage.abortMultipartUpload({ key: 'a.bin', uploadId: 'upload-1' });

      expect(respond).toHaveBeenCalledWith(
        'AbortMultipartUploadCommand',
        expect.objectContaining({ Key: 'a.bin', UploadId: 'upload-1' })
      );
    });

    it('should report a session that no longer exists', async () => {
      respond.mockRejectedValueOnce(noSuchUpload());

      await expect(
        storage.abortMultipartUpload({ key: 'a.bin', uploadId: 'upload-1' })
      ).rejects.toBeInstanceOf(UploadSessionNotFoundError);
    });
  });

  describe('listParts', () => {
    it('should follow the part number marker across pages', async () => {
      respond
        .mockResolvedValueOnce({
          Parts: [
            { PartNumber: 1, ETag: '"etag-1"', Size: 4 },
            { PartNumber: 2, ETag: '"etag-2"', Size: 4 },
          ],
          IsTruncated: true,
          NextPartNumberMarker: '2',
          $metadata: {},
        })
        .mockResolvedValueOnce({
          Parts: [{ PartNumber: 3, ETag: '"etag-3"', Size: 2 }],
          IsTruncated: false,
          $metadata: {},
        });

      const parts = await storage.listParts({ key: 'a.bin', uploadId: 'upload-1' });

      expect(parts).toEqual([
        { partIndex: 1, token: '"etag-1"', size: 4 },
        { partIndex: 2, token: '"etag-2"', size: 4 },
        { partIndex: 3, token: '"etag-3"', size: 2 },
      ]);
      expect(respond).toHaveBeenNthCalledWith(
        2,
        'ListPartsCommand',
        expect.objectContaining({ UploadId: 'upload-1', PartNumberMarker: '2' })
      );
    });

    it('should map NoSuchUpload to UploadSessionNotFoundError', async () => {
      respond.mockRejectedValueOnce(noSuchUpload());

      await expect(
        storage.listParts({ key: 'a.bin', uploadId: 'upload-1' })
      ).rejects.toBeInstanceOf(UploadSessionNotFoundError);
    });
  });

  describe('headObject', () => {
    it('should return size and ETag', async () => {
      respond.mockResolvedValueOnce({
        ContentLength: 15_000_000,
        ETag: '"abc-3"',
        $metadata: {},
      });

      expect(await storage.headObject('a.bin')).toEqual({
        size: 15_000_000,
        etag: '"abc-3"',
      });
    });

    it('should return null for a missing key', async () => {
      respond.mockRejectedValueOnce(
        new NotFound({ $metadata: { httpStatusCode: 404 }, message: 'Not Found' })
      );

      expect(await storage.headObject('missing.bin')).toBeNull();
    });
  });

  describe('presign', () => {
    // Signing is local, so the real client is used without the stub
    const unsigned = createS3ObjectStorage(createClient(), 'test-bucket');

    it('should sign a GET for the key with the requested expiry', async () => {
      const url = new URL(
        await unsigned.presign({
          key: 'users/user-1/a.bin',
          operation: 'get',
          expiresInSeconds: 3600,
        })
      );

      expect(url.host).toMatch(/^test-bucket\.s3[.-]/);
      expect(url.pathname).toBe('/users/user-1/a.bin');
      expect(url.searchParams.get('X-Amz-Expires')).toBe('3600');
      expect(url.searchParams.get('X-Amz-Credential')).toMatch(
        /^test-access-key\//
      );
      expect(url.searchParams.get('X-Amz-Signature')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should sign a PUT', async () => {
      const url = new URL(
        await unsigned.presign({
          key: 'upload.bin',
          operation: 'put',
          expiresInSeconds: 60,
        })
      );

      expect(url.pathname).toBe('/upload.bin');
      expect(url.searchParams.get('X-Amz-Expires')).toBe('60');
    });
  });

  describe('isTransientS3Error()', () => {
    it('should treat network resets as transient', () => {
      const reset = Object.assign(new Error('socket hang up'), {
        code: 'ECONNRESET',
      });

      expect(isTransientS3Error(reset)).toBe(true);
    });

    it('should treat server faults as transient and client faults as final', () => {
      expect(isTransientS3Error(serverError())).toBe(true);
      expect(isTransientS3Error(accessDenied())).toBe(false);
      expect(isTransientS3Error('boom')).toBe(false);
    });
  });
});
