/**
 * S3 Client Configuration
 * Works against AWS S3 and S3-compatible stores (MinIO, R2) via endpoint
 * and path-style addressing
 */

import { S3Client } from '@aws-sdk/client-s3';

import type { S3Config } from '@/config.js';

export function createS3Client(config: S3Config): S3Client {
  return new S3Client({
    region: config.region,
    ...(config.endpoint !== undefined && { endpoint: config.endpoint }),
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    forcePathStyle: config.forcePathStyle,
    // withRetry owns retries
    maxAttempts: 1,
  });
}
