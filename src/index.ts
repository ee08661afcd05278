/**
 * Vaultline Application Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Ratelimit } from '@upstash/ratelimit';

import { createApp } from './api/app.js';
import {
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
} from './api/middleware/rateLimit.js';
import { loadConfig, type AppConfig } from './config.js';
import {
  createMemoryTransferLock,
  createRedisTransferLock,
  createS3Client,
  createSupabaseAdmin,
  getRedis,
} from './lib/index.js';
import {
  createAuditService,
  createAuditServiceDb,
  createGrantService,
  createS3ObjectStorage,
  createTransferService,
  createTransferServiceDb,
} from './services/index.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const config = readConfig();

// Metadata store and identity
const supabase = createSupabaseAdmin(config.supabase);

// Object store
const storage = createS3ObjectStorage(
  createS3Client(config.s3),
  config.s3.bucket
);

// Completion lock and rate limits: Redis when configured, otherwise this process only
const redis = config.redis !== null ? getRedis(config.redis) : null;

const lock =
  redis !== null ? createRedisTransferLock(redis) : createMemoryTransferLock();

const rateLimiter =
  redis !== null
    ? createUpstashRateLimiter(
        new Ratelimit({
          redis,
          limiter: Ratelimit.slidingWindow(
            config.rateLimit.limit,
            `${config.rateLimit.windowSeconds} s`
          ),
          prefix: 'ratelimit:vaultline',
        })
      )
    : createInMemoryRateLimiter({
        limit: config.rateLimit.limit,
        window: config.rateLimit.windowSeconds,
      });

if (redis === null) {
  console.warn(
    'UPSTASH_REDIS_URL not set; completion lock and rate limits are local to this process'
  );
}

// Wire all services
const auditService = createAuditService({ db: createAuditServiceDb(supabase) });

const transferService = createTransferService({
  db: createTransferServiceDb(supabase),
  storage,
  auditService,
  lock,
  config: config.transfer,
  retry: config.retry,
});

const grantService = createGrantService({
  storage,
  auditService,
  config: config.grants,
});

// Create the API application
const app = createApp({
  supabaseClient: supabase,
  services: { transferService, grantService },
  allowedOrigins: config.allowedOrigins,
  rateLimiter,
  maxPartSize: config.transfer.maxPartSize,
});

console.error(`Server starting on port ${config.port}`);
console.error(`Object store bucket: ${config.s3.bucket}`);

serve({
  fetch: app.fetch,
  port: config.port,
});

export { app };
