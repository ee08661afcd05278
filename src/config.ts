/**
 * Application Configuration
 *
 * Environment is parsed once at start-up into AppConfig and handed to each
 * component explicitly. Services never read process.env themselves.
 */

import { z } from 'zod';

const GIB = 1024 * 1024 * 1024;

/**
 * Limits applied by the Transfer Coordinator
 */
export interface TransferConfig {
  maxPartSize: number;
  maxPartCount: number;
  staleTransferTtlSeconds: number;
  completeSnapshotAttempts: number;
  lockTtlSeconds: number;
}

/**
 * Limits applied by the Signed-URL Issuer
 */
export interface GrantConfig {
  maxExpirySeconds: number;
}

/**
 * Bounded exponential backoff for idempotent store calls
 */
export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface S3Config {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
}

/**
 * Per-principal request budget on the transfer and grant routes
 */
export interface RateLimitSettings {
  limit: number;
  windowSeconds: number;
}

export interface AppConfig {
  port: number;
  rateLimit: RateLimitSettings;
  transfer: TransferConfig;
  grants: GrantConfig;
  retry: RetryPolicy;
  s3: S3Config;
  supabase: { url: string; serviceKey: string };
  redis: { url: string; token: string } | null;
  allowedOrigins: string[];
}

export const DEFAULT_TRANSFER_CONFIG: TransferConfig = {
  maxPartSize: 5 * GIB,
  maxPartCount: 10_000,
  staleTransferTtlSeconds: 24 * 60 * 60,
  completeSnapshotAttempts: 3,
  lockTtlSeconds: 300,
};

export const DEFAULT_GRANT_CONFIG: GrantConfig = {
  maxExpirySeconds: 7 * 24 * 60 * 60,
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
};

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(3000),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),

  UPSTASH_REDIS_URL: z.string().url().optional(),
  UPSTASH_REDIS_TOKEN: z.string().min(1).optional(),

  S3_BUCKET: z.string().min(1),
  S3_REGION: z.string().default('us-east-1'),
  S3_ENDPOINT: z.string().url().optional(),
  S3_ACCESS_KEY_ID: z.string().min(1),
  S3_SECRET_ACCESS_KEY: z.string().min(1),
  S3_FORCE_PATH_STYLE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  TRANSFER_MAX_PART_SIZE: intFromEnv(DEFAULT_TRANSFER_CONFIG.maxPartSize),
  TRANSFER_MAX_PART_COUNT: intFromEnv(DEFAULT_TRANSFER_CONFIG.maxPartCount),
  TRANSFER_STALE_TTL_SECONDS: intFromEnv(
    DEFAULT_TRANSFER_CONFIG.staleTransferTtlSeconds
  ),
  TRANSFER_LOCK_TTL_SECONDS: intFromEnv(DEFAULT_TRANSFER_CONFIG.lockTtlSeconds),
  GRANT_MAX_EXPIRY_SECONDS: intFromEnv(DEFAULT_GRANT_CONFIG.maxExpirySeconds),

  RATE_LIMIT_REQUESTS: intFromEnv(600),
  RATE_LIMIT_WINDOW_SECONDS: intFromEnv(60),

  RETRY_MAX_RETRIES: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RETRY_POLICY.maxRetries),
  RETRY_BASE_DELAY_MS: intFromEnv(DEFAULT_RETRY_POLICY.baseDelayMs),
  RETRY_MAX_DELAY_MS: intFromEnv(DEFAULT_RETRY_POLICY.maxDelayMs),
});

/**
 * Parse configuration from an environment map
 * Throws with every invalid variable listed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;

  const s3: S3Config = {
    bucket: e.S3_BUCKET,
    region: e.S3_REGION,
    accessKeyId: e.S3_ACCESS_KEY_ID,
    secretAccessKey: e.S3_SECRET_ACCESS_KEY,
    forcePathStyle: e.S3_FORCE_PATH_STYLE,
  };
  if (e.S3_ENDPOINT !== undefined) {
    s3.endpoint = e.S3_ENDPOINT;
  }

  const redis =
    e.UPSTASH_REDIS_URL !== undefined && e.UPSTASH_REDIS_TOKEN !== undefined
      ? { url: e.UPSTASH_REDIS_URL, token: e.UPSTASH_REDIS_TOKEN }
      : null;

  return {
    port: e.PORT,
    allowedOrigins: e.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    transfer: {
      ...DEFAULT_TRANSFER_CONFIG,
      maxPartSize: e.TRANSFER_MAX_PART_SIZE,
      maxPartCount: e.TRANSFER_MAX_PART_COUNT,
      staleTransferTtlSeconds: e.TRANSFER_STALE_TTL_SECONDS,
      lockTtlSeconds: e.TRANSFER_LOCK_TTL_SECONDS,
    },
    grants: { maxExpirySeconds: e.GRANT_MAX_EXPIRY_SECONDS },
    rateLimit: {
      limit: e.RATE_LIMIT_REQUESTS,
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
    },
    retry: {
      maxRetries: e.RETRY_MAX_RETRIES,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    s3,
    supabase: { url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_KEY },
    redis,
  };
}
