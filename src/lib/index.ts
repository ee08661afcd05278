/**
 * Shared Library Exports
 */

export { createSupabaseAdmin } from './supabase.js';
export { getRedis } from './redis.js';
export { createS3Client } from './s3.js';
export type { TransferLock, LockHandle } from './lock.js';
export {
  createRedisTransferLock,
  createMemoryTransferLock,
  lockKey,
} from './lock.js';
export type { Sleep } from './retry.js';
export { withRetry, backoffDelay, defaultSleep } from './retry.js';
