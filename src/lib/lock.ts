/**
 * Per-transfer Lock
 *
 * Serialises complete() for a single transfer. Two implementations:
 * Upstash Redis (SET NX EX, compare-and-delete release) for multi-process
 * deployments, and an in-process map for a single process or tests.
 */

import type { Redis } from '@upstash/redis';
import { nanoid } from 'nanoid';

/**
 * A held lock; release is safe to call more than once
 */
export interface LockHandle {
  release: () => Promise<void>;
}

export interface TransferLock {
  /**
   * Try to take the lock. Resolves null when someone else holds it.
   */
  acquire: (key: string, ttlSeconds: number) => Promise<LockHandle | null>;
}

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export function lockKey(transferId: string): string {
  return `lock:transfer:${transferId}`;
}

/**
 * Redis-backed lock
 */
export function createRedisTransferLock(
  redis: Pick<Redis, 'set' | 'eval'>
): TransferLock {
  return {
    async acquire(key: string, ttlSeconds: number) {
      const token = nanoid();
      const acquired = await redis.set(key, token, { nx: true, ex: ttlSeconds });
      if (acquired === null) {
        return null;
      }

      let released = false;
      return {
        async release() {
          if (released) return;
          released = true;
          await redis.eval(RELEASE_SCRIPT, [key], [token]);
        },
      };
    },
  };
}

/**
 * In-process lock; entries expire after ttlSeconds like the Redis one
 */
export function createMemoryTransferLock(
  now: () => number = Date.now
): TransferLock {
  const held = new Map<string, { token: string; expiresAt: number }>();

  return {
    async acquire(key: string, ttlSeconds: number) {
      const current = held.get(key);
      if (current !== undefined && current.expiresAt > now()) {
        return null;
      }

      const token = nanoid();
      held.set(key, { token, expiresAt: now() + ttlSeconds * 1000 });

      return {
        async release() {
          if (held.get(key)?.token === token) {
            held.delete(key);
          }
        },
      };
    },
  };
}
