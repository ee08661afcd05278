/**
 * Transfer lock tests
 */

import { describe, it, expect, vi } from 'vitest';

import {
  createMemoryTransferLock,
  createRedisTransferLock,
  lockKey,
} from '@/lib/lock.js';

describe('transfer lock', () => {
  it('should namespace keys by transfer', () => {
    expect(lockKey('tr-1')).toBe('lock:transfer:tr-1');
  });

  describe('createMemoryTransferLock()', () => {
    it('should hand the lock to one holder at a time', async () => {
      const lock = createMemoryTransferLock();

      const first = await lock.acquire('k', 60);
      const second = await lock.acquire('k', 60);

      expect(first).not.toBeNull();
      expect(second).toBeNull();

      await first?.release();
      expect(await lock.acquire('k', 60)).not.toBeNull();
    });

    it('should free the lock once its TTL passes', async () => {
      let now = 1_000;
      const lock = createMemoryTransferLock(() => now);

      await lock.acquire('k', 10);
      now += 10_001;

      expect(await lock.acquire('k', 10)).not.toBeNull();
    });

    it('should not let a stale holder release a newer lock', async () => {
      let now = 1_000;
      const lock = createMemoryTransferLock(() => now);
      const stale = await lock.acquire('k', 10);
      now += 20_000;
      const current = await lock.acquire('k', 10);

      await stale?.release();

      expect(current).not.toBeNull();
      expect(await lock.acquire('k', 10)).toBeNull();
    });
  });

  describe('createRedisTransferLock()', () => {
    function fakeRedis(setResult: 'OK' | null) {
      return {
        set: vi.fn().mockResolvedValue(setResult),
        eval: vi.fn().mockResolvedValue(1),
      };
    }

    it('should take the lock with SET NX EX and release it by token', async () => {
      const redis = fakeRedis('OK');
      const lock = createRedisTransferLock(redis);

      const handle = await lock.acquire('lock:transfer:tr-1', 300);
      await handle?.release();
      await handle?.release();

      expect(redis.set).toHaveBeenCalledWith(
        'lock:transfer:tr-1',
        expect.any(String),
        { nx: true, ex: 300 }
      );
      const token = redis.set.mock.calls[0]?.[1];
      expect(redis.eval).toHaveBeenCalledTimes(1);
      expect(redis.eval).toHaveBeenCalledWith(
        expect.stringContaining('redis.call("del", KEYS[1])'),
        ['lock:transfer:tr-1'],
        [token]
      );
    });

    it('should return null when the key is already held', async () => {
      const lock = createRedisTransferLock(fakeRedis(null));

      expect(await lock.acquire('lock:transfer:tr-1', 300)).toBeNull();
    });
  });
});
