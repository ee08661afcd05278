/**
 * Rate Limiting Middleware
 * Per-principal request limits on the transfer and grant routes
 */

import type { Ratelimit } from '@upstash/ratelimit';
import type { Context, Next } from 'hono';

import type { ActorContext } from '@/types/index.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to user, then IP)
   */
  getIdentifier?: (c: Context) => string;
}

/**
 * Outcome of one limit check; reset is seconds until the window frees up
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

/**
 * Priority: userId > IP > 'unknown'
 */
function defaultGetIdentifier(c: Context): string {
  const actor: ActorContext | undefined = c.get('actor');
  if (actor?.userId) {
    return `user:${actor.userId}`;
  }
  const ip =
    c.req.header('x-forwarded-for') || c.req.header('x-real-ip') || 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: Pick<RateLimitConfig, 'getIdentifier'> = {}
) {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;
  // Mounted on overlapping paths; count each request once
  const counted = new WeakSet<Request>();

  return async function rateLimitMiddleware(c: Context, next: Next) {
    if (counted.has(c.req.raw)) {
      return next();
    }
    counted.add(c.req.raw);

    const identifier = getIdentifier(c);

    const result = await rateLimiter.limit(identifier);

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      c.header('Retry-After', result.reset.toString());
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: result.reset,
              limit: result.limit,
            },
            requestId: c.get('requestId') || 'unknown',
          },
        },
        429
      );
    }

    return next();
  };
}

/**
 * Rate limiter backed by @upstash/ratelimit
 *
 * Usage:
 * ```typescript
 * const ratelimit = new Ratelimit({
 *   redis: getRedis(config.redis),
 *   limiter: Ratelimit.slidingWindow(600, '60 s'),
 *   prefix: 'ratelimit:transfers',
 * });
 *
 * const rateLimiter = createUpstashRateLimiter(ratelimit);
 * ```
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Pick<Ratelimit, 'limit'>,
  now: () => number = Date.now
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        // Upstash reports the reset as a unix timestamp in milliseconds
        reset: Math.max(0, Math.ceil((result.reset - now()) / 1000)),
      };
    },
  };
}

export type RateLimitWindows = Map<string, { count: number; resetAt: number }>;

/**
 * Fixed-window limiter for a single process or tests
 * Expired windows of every identifier are dropped on each check
 */
export function createInMemoryRateLimiter(
  config: Pick<RateLimitConfig, 'limit' | 'window'>,
  now: () => number = Date.now,
  store: RateLimitWindows = new Map()
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const current = now();

      for (const [key, { resetAt }] of store) {
        if (resetAt <= current) {
          store.delete(key);
        }
      }

      let entry = store.get(identifier);
      if (!entry) {
        entry = { count: 0, resetAt: current + config.window * 1000 };
        store.set(identifier, entry);
      }

      entry.count++;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: Math.ceil((entry.resetAt - current) / 1000),
      };
    },
  };
}
