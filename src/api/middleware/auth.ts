/**
 * Auth Middleware
 * Constructs ActorContext from Supabase JWT
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext } from '@/types/index.js';

/**
 * Auth middleware dependencies
 */
export interface AuthMiddlewareDeps {
  supabaseClient: { auth: Pick<SupabaseClient['auth'], 'getUser'> };
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function unauthorized(c: Context, message: string, requestId: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Assign a request ID to every request, authenticated or not
 */
export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    c.set('requestId', generateRequestId());
    await next();
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies with Supabase, constructs ActorContext
 *
 * Users whose app_metadata.role is "admin" act as admin actors and are
 * not confined to their own key prefix.
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = c.get('requestId') || generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
      return unauthorized(c, 'Missing or invalid authorization header', requestId);
    }

    try {
      // 2. Verify JWT with Supabase
      const {
        data: { user },
        error,
      } = await supabaseClient.auth.getUser(token);

      if (error || !user) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }

      const isAdmin = user.app_metadata['role'] === 'admin';

      // 3. Construct ActorContext
      const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
      const userAgent = c.req.header('user-agent');

      const actor: ActorContext = {
        type: isAdmin ? 'admin' : 'user',
        userId: user.id,
        requestId,
        permissions: isAdmin ? ['admin:transfers'] : [],
        ...(ip !== undefined && { ip }),
        ...(userAgent !== undefined && { userAgent }),
      };

      // 4. Attach to context
      c.set('actor', actor);
      c.set('requestId', requestId);

      return next();
    } catch (err) {
      console.error('Auth middleware error:', err);
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }
  };
}
