/**
 * Admin Middleware
 * Rejects non-admin actors before admin routes run
 */

import type { Context, Next } from 'hono';

import { isPrivilegedActor } from '@/types/index.js';

/**
 * Admin middleware - runs after auth, so the actor is set
 */
export function createAdminMiddleware() {
  return async function adminMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const actor = c.get('actor');
    const requestId = c.get('requestId') || actor.requestId;

    if (!isPrivilegedActor(actor)) {
      return c.json(
        {
          error: {
            code: 'PERMISSION_DENIED',
            message: 'Admin access required',
            requestId,
          },
        },
        403
      );
    }

    await next();
  };
}
