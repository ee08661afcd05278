/**
 * Admin Routes
 * Maintenance endpoints; auth and admin middleware run first
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { TransferService } from '@/services/index.js';
import type { ActorContext } from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

interface AdminRoutesDeps {
  transferService: TransferService;
}

function getActor(c: Context): ActorContext {
  return c.get('actor');
}

const sweepSchema = z.object({
  olderThanSeconds: z.number().optional(),
});

/**
 * Create admin routes
 */
export function createAdminRoutes(deps: AdminRoutesDeps): Hono {
  const { transferService } = deps;
  const app = new Hono();

  /**
   * POST /admin/transfers/sweep
   * Abort open transfers idle for longer than olderThanSeconds
   * (defaults to the configured stale TTL)
   */
  app.post('/admin/transfers/sweep', async (c) => {
    const actor = getActor(c);
    const requestId = c.get('requestId') || actor.requestId;

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }

    const validation = sweepSchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid sweep request',
        },
        requestId
      );
    }

    const { olderThanSeconds } = validation.data;
    const result = await transferService.sweepStale(
      actor,
      olderThanSeconds !== undefined ? { olderThanSeconds } : {}
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
