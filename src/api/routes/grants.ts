/**
 * Grant Routes
 * Signed URLs for direct reads and writes against the object store
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { GrantService } from '@/services/index.js';
import type { AccessGrant, ActorContext } from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

interface GrantRoutesDeps {
  grantService: GrantService;
}

function getActor(c: Context): ActorContext {
  return c.get('actor');
}

function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

function formatGrant(grant: AccessGrant) {
  return {
    key: grant.key,
    operation: grant.operation,
    url: grant.url,
    expiresAt: grant.expiresAt.toISOString(),
  };
}

const grantSchema = z.object({
  key: z.string({ required_error: 'key is required' }),
  expiresIn: z.number({ required_error: 'expiresIn is required' }),
});

/**
 * Create grant routes
 */
export function createGrantRoutes(deps: GrantRoutesDeps): Hono {
  const { grantService } = deps;
  const app = new Hono();

  async function parseGrantRequest(c: Context) {
    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }
    return grantSchema.safeParse(rawBody);
  }

  /**
   * POST /grants/download
   * Signed GET for an existing object
   */
  app.post('/grants/download', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = await parseGrantRequest(c);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid grant request',
        },
        requestId
      );
    }

    const { key, expiresIn } = validation.data;
    const result = await grantService.issueDownloadUrl(actor, key, expiresIn);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatGrant(result.data), requestId, 201);
  });

  /**
   * POST /grants/upload
   * Signed PUT for a single-request upload
   */
  app.post('/grants/upload', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = await parseGrantRequest(c);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid grant request',
        },
        requestId
      );
    }

    const { key, expiresIn } = validation.data;
    const result = await grantService.issueUploadUrl(actor, key, expiresIn);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatGrant(result.data), requestId, 201);
  });

  return app;
}
