/**
 * API test helpers
 */

import { AuthError, type User, type UserResponse } from '@supabase/supabase-js';
import type { MiddlewareHandler } from 'hono';
import { vi } from 'vitest';
import { z } from 'zod';

import type { AuthMiddlewareDeps } from '@/api/middleware/auth.js';
import type { ActorContext } from '@/types/index.js';

/**
 * Stand-in for the auth middleware: attaches a fixed actor
 */
export function actorMiddleware(actor: ActorContext): MiddlewareHandler {
  return async (c, next) => {
    c.set('actor', actor);
    c.set('requestId', actor.requestId);
    await next();
  };
}

const envelopeSchema = z.object({
  data: z.unknown(),
  meta: z.object({ requestId: z.string() }),
});

/**
 * Parse a success envelope and validate its data
 */
export async function readData<T>(
  res: Response,
  schema: z.ZodType<T>
): Promise<T> {
  const body = envelopeSchema.parse(await res.json());
  return schema.parse(body.data);
}

export const transferBodySchema = z.object({
  id: z.string(),
  targetKey: z.string(),
  totalSize: z.number(),
  partSize: z.number(),
  partCount: z.number(),
  status: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
});

/**
 * Supabase auth stand-in resolving bearer tokens from a fixed table
 */
export function createFakeSupabaseAuth(
  usersByToken: Record<string, User>
): AuthMiddlewareDeps['supabaseClient'] {
  return {
    auth: {
      getUser: vi.fn(async (jwt?: string): Promise<UserResponse> => {
        const user = jwt !== undefined ? usersByToken[jwt] : undefined;
        if (user === undefined) {
          return {
            data: { user: null },
            error: new AuthError('invalid JWT', 401),
          };
        }
        return { data: { user }, error: null };
      }),
    },
  };
}

export function createSupabaseUser(id: string, role?: 'admin'): User {
  return {
    id,
    aud: 'authenticated',
    app_metadata: role !== undefined ? { role } : {},
    user_metadata: {},
    created_at: '2026-01-01T00:00:00.000Z',
  };
}
