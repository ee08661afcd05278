/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { createAdminMiddleware } from './middleware/admin.js';
import {
  createAuthMiddleware,
  createRequestIdMiddleware,
  type AuthMiddlewareDeps,
} from './middleware/auth.js';
import {
  createRateLimitMiddleware,
  type RateLimiter,
} from './middleware/rateLimit.js';
import { createAdminRoutes } from './routes/admin.js';
import { createGrantRoutes } from './routes/grants.js';
import { createHealthRoutes } from './routes/health.js';
import { createTransferRoutes } from './routes/transfers.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  supabaseClient: AuthMiddlewareDeps['supabaseClient'];
  services: ApiServices;
  allowedOrigins?: string[];
  rateLimiter?: RateLimiter;
  maxPartSize?: number;
  logRequests?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { supabaseClient, services, allowedOrigins, rateLimiter } = config;
  const app = new Hono();

  // Global middleware
  if (config.logRequests ?? true) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
      exposeHeaders: ['Content-Length'],
    })
  );
  app.use('*', createRequestIdMiddleware());

  // Public routes (no auth)
  app.route('/api/v1', createHealthRoutes());

  const authMiddleware = createAuthMiddleware({ supabaseClient });
  const adminMiddleware = createAdminMiddleware();
  const rateLimitMiddleware = rateLimiter
    ? createRateLimitMiddleware(rateLimiter)
    : null;

  // Transfer routes
  app.use('/api/v1/transfers/*', authMiddleware);
  app.use('/api/v1/transfers', authMiddleware);
  if (rateLimitMiddleware) {
    app.use('/api/v1/transfers/*', rateLimitMiddleware);
    app.use('/api/v1/transfers', rateLimitMiddleware);
  }
  app.route(
    '/api/v1',
    createTransferRoutes({
      transferService: services.transferService,
      maxPartSize: config.maxPartSize,
    })
  );

  // Grant routes
  app.use('/api/v1/grants/*', authMiddleware);
  if (rateLimitMiddleware) {
    app.use('/api/v1/grants/*', rateLimitMiddleware);
  }
  app.route(
    '/api/v1',
    createGrantRoutes({ grantService: services.grantService })
  );

  // Admin routes (require auth + admin)
  app.use('/api/v1/admin/*', authMiddleware);
  app.use('/api/v1/admin/*', adminMiddleware);
  app.route(
    '/api/v1',
    createAdminRoutes({ transferService: services.transferService })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') || 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') || 'unknown',
        },
      },
      500
    );
  });

  return app;
}
