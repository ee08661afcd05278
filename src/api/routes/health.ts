/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { now?: () => Date } = {}): Hono {
  const now = deps.now ?? (() => new Date());
  const app = new Hono();

  /**
   * GET /health
   * Liveness only; does not probe the stores
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'vaultline-transfer-api',
      timestamp: now().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
