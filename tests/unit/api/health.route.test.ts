/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { createHealthRoutes } from '@/api/routes/health.js';

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status ok', async () => {
      const app = new Hono();
      app.route(
        '/api/v1',
        createHealthRoutes({ now: () => new Date('2026-03-01T12:00:00.000Z') })
      );

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        service: 'vaultline-transfer-api',
        timestamp: '2026-03-01T12:00:00.000Z',
        version: 'v1',
      });
    });

    it('should default to the current time', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes());

      const before = Date.now();
      const res = await app.request('/api/v1/health');
      const { timestamp } = z
        .object({ timestamp: z.string().datetime() })
        .parse(await res.json());

      expect(Date.parse(timestamp)).toBeGreaterThanOrEqual(before);
    });
  });
});
