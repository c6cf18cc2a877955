/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';

import { T0 } from '../../fixtures/index.js';
import { createManualClock } from '../../helpers/in-memory-db.js';

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should return 200 with status, service and version', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes({ clock: createManualClock(T0) }));

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toEqual({
        status: 'ok',
        service: 'marketplace-core',
        timestamp: '2025-01-01T00:00:00.000Z',
        version: 'v1',
      });
    });
  });
});
