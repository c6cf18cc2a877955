/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { Clock } from '@/lib/clock.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { clock: Clock }): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'marketplace-core',
      timestamp: deps.clock.now().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
