/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import { logger as defaultLogger } from '@/lib/logger.js';
import type { Logger } from '@/lib/logger.js';

import { createAdminMiddleware } from './middleware/admin.js';
import { createPublicMiddleware } from './middleware/auth.js';
import { createAdminRoutes } from './routes/admin.js';
import { createBillingRoutes } from './routes/billing.js';
import { createHealthRoutes } from './routes/health.js';
import { createOrderRoutes } from './routes/orders.js';
import { createSubscriptionRoutes } from './routes/subscriptions.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  /**
   * Sets `actor` and `requestId` or answers 401/403
   */
  authMiddleware: MiddlewareHandler;
  services: ApiServices;
  allowedOrigins?: string[];
  logger?: Logger;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { authMiddleware, services, allowedOrigins } = config;
  const log = (config.logger ?? defaultLogger).child({ component: 'http' });
  const app = new Hono();

  // Global middleware
  app.use(
    '*',
    requestLogger((message, ...rest) => {
      log.info(rest.length > 0 ? `${message} ${rest.join(' ')}` : message);
    })
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.use('/api/v1/subscriptions/plans', publicMiddleware);
  app.route('/api/v1', createHealthRoutes({ clock: services.clock }));

  // Order routes
  app.use('/api/v1/orders/*', authMiddleware);
  app.use('/api/v1/orders', authMiddleware);
  app.route(
    '/api/v1',
    createOrderRoutes({ orderService: services.orderService })
  );

  // Subscription routes (plans are public)
  app.use('/api/v1/subscriptions/me/*', authMiddleware);
  app.use('/api/v1/subscriptions/me', authMiddleware);
  app.use('/api/v1/subscriptions/subscribe/*', authMiddleware);
  app.route(
    '/api/v1',
    createSubscriptionRoutes({
      subscriptionService: services.subscriptionService,
    })
  );

  // Billing routes
  app.use('/api/v1/billing/*', authMiddleware);
  app.route(
    '/api/v1',
    createBillingRoutes({ subscriptionService: services.subscriptionService })
  );

  // Admin routes (require auth + admin capability)
  const adminMiddleware = createAdminMiddleware();
  app.use('/api/v1/admin/*', authMiddleware);
  app.use('/api/v1/admin/*', adminMiddleware);
  app.route(
    '/api/v1',
    createAdminRoutes({
      subscriptionService: services.subscriptionService,
      auditService: services.auditService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    const requestId: string | undefined = c.get('requestId');

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: requestId ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId: string | undefined = c.get('requestId');
    log.error(
      { err, requestId, method: c.req.method, path: c.req.path },
      'Unhandled error'
    );

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: requestId ?? 'unknown',
        },
      },
      500
    );
  });

  return app;
}
