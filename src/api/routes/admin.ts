/**
 * Admin Routes
 * Subscription status overrides, the expiry sweep, audit history
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { AuditService } from '@/services/audit.service.js';
import type { SubscriptionService } from '@/services/subscription.service.js';
import { SUBSCRIPTION_STATUSES } from '@/types/index.js';

import { parseBody } from '../utils/request.js';
import {
  errorResponse,
  getActor,
  getRequestId,
  successResponse,
} from '../utils/response.js';
import { formatSubscription } from '../utils/serialize.js';

const updateStatusSchema = z.object({
  status: z.enum(SUBSCRIPTION_STATUSES),
  reason: z.string().max(500).optional(),
});

/**
 * Admin service dependencies
 */
interface AdminRoutesDeps {
  subscriptionService: Pick<
    SubscriptionService,
    'updateStatus' | 'expireLapsedSubscriptions'
  >;
  auditService: Pick<AuditService, 'getResourceHistory'>;
}

/**
 * Create admin routes
 * Mounted behind the auth and admin middleware
 */
export function createAdminRoutes(deps: AdminRoutesDeps): Hono {
  const { subscriptionService, auditService } = deps;
  const app = new Hono();

  /**
   * PUT /admin/subscriptions/:id/status
   */
  app.put('/admin/subscriptions/:id/status', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const body = await parseBody(c, updateStatusSchema, requestId);
    if (!body.ok) {
      return body.response;
    }

    const result = await subscriptionService.updateStatus(actor, {
      subscriptionId: c.req.param('id'),
      status: body.data.status,
      ...(body.data.reason !== undefined ? { reason: body.data.reason } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatSubscription(result.data), requestId);
  });

  /**
   * POST /admin/subscriptions/expire
   * Run the lapsed-subscription sweep now
   */
  app.post('/admin/subscriptions/expire', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await subscriptionService.expireLapsedSubscriptions(actor);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /admin/audit/:resourceType/:resourceId
   */
  app.get('/admin/audit/:resourceType/:resourceId', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await auditService.getResourceHistory(
      actor,
      c.req.param('resourceType'),
      c.req.param('resourceId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const logs = result.data.map((log) => ({
      ...log,
      timestamp: log.timestamp.toISOString(),
    }));
    return successResponse(c, logs, requestId);
  });

  return app;
}
