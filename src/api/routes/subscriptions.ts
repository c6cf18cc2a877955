/**
 * Subscription Routes
 * Plan catalogue and the calling vendor's own subscription
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import { can } from '@/lib/authorization.js';
import type { SubscriptionService } from '@/services/subscription.service.js';
import type { Capability, SubscriptionOverview } from '@/types/index.js';
import { BILLING_CYCLES } from '@/types/index.js';

import type { Parsed } from '../utils/request.js';
import { parseBody, parseIfMatch } from '../utils/request.js';
import {
  apiError,
  errorResponse,
  getActor,
  getRequestId,
  successResponse,
} from '../utils/response.js';
import {
  formatPlan,
  formatSubscription,
  formatSubscriptionOverview,
  formatUsageRecord,
  formatUsageSummary,
} from '../utils/serialize.js';

const subscribeSchema = z.object({
  billingCycle: z.enum(BILLING_CYCLES).optional(),
  startTrial: z.boolean().default(false),
});

const cancelSchema = z.object({
  reason: z.string().max(500).optional(),
  immediate: z.boolean().default(false),
});

const changePlanSchema = z.object({
  immediate: z.boolean().default(false),
});

const trackUsageSchema = z.object({
  featureName: z.string().min(1).max(100),
  increment: z.number().int().positive().default(1),
  metadata: z.record(z.unknown()).optional(),
});

/**
 * Subscription service interface (minimal for routes)
 */
type SubscriptionServiceDep = Pick<
  SubscriptionService,
  | 'listPlans'
  | 'subscribe'
  | 'getVendorSubscription'
  | 'cancel'
  | 'reactivate'
  | 'changePlan'
  | 'trackUsage'
  | 'getUsageSummary'
>;

interface SubscriptionRoutesDeps {
  subscriptionService: SubscriptionServiceDep;
}

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  function requireVendor(
    c: Context,
    capability: Capability
  ): Parsed<string> {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    if (!can(actor, capability)) {
      return {
        ok: false,
        response: apiError(
          c,
          'PERMISSION_DENIED',
          'Not allowed to manage subscriptions',
          requestId
        ),
      };
    }
    if (actor.vendorId === undefined) {
      return {
        ok: false,
        response: apiError(
          c,
          'PERMISSION_DENIED',
          'Caller is not linked to a vendor',
          requestId
        ),
      };
    }
    return { ok: true, data: actor.vendorId };
  }

  /**
   * The calling vendor's current subscription
   */
  async function loadOwn(
    c: Context,
    capability: Capability
  ): Promise<Parsed<SubscriptionOverview>> {
    const vendor = requireVendor(c, capability);
    if (!vendor.ok) {
      return vendor;
    }
    const result = await subscriptionService.getVendorSubscription(
      getActor(c),
      vendor.data
    );
    if (!result.success) {
      return {
        ok: false,
        response: errorResponse(c, result.error, getRequestId(c)),
      };
    }
    return { ok: true, data: result.data };
  }

  /**
   * GET /subscriptions/plans
   * Public plan catalogue (active plans only)
   */
  app.get('/subscriptions/plans', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await subscriptionService.listPlans(actor);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const plans = result.data.filter((plan) => plan.isActive).map(formatPlan);
    return successResponse(c, plans, requestId);
  });

  /**
   * POST /subscriptions/subscribe/:planId
   */
  app.post('/subscriptions/subscribe/:planId', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const vendor = requireVendor(c, 'subscription:manage');
    if (!vendor.ok) {
      return vendor.response;
    }
    const body = await parseBody(c, subscribeSchema, requestId);
    if (!body.ok) {
      return body.response;
    }

    const result = await subscriptionService.subscribe(actor, {
      vendorId: vendor.data,
      planId: c.req.param('planId'),
      startTrial: body.data.startTrial,
      ...(body.data.billingCycle !== undefined
        ? { billingCycle: body.data.billingCycle }
        : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatSubscription(result.data), requestId, 201);
  });

  /**
   * GET /subscriptions/me
   */
  app.get('/subscriptions/me', async (c) => {
    const own = await loadOwn(c, 'subscription:read');
    if (!own.ok) {
      return own.response;
    }
    return successResponse(
      c,
      formatSubscriptionOverview(own.data),
      getRequestId(c)
    );
  });

  /**
   * PUT /subscriptions/me/cancel
   */
  app.put('/subscriptions/me/cancel', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const version = parseIfMatch(c, requestId);
    if (!version.ok) {
      return version.response;
    }
    const body = await parseBody(c, cancelSchema, requestId);
    if (!body.ok) {
      return body.response;
    }
    const own = await loadOwn(c, 'subscription:manage');
    if (!own.ok) {
      return own.response;
    }

    const result = await subscriptionService.cancel(actor, {
      subscriptionId: own.data.subscription.id,
      immediate: body.data.immediate,
      ...(body.data.reason !== undefined ? { reason: body.data.reason } : {}),
      ...(version.data !== undefined ? { expectedVersion: version.data } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatSubscription(result.data), requestId);
  });

  /**
   * PUT /subscriptions/me/reactivate
   */
  app.put('/subscriptions/me/reactivate', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const version = parseIfMatch(c, requestId);
    if (!version.ok) {
      return version.response;
    }
    const own = await loadOwn(c, 'subscription:manage');
    if (!own.ok) {
      return own.response;
    }

    const result = await subscriptionService.reactivate(actor, {
      subscriptionId: own.data.subscription.id,
      ...(version.data !== undefined ? { expectedVersion: version.data } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatSubscription(result.data), requestId);
  });

  /**
   * PUT /subscriptions/me/change-plan/:planId
   */
  app.put('/subscriptions/me/change-plan/:planId', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const body = await parseBody(c, changePlanSchema, requestId);
    if (!body.ok) {
      return body.response;
    }
    const own = await loadOwn(c, 'subscription:manage');
    if (!own.ok) {
      return own.response;
    }

    const result = await subscriptionService.changePlan(actor, {
      subscriptionId: own.data.subscription.id,
      newPlanId: c.req.param('planId'),
      immediate: body.data.immediate,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatSubscription(result.data), requestId);
  });

  /**
   * POST /subscriptions/me/usage
   * Meter a feature against the plan limit
   */
  app.post('/subscriptions/me/usage', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const body = await parseBody(c, trackUsageSchema, requestId);
    if (!body.ok) {
      return body.response;
    }
    const own = await loadOwn(c, 'usage:track');
    if (!own.ok) {
      return own.response;
    }

    const result = await subscriptionService.trackUsage(actor, {
      subscriptionId: own.data.subscription.id,
      featureName: body.data.featureName,
      increment: body.data.increment,
      ...(body.data.metadata !== undefined
        ? { metadata: body.data.metadata }
        : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatUsageRecord(result.data), requestId);
  });

  /**
   * GET /subscriptions/me/usage
   */
  app.get('/subscriptions/me/usage', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const own = await loadOwn(c, 'subscription:read');
    if (!own.ok) {
      return own.response;
    }

    const result = await subscriptionService.getUsageSummary(
      actor,
      own.data.subscription.id
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatUsageSummary(result.data), requestId);
  });

  return app;
}
