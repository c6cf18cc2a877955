/**
 * Billing Routes
 * Charging the current period, retries, refunds, payment history
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import { can } from '@/lib/authorization.js';
import type { SubscriptionService } from '@/services/subscription.service.js';
import type { BillingOutcome } from '@/types/index.js';
import { PAYMENT_METHODS } from '@/types/index.js';

import { parseBody, parseIfMatch } from '../utils/request.js';
import {
  apiError,
  errorResponse,
  getActor,
  getRequestId,
  successResponse,
} from '../utils/response.js';
import { formatPayment, formatSubscription } from '../utils/serialize.js';

const recordPaymentSchema = z.object({
  paymentMethod: z.enum(PAYMENT_METHODS).default('credit_card'),
});

const refundSchema = z.object({
  reason: z.string().max(500).optional(),
});

/**
 * Subscription service interface (minimal for routes)
 */
type BillingServiceDep = Pick<
  SubscriptionService,
  | 'getVendorSubscription'
  | 'recordPaymentAndRollPeriod'
  | 'retryPayment'
  | 'refundPayment'
  | 'listPayments'
>;

interface BillingRoutesDeps {
  subscriptionService: BillingServiceDep;
}

function formatOutcome(outcome: BillingOutcome) {
  return {
    payment: formatPayment(outcome.payment),
    subscription: formatSubscription(outcome.subscription),
  };
}

/**
 * Create billing routes
 */
export function createBillingRoutes(deps: BillingRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  function denied(c: Context, requestId: string): Response {
    return apiError(
      c,
      'PERMISSION_DENIED',
      'Not allowed to manage billing',
      requestId
    );
  }

  /**
   * POST /billing/payments
   * Charge the calling vendor's current period
   */
  app.post('/billing/payments', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    if (!can(actor, 'billing:pay') || actor.vendorId === undefined) {
      return denied(c, requestId);
    }

    const version = parseIfMatch(c, requestId);
    if (!version.ok) {
      return version.response;
    }
    const body = await parseBody(c, recordPaymentSchema, requestId);
    if (!body.ok) {
      return body.response;
    }

    const own = await subscriptionService.getVendorSubscription(
      actor,
      actor.vendorId
    );
    if (!own.success) {
      return errorResponse(c, own.error, requestId);
    }

    const result = await subscriptionService.recordPaymentAndRollPeriod(actor, {
      subscriptionId: own.data.subscription.id,
      paymentMethod: body.data.paymentMethod,
      ...(version.data !== undefined ? { expectedVersion: version.data } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatOutcome(result.data), requestId, 201);
  });

  /**
   * PUT /billing/payments/:id/retry
   * Retry a failed payment of the calling vendor
   */
  app.put('/billing/payments/:id/retry', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const paymentId = c.req.param('id');

    if (!can(actor, 'billing:pay')) {
      return denied(c, requestId);
    }

    if (actor.type !== 'admin' && actor.type !== 'system') {
      if (actor.vendorId === undefined) {
        return denied(c, requestId);
      }
      const payments = await subscriptionService.listPayments(
        actor,
        actor.vendorId
      );
      if (!payments.success) {
        return errorResponse(c, payments.error, requestId);
      }
      if (!payments.data.some((payment) => payment.id === paymentId)) {
        return apiError(
          c,
          'NOT_FOUND',
          `Payment not found: ${paymentId}`,
          requestId
        );
      }
    }

    const result = await subscriptionService.retryPayment(actor, paymentId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatOutcome(result.data), requestId);
  });

  /**
   * PUT /billing/payments/:id/refund
   */
  app.put('/billing/payments/:id/refund', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    if (!can(actor, 'billing:refund')) {
      return denied(c, requestId);
    }

    const body = await parseBody(c, refundSchema, requestId);
    if (!body.ok) {
      return body.response;
    }

    const result = await subscriptionService.refundPayment(
      actor,
      c.req.param('id'),
      body.data.reason
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatPayment(result.data), requestId);
  });

  /**
   * GET /billing/payments
   * Payment history of the calling vendor, newest first
   */
  app.get('/billing/payments', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    if (!can(actor, 'subscription:read') || actor.vendorId === undefined) {
      return denied(c, requestId);
    }

    const result = await subscriptionService.listPayments(actor, actor.vendorId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data.map(formatPayment), requestId);
  });

  return app;
}
