/**
 * Order Routes
 * Placement, lookup, fulfilment and payment status, cancellation
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import {
  can,
  canAccessOrder,
  isFulfillingVendor,
} from '@/lib/authorization.js';
import type { OrderService } from '@/services/order.service.js';
import type { ActorContext, Capability, Order } from '@/types/index.js';
import {
  ORDER_PAYMENT_METHODS,
  ORDER_PAYMENT_STATUSES,
  ORDER_STATUSES,
} from '@/types/index.js';

import type { Parsed } from '../utils/request.js';
import { moneyField, parseBody, parseIfMatch } from '../utils/request.js';
import {
  apiError,
  errorResponse,
  getActor,
  getRequestId,
  successResponse,
} from '../utils/response.js';
import {
  formatOrder,
  formatOrderItem,
  formatOrderWithItems,
} from '../utils/serialize.js';

const MAX_ITEMS = 100;
const MAX_QUANTITY = 10_000;

const placeOrderSchema = z.object({
  vendorId: z.string().min(1),
  items: z
    .array(
      z.object({
        productId: z.string().min(1),
        quantity: z.number().int().positive().max(MAX_QUANTITY),
        itemNotes: z.string().max(500).optional(),
      })
    )
    .min(1, 'Order must contain at least one item')
    .max(MAX_ITEMS),
  deliveryAddressId: z.string().min(1),
  billingAddressId: z.string().min(1).optional(),
  organizationId: z.string().min(1).optional(),
  taxAmount: moneyField(z.string()).optional(),
  discountAmount: moneyField(z.string()).optional(),
  shippingAmount: moneyField(z.string()).optional(),
  orderNotes: z.string().max(2000).optional(),
});

const statusSchema = z.object({
  status: z.enum(ORDER_STATUSES),
  reason: z.string().max(500).optional(),
  trackingNumber: z.string().max(100).optional(),
  carrierName: z.string().max(100).optional(),
});

const paymentStatusSchema = z.object({
  paymentStatus: z.enum(ORDER_PAYMENT_STATUSES),
  transactionId: z.string().max(200).optional(),
  paymentMethod: z.enum(ORDER_PAYMENT_METHODS).optional(),
  paidAmount: moneyField(z.string()).optional(),
});

const cancelSchema = z.object({
  reason: z.string().max(500).optional(),
});

/**
 * Order service interface (minimal for routes)
 */
type OrderServiceDep = Pick<
  OrderService,
  | 'placeOrder'
  | 'getOrder'
  | 'getOrderItems'
  | 'transitionStatus'
  | 'updatePaymentStatus'
  | 'cancelOrder'
>;

interface OrderRoutesDeps {
  orderService: OrderServiceDep;
}

/**
 * Create order routes
 */
export function createOrderRoutes(deps: OrderRoutesDeps): Hono {
  const { orderService } = deps;
  const app = new Hono();

  function denied(c: Context, requestId: string): Response {
    return apiError(
      c,
      'PERMISSION_DENIED',
      'Not allowed to perform this action on the order',
      requestId
    );
  }

  /**
   * Capability check plus the per-order relationship check
   */
  async function loadOrder(
    c: Context,
    capability: Capability,
    relation: (actor: ActorContext, order: Order) => boolean
  ): Promise<Parsed<Order>> {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    if (!can(actor, capability)) {
      return { ok: false, response: denied(c, requestId) };
    }

    const result = await orderService.getOrder(actor, c.req.param('id') ?? '');
    if (!result.success) {
      return { ok: false, response: errorResponse(c, result.error, requestId) };
    }
    if (!relation(actor, result.data)) {
      return { ok: false, response: denied(c, requestId) };
    }
    return { ok: true, data: result.data };
  }

  /**
   * POST /orders
   * Place an order for the calling customer
   */
  app.post('/orders', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    if (!can(actor, 'order:place') || actor.userId === undefined) {
      return denied(c, requestId);
    }

    const body = await parseBody(c, placeOrderSchema, requestId);
    if (!body.ok) {
      return body.response;
    }
    const input = body.data;

    const result = await orderService.placeOrder(actor, {
      customerId: actor.userId,
      vendorId: input.vendorId,
      items: input.items.map((item) => ({
        productId: item.productId,
        quantity: item.quantity,
        ...(item.itemNotes !== undefined ? { itemNotes: item.itemNotes } : {}),
      })),
      deliveryAddressId: input.deliveryAddressId,
      ...(input.billingAddressId !== undefined
        ? { billingAddressId: input.billingAddressId }
        : {}),
      ...(input.organizationId !== undefined
        ? { organizationId: input.organizationId }
        : {}),
      ...(input.taxAmount !== undefined ? { taxAmount: input.taxAmount } : {}),
      ...(input.discountAmount !== undefined
        ? { discountAmount: input.discountAmount }
        : {}),
      ...(input.shippingAmount !== undefined
        ? { shippingAmount: input.shippingAmount }
        : {}),
      ...(input.orderNotes !== undefined ? { orderNotes: input.orderNotes } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatOrderWithItems(result.data), requestId, 201);
  });

  /**
   * GET /orders/:id
   */
  app.get('/orders/:id', async (c) => {
    const loaded = await loadOrder(c, 'order:read', canAccessOrder);
    if (!loaded.ok) {
      return loaded.response;
    }
    return successResponse(c, formatOrder(loaded.data), getRequestId(c));
  });

  /**
   * GET /orders/:id/items
   */
  app.get('/orders/:id/items', async (c) => {
    const requestId = getRequestId(c);
    const loaded = await loadOrder(c, 'order:read', canAccessOrder);
    if (!loaded.ok) {
      return loaded.response;
    }

    const result = await orderService.getOrderItems(getActor(c), loaded.data.id);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data.map(formatOrderItem), requestId);
  });

  /**
   * PUT /orders/:id/status
   * Fulfilment transition by the vendor (or an admin)
   */
  app.put('/orders/:id/status', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const version = parseIfMatch(c, requestId);
    if (!version.ok) {
      return version.response;
    }
    const body = await parseBody(c, statusSchema, requestId);
    if (!body.ok) {
      return body.response;
    }
    const loaded = await loadOrder(c, 'order:fulfil', isFulfillingVendor);
    if (!loaded.ok) {
      return loaded.response;
    }

    const input = body.data;
    const result = await orderService.transitionStatus(actor, loaded.data.id, {
      status: input.status,
      ...(input.reason !== undefined ? { reason: input.reason } : {}),
      ...(input.trackingNumber !== undefined
        ? { trackingNumber: input.trackingNumber }
        : {}),
      ...(input.carrierName !== undefined
        ? { carrierName: input.carrierName }
        : {}),
      ...(version.data !== undefined ? { expectedVersion: version.data } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatOrder(result.data), requestId);
  });

  /**
   * PUT /orders/:id/payment-status
   */
  app.put('/orders/:id/payment-status', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const version = parseIfMatch(c, requestId);
    if (!version.ok) {
      return version.response;
    }
    const body = await parseBody(c, paymentStatusSchema, requestId);
    if (!body.ok) {
      return body.response;
    }
    const loaded = await loadOrder(c, 'order:pay', canAccessOrder);
    if (!loaded.ok) {
      return loaded.response;
    }

    const input = body.data;
    const result = await orderService.updatePaymentStatus(actor, loaded.data.id, {
      paymentStatus: input.paymentStatus,
      ...(input.transactionId !== undefined
        ? { transactionId: input.transactionId }
        : {}),
      ...(input.paymentMethod !== undefined
        ? { paymentMethod: input.paymentMethod }
        : {}),
      ...(input.paidAmount !== undefined ? { paidAmount: input.paidAmount } : {}),
      ...(version.data !== undefined ? { expectedVersion: version.data } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatOrder(result.data), requestId);
  });

  /**
   * POST /orders/:id/cancel
   */
  app.post('/orders/:id/cancel', async (c) => {
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
    const loaded = await loadOrder(c, 'order:cancel', canAccessOrder);
    if (!loaded.ok) {
      return loaded.response;
    }

    const result = await orderService.cancelOrder(actor, loaded.data.id, {
      ...(body.data.reason !== undefined ? { reason: body.data.reason } : {}),
      ...(version.data !== undefined ? { expectedVersion: version.data } : {}),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatOrder(result.data), requestId);
  });

  return app;
}
