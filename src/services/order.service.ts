/**
 * OrderService Implementation
 *
 * SCOPE: Order placement, fulfilment status, payment status, cancellation
 *
 * GUARDRAILS:
 * - Items are snapshotted at placement and never change afterwards
 * - totalAmount is always derived from the lines and adjustments
 * - Status and payment status only move along their transition tables
 * - Every write is a compare-and-set on the loaded version
 *
 * Dependencies: AuditService
 */

import { customAlphabet } from 'nanoid';

import { systemClock } from '@/lib/clock.js';
import type { Clock } from '@/lib/clock.js';
import { createLocalEntityLock } from '@/lib/entity-lock.js';
import type { EntityLock } from '@/lib/entity-lock.js';
import { isValidAmount } from '@/lib/money.js';
import { logger as defaultLogger } from '@/lib/logger.js';
import type { Logger } from '@/lib/logger.js';
import type {
  ActorContext,
  Address,
  AuditEvent,
  CancelOrderParams,
  Failure,
  Order,
  OrderItem,
  OrderWithItems,
  PlaceOrderParams,
  Product,
  Result,
  TransitionStatusParams,
  UpdatePaymentStatusParams,
  Vendor,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

import { computeOrderTotals, lineTotal } from './order.pricing.js';
import {
  canTransitionOrder,
  canTransitionPayment,
  isCancellable,
} from './order.transitions.js';

/**
 * Order fields fixed at placement
 */
export type NewOrder = Omit<Order, 'id' | 'version' | 'createdAt' | 'updatedAt'>;

/**
 * Line fields fixed at placement
 */
export type NewOrderItem = Omit<OrderItem, 'id' | 'orderId'>;

/**
 * Mutable order fields
 */
export type OrderPatch = Partial<
  Pick<
    Order,
    | 'status'
    | 'paymentStatus'
    | 'paymentMethod'
    | 'paymentReference'
    | 'paidAmount'
    | 'trackingNumber'
    | 'carrierName'
    | 'confirmedAt'
    | 'shippedAt'
    | 'deliveredAt'
    | 'cancelledAt'
    | 'cancelledBy'
    | 'cancellationReason'
  >
> & { updatedAt: Date };

/**
 * Database abstraction interface for OrderService
 */
export interface OrderServiceDb {
  getVendor: (vendorId: string) => Promise<Vendor | null>;
  getProductsByIds: (productIds: string[]) => Promise<Product[]>;
  getAddress: (addressId: string) => Promise<Address | null>;
  getOrder: (orderId: string) => Promise<Order | null>;
  getOrderItems: (orderId: string) => Promise<OrderItem[]>;
  /**
   * Insert the order and all its lines in one transaction
   */
  createOrderWithItems: (params: {
    order: NewOrder;
    items: NewOrderItem[];
  }) => Promise<OrderWithItems>;
  /**
   * Apply the patch only if the stored version still equals expectedVersion.
   * Returns null when it does not (or the order is gone).
   */
  updateOrder: (
    orderId: string,
    expectedVersion: number,
    patch: OrderPatch
  ) => Promise<Order | null>;
}

/**
 * Minimal AuditService interface
 */
export interface OrderServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * OrderService interface
 */
export interface OrderService {
  placeOrder(
    actor: ActorContext,
    params: PlaceOrderParams
  ): Promise<Result<OrderWithItems>>;
  getOrder(actor: ActorContext, orderId: string): Promise<Result<Order>>;
  getOrderItems(
    actor: ActorContext,
    orderId: string
  ): Promise<Result<OrderItem[]>>;
  transitionStatus(
    actor: ActorContext,
    orderId: string,
    params: TransitionStatusParams
  ): Promise<Result<Order>>;
  updatePaymentStatus(
    actor: ActorContext,
    orderId: string,
    params: UpdatePaymentStatusParams
  ): Promise<Result<Order>>;
  cancelOrder(
    actor: ActorContext,
    orderId: string,
    params: CancelOrderParams
  ): Promise<Result<Order>>;
}

const ORDER_NUMBER_ALPHABET = '0123456789ABCDEFGHJKLMNPQRSTUVWXYZ';
const orderNumberSuffix = customAlphabet(ORDER_NUMBER_ALPHABET, 10);

/**
 * Default order number: ORD-<10 chars>
 */
export function generateOrderNumber(): string {
  return `ORD-${orderNumberSuffix()}`;
}

/**
 * Create OrderService instance
 */
export function createOrderService(deps: {
  db: OrderServiceDb;
  auditService: OrderServiceAudit;
  clock?: Clock;
  lock?: EntityLock;
  logger?: Logger;
  orderNumber?: () => string;
}): OrderService {
  const { db, auditService } = deps;
  const clock = deps.clock ?? systemClock;
  const lock = deps.lock ?? createLocalEntityLock();
  const log = (deps.logger ?? defaultLogger).child({ component: 'orders' });
  const nextOrderNumber = deps.orderNumber ?? generateOrderNumber;

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function orderNotFound(orderId: string): Failure {
    return failure('NOT_FOUND', `Order not found: ${orderId}`, { orderId });
  }

  function versionConflict(order: Order, expected: number): Failure {
    return failure(
      'VERSION_CONFLICT',
      `Order ${order.id} was modified concurrently`,
      { orderId: order.id, expectedVersion: expected, currentVersion: order.version }
    );
  }

  /**
   * Load, validate, compare-and-set, audit.
   * `build` returns the patch or a domain failure.
   */
  async function mutateOrder(
    actor: ActorContext,
    orderId: string,
    expectedVersion: number | undefined,
    build: (order: Order, now: Date) => Result<Omit<OrderPatch, 'updatedAt'>>,
    event: (before: Order, after: Order) => AuditEvent
  ): Promise<Result<Order>> {
    return lock.runExclusive(`order:${orderId}`, async () => {
      const order = await db.getOrder(orderId);
      if (order === null) {
        return orderNotFound(orderId);
      }
      if (expectedVersion !== undefined && expectedVersion !== order.version) {
        return versionConflict(order, expectedVersion);
      }

      const now = clock.now();
      const patch = build(order, now);
      if (!patch.success) {
        return patch;
      }

      const updated = await db.updateOrder(orderId, order.version, {
        ...patch.data,
        updatedAt: now,
      });
      if (updated === null) {
        return versionConflict(order, order.version);
      }

      await auditService.log(actor, event(order, updated));
      return success(updated);
    });
  }

  function validateAdjustment(
    name: string,
    value: number | undefined
  ): Result<number> {
    const amount = value ?? 0;
    if (!isValidAmount(amount) || amount < 0) {
      return failure('VALIDATION_ERROR', `${name} must be a non-negative amount`, {
        field: name,
        value,
      });
    }
    return success(amount);
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    async placeOrder(
      actor: ActorContext,
      params: PlaceOrderParams
    ): Promise<Result<OrderWithItems>> {
      if (params.items.length === 0) {
        return failure('VALIDATION_ERROR', 'Order must contain at least one item');
      }
      for (const item of params.items) {
        if (!Number.isSafeInteger(item.quantity) || item.quantity <= 0) {
          return failure(
            'VALIDATION_ERROR',
            'Item quantity must be a positive integer',
            { productId: item.productId, quantity: item.quantity }
          );
        }
      }

      const tax = validateAdjustment('taxAmount', params.taxAmount);
      if (!tax.success) {
        return tax;
      }
      const discount = validateAdjustment(
        'discountAmount',
        params.discountAmount
      );
      if (!discount.success) {
        return discount;
      }
      const shipping = validateAdjustment(
        'shippingAmount',
        params.shippingAmount
      );
      if (!shipping.success) {
        return shipping;
      }

      const vendor = await db.getVendor(params.vendorId);
      if (vendor === null || !vendor.isActive) {
        return failure('NOT_FOUND', `Vendor not found: ${params.vendorId}`, {
          vendorId: params.vendorId,
        });
      }

      const productIds = [...new Set(params.items.map((item) => item.productId))];
      const products = new Map(
        (await db.getProductsByIds(productIds)).map((product) => [
          product.id,
          product,
        ])
      );

      const lines: NewOrderItem[] = [];
      for (const item of params.items) {
        const product = products.get(item.productId);
        if (product === undefined) {
          return failure('NOT_FOUND', `Product not found: ${item.productId}`, {
            productId: item.productId,
          });
        }
        if (product.vendorId !== params.vendorId) {
          return failure(
            'VALIDATION_ERROR',
            `Product ${product.id} does not belong to vendor ${params.vendorId}`,
            { productId: product.id, vendorId: params.vendorId }
          );
        }
        if (!product.isActive) {
          return failure('VALIDATION_ERROR', `Product ${product.id} is not available`, {
            productId: product.id,
          });
        }
        const total = lineTotal(product.price, item.quantity);
        if (!isValidAmount(total)) {
          return failure('VALIDATION_ERROR', 'Line total is out of range', {
            productId: product.id,
            quantity: item.quantity,
          });
        }
        lines.push({
          productId: product.id,
          quantity: item.quantity,
          unitPrice: product.price,
          lineTotal: total,
          productName: product.name,
          productSku: product.sku,
          itemNotes: item.itemNotes ?? null,
        });
      }

      const addressIds = [params.deliveryAddressId];
      if (params.billingAddressId !== undefined) {
        addressIds.push(params.billingAddressId);
      }
      for (const addressId of addressIds) {
        const address = await db.getAddress(addressId);
        if (address === null) {
          return failure('NOT_FOUND', `Address not found: ${addressId}`, {
            addressId,
          });
        }
        if (address.userId !== params.customerId) {
          return failure(
            'VALIDATION_ERROR',
            `Address ${addressId} does not belong to the customer`,
            { addressId, customerId: params.customerId }
          );
        }
      }

      const totals = computeOrderTotals(lines, {
        taxAmount: tax.data,
        discountAmount: discount.data,
        shippingAmount: shipping.data,
      });
      if (
        !isValidAmount(totals.subtotal) ||
        !isValidAmount(totals.totalAmount)
      ) {
        return failure('VALIDATION_ERROR', 'Order total is out of range', {
          subtotal: totals.subtotal,
          totalAmount: totals.totalAmount,
        });
      }
      if (totals.totalAmount < 0) {
        return failure('VALIDATION_ERROR', 'Order total cannot be negative', {
          ...totals,
        });
      }

      const now = clock.now();
      const created = await db.createOrderWithItems({
        order: {
          orderNumber: nextOrderNumber(),
          customerId: params.customerId,
          vendorId: params.vendorId,
          organizationId: params.organizationId ?? null,
          status: 'pending',
          paymentStatus: 'pending',
          paymentMethod: null,
          paymentReference: null,
          paidAmount: 0,
          ...totals,
          deliveryAddressId: params.deliveryAddressId,
          billingAddressId: params.billingAddressId ?? null,
          orderNotes: params.orderNotes ?? null,
          trackingNumber: null,
          carrierName: null,
          placedAt: now,
          confirmedAt: null,
          shippedAt: null,
          deliveredAt: null,
          cancelledAt: null,
          cancelledBy: null,
          cancellationReason: null,
        },
        items: lines,
      });

      await auditService.log(actor, {
        action: 'order.placed',
        resourceType: 'order',
        resourceId: created.id,
        details: {
          orderNumber: created.orderNumber,
          vendorId: created.vendorId,
          itemCount: created.items.length,
          totalAmount: created.totalAmount,
        },
      });
      log.info(
        { orderId: created.id, orderNumber: created.orderNumber },
        'Order placed'
      );

      return success(created);
    },

    async getOrder(
      _actor: ActorContext,
      orderId: string
    ): Promise<Result<Order>> {
      const order = await db.getOrder(orderId);
      if (order === null) {
        return orderNotFound(orderId);
      }
      return success(order);
    },

    async getOrderItems(
      _actor: ActorContext,
      orderId: string
    ): Promise<Result<OrderItem[]>> {
      const order = await db.getOrder(orderId);
      if (order === null) {
        return orderNotFound(orderId);
      }
      return success(await db.getOrderItems(orderId));
    },

    async transitionStatus(
      actor: ActorContext,
      orderId: string,
      params: TransitionStatusParams
    ): Promise<Result<Order>> {
      const result = await mutateOrder(
        actor,
        orderId,
        params.expectedVersion,
        (order, now) => {
          const to = params.status;
          if (!canTransitionOrder(order.status, to)) {
            return failure(
              'INVALID_TRANSITION',
              `Cannot transition order from ${order.status} to ${to}`,
              { orderId, from: order.status, to }
            );
          }

          const patch: Omit<OrderPatch, 'updatedAt'> = { status: to };
          switch (to) {
            case 'confirmed':
              patch.confirmedAt = now;
              break;
            case 'shipped':
              patch.shippedAt = now;
              if (params.trackingNumber !== undefined) {
                patch.trackingNumber = params.trackingNumber;
              }
              if (params.carrierName !== undefined) {
                patch.carrierName = params.carrierName;
              }
              break;
            case 'delivered':
              patch.deliveredAt = now;
              break;
            case 'cancelled':
              patch.cancelledAt = now;
              patch.cancelledBy = actor.userId ?? null;
              patch.cancellationReason = params.reason ?? null;
              break;
            default:
              break;
          }
          return success(patch);
        },
        (before, after) => ({
          action: 'order.status_changed',
          resourceType: 'order',
          resourceId: orderId,
          details: {
            from: before.status,
            to: after.status,
            ...(params.reason !== undefined ? { reason: params.reason } : {}),
          },
        })
      );

      if (result.success) {
        log.info(
          { orderId, status: result.data.status, version: result.data.version },
          'Order status changed'
        );
      }
      return result;
    },

    async updatePaymentStatus(
      actor: ActorContext,
      orderId: string,
      params: UpdatePaymentStatusParams
    ): Promise<Result<Order>> {
      const result = await mutateOrder(
        actor,
        orderId,
        params.expectedVersion,
        (order) => {
          const to = params.paymentStatus;
          if (!canTransitionPayment(order.paymentStatus, to)) {
            return failure(
              'INVALID_TRANSITION',
              `Cannot transition payment from ${order.paymentStatus} to ${to}`,
              { orderId, from: order.paymentStatus, to }
            );
          }

          const patch: Omit<OrderPatch, 'updatedAt'> = { paymentStatus: to };
          if (to === 'paid') {
            patch.paidAmount = order.totalAmount;
          } else if (to === 'partial') {
            const paid = params.paidAmount;
            if (
              paid === undefined ||
              !isValidAmount(paid) ||
              paid <= 0 ||
              paid >= order.totalAmount
            ) {
              return failure(
                'VALIDATION_ERROR',
                'Partial payment must be greater than zero and less than the order total',
                { orderId, paidAmount: paid, totalAmount: order.totalAmount }
              );
            }
            patch.paidAmount = paid;
          }
          if (params.transactionId !== undefined) {
            patch.paymentReference = params.transactionId;
          }
          if (params.paymentMethod !== undefined) {
            patch.paymentMethod = params.paymentMethod;
          }
          return success(patch);
        },
        (before, after) => ({
          action: 'order.payment_status_changed',
          resourceType: 'order',
          resourceId: orderId,
          details: {
            from: before.paymentStatus,
            to: after.paymentStatus,
            paidAmount: after.paidAmount,
            transactionId: after.paymentReference,
          },
        })
      );

      if (result.success) {
        log.info(
          { orderId, paymentStatus: result.data.paymentStatus },
          'Order payment status changed'
        );
      }
      return result;
    },

    async cancelOrder(
      actor: ActorContext,
      orderId: string,
      params: CancelOrderParams
    ): Promise<Result<Order>> {
      const result = await mutateOrder(
        actor,
        orderId,
        params.expectedVersion,
        (order, now) => {
          if (!isCancellable(order.status)) {
            return failure(
              'INVALID_STATE',
              `Order cannot be cancelled in status ${order.status}`,
              { orderId, status: order.status }
            );
          }
          const patch: Omit<OrderPatch, 'updatedAt'> = {
            status: 'cancelled',
            cancelledAt: now,
            cancelledBy: actor.userId ?? null,
            cancellationReason: params.reason ?? null,
          };
          return success(patch);
        },
        (before) => ({
          action: 'order.cancelled',
          resourceType: 'order',
          resourceId: orderId,
          details: {
            previousStatus: before.status,
            reason: params.reason ?? null,
          },
        })
      );

      if (result.success) {
        log.info({ orderId }, 'Order cancelled');
      }
      return result;
    },
  };
}
