/**
 * Order state machines
 *
 * Fulfilment status and payment status each move along a fixed table.
 * Anything not listed is rejected, including a transition to the
 * current status.
 */

import type { OrderPaymentStatus, OrderStatus } from '@/types/index.js';

export const ORDER_STATUS_TRANSITIONS: Readonly<
  Record<OrderStatus, readonly OrderStatus[]>
> = {
  draft: ['pending'],
  pending: ['confirmed', 'cancelled'],
  confirmed: ['processing', 'cancelled'],
  processing: ['shipped', 'cancelled'],
  shipped: ['delivered', 'returned'],
  delivered: ['returned'],
  cancelled: [],
  returned: [],
  refunded: [],
};

export const PAYMENT_STATUS_TRANSITIONS: Readonly<
  Record<OrderPaymentStatus, readonly OrderPaymentStatus[]>
> = {
  pending: ['paid', 'partial', 'failed'],
  partial: ['paid', 'failed', 'refunded'],
  failed: ['pending', 'paid'],
  paid: ['refunded'],
  refunded: [],
};

/**
 * Statuses from which cancelOrder() is refused
 */
export const NON_CANCELLABLE_STATUSES: readonly OrderStatus[] = [
  'delivered',
  'cancelled',
  'returned',
  'refunded',
];

export function canTransitionOrder(
  from: OrderStatus,
  to: OrderStatus
): boolean {
  return ORDER_STATUS_TRANSITIONS[from].includes(to);
}

export function canTransitionPayment(
  from: OrderPaymentStatus,
  to: OrderPaymentStatus
): boolean {
  return PAYMENT_STATUS_TRANSITIONS[from].includes(to);
}

export function isCancellable(status: OrderStatus): boolean {
  return !NON_CANCELLABLE_STATUSES.includes(status);
}
