/**
 * Order Domain Types
 *
 * SCOPE: Order placement, fulfilment status, payment status, cancellation
 */

import type { Cents } from './money.js';

/**
 * Order status
 */
export const ORDER_STATUSES = [
  'draft',
  'pending',
  'confirmed',
  'processing',
  'shipped',
  'delivered',
  'cancelled',
  'returned',
  'refunded',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/**
 * Order payment status
 */
export const ORDER_PAYMENT_STATUSES = [
  'pending',
  'paid',
  'partial',
  'failed',
  'refunded',
] as const;

export type OrderPaymentStatus = (typeof ORDER_PAYMENT_STATUSES)[number];

/**
 * Payment method chosen at checkout
 */
export const ORDER_PAYMENT_METHODS = [
  'cash_on_delivery',
  'credit_card',
  'debit_card',
  'upi',
  'net_banking',
  'wallet',
  'bank_transfer',
] as const;

export type OrderPaymentMethod = (typeof ORDER_PAYMENT_METHODS)[number];

/**
 * Order line - product attributes are snapshotted at placement time
 */
export interface OrderItem {
  id: string;
  orderId: string;
  productId: string;
  quantity: number;
  unitPrice: Cents;
  lineTotal: Cents;
  productName: string;
  productSku: string | null;
  itemNotes: string | null;
}

/**
 * Order entity
 */
export interface Order {
  id: string;
  orderNumber: string;
  customerId: string;
  vendorId: string;
  organizationId: string | null;
  status: OrderStatus;
  paymentStatus: OrderPaymentStatus;
  paymentMethod: OrderPaymentMethod | null;
  paymentReference: string | null;
  paidAmount: Cents;
  subtotal: Cents;
  taxAmount: Cents;
  discountAmount: Cents;
  shippingAmount: Cents;
  totalAmount: Cents;
  deliveryAddressId: string;
  billingAddressId: string | null;
  orderNotes: string | null;
  trackingNumber: string | null;
  carrierName: string | null;
  placedAt: Date;
  confirmedAt: Date | null;
  shippedAt: Date | null;
  deliveredAt: Date | null;
  cancelledAt: Date | null;
  cancelledBy: string | null;
  cancellationReason: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Order together with its lines
 */
export interface OrderWithItems extends Order {
  items: OrderItem[];
}

/**
 * Catalog product as seen by order placement
 */
export interface Product {
  id: string;
  vendorId: string;
  name: string;
  sku: string | null;
  price: Cents;
  isActive: boolean;
}

/**
 * Vendor as seen by order placement
 */
export interface Vendor {
  id: string;
  userId: string;
  businessName: string;
  isActive: boolean;
}

/**
 * Customer address (ownership check only)
 */
export interface Address {
  id: string;
  userId: string;
}

/**
 * Requested order line
 */
export interface PlaceOrderItemParams {
  productId: string;
  quantity: number;
  itemNotes?: string;
}

/**
 * Parameters for placing an order
 */
export interface PlaceOrderParams {
  customerId: string;
  vendorId: string;
  items: PlaceOrderItemParams[];
  deliveryAddressId: string;
  billingAddressId?: string;
  organizationId?: string;
  taxAmount?: Cents;
  discountAmount?: Cents;
  shippingAmount?: Cents;
  orderNotes?: string;
}

/**
 * Parameters for a fulfilment status change
 */
export interface TransitionStatusParams {
  status: OrderStatus;
  reason?: string;
  trackingNumber?: string;
  carrierName?: string;
  expectedVersion?: number;
}

/**
 * Parameters for a payment status change
 */
export interface UpdatePaymentStatusParams {
  paymentStatus: OrderPaymentStatus;
  transactionId?: string;
  paymentMethod?: OrderPaymentMethod;
  paidAmount?: Cents;
  expectedVersion?: number;
}

/**
 * Parameters for cancelling an order
 */
export interface CancelOrderParams {
  reason?: string;
  expectedVersion?: number;
}
