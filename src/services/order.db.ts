/**
 * OrderService Database Adapter
 * Implements OrderServiceDb interface using Supabase
 *
 * Amounts live in *_cents bigint columns. Order + items are inserted by
 * the place_order() Postgres function so both land in one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import {
  NOT_FOUND_CODE,
  parseEnum,
  toDateOrNull,
  toIsoOrNull,
} from '@/lib/supabase.js';
import type {
  Address,
  Order,
  OrderItem,
  OrderWithItems,
  Product,
  Vendor,
} from '@/types/index.js';
import {
  ORDER_PAYMENT_METHODS,
  ORDER_PAYMENT_STATUSES,
  ORDER_STATUSES,
} from '@/types/index.js';

import type {
  NewOrder,
  NewOrderItem,
  OrderPatch,
  OrderServiceDb,
} from './order.service.js';

/**
 * Database row types
 */
interface OrderRow {
  id: string;
  order_number: string;
  customer_id: string;
  vendor_id: string;
  organization_id: string | null;
  status: string;
  payment_status: string;
  payment_method: string | null;
  payment_reference: string | null;
  paid_amount_cents: number;
  subtotal_cents: number;
  tax_amount_cents: number;
  discount_amount_cents: number;
  shipping_amount_cents: number;
  total_amount_cents: number;
  delivery_address_id: string;
  billing_address_id: string | null;
  order_notes: string | null;
  tracking_number: string | null;
  carrier_name: string | null;
  placed_at: string;
  confirmed_at: string | null;
  shipped_at: string | null;
  delivered_at: string | null;
  cancelled_at: string | null;
  cancelled_by: string | null;
  cancellation_reason: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

interface OrderItemRow {
  id: string;
  order_id: string;
  position: number;
  product_id: string;
  quantity: number;
  unit_price_cents: number;
  line_total_cents: number;
  product_name: string;
  product_sku: string | null;
  item_notes: string | null;
}

interface ProductRow {
  id: string;
  vendor_id: string;
  name: string;
  sku: string | null;
  price_cents: number;
  is_active: boolean;
}

interface VendorRow {
  id: string;
  user_id: string;
  business_name: string;
  is_active: boolean;
}

interface AddressRow {
  id: string;
  user_id: string;
}

/**
 * Map database row to Order entity
 */
function mapRowToOrder(row: OrderRow): Order {
  return {
    id: row.id,
    orderNumber: row.order_number,
    customerId: row.customer_id,
    vendorId: row.vendor_id,
    organizationId: row.organization_id,
    status: parseEnum(ORDER_STATUSES, row.status, 'orders.status'),
    paymentStatus: parseEnum(
      ORDER_PAYMENT_STATUSES,
      row.payment_status,
      'orders.payment_status'
    ),
    paymentMethod:
      row.payment_method === null
        ? null
        : parseEnum(
            ORDER_PAYMENT_METHODS,
            row.payment_method,
            'orders.payment_method'
          ),
    paymentReference: row.payment_reference,
    paidAmount: Number(row.paid_amount_cents),
    subtotal: Number(row.subtotal_cents),
    taxAmount: Number(row.tax_amount_cents),
    discountAmount: Number(row.discount_amount_cents),
    shippingAmount: Number(row.shipping_amount_cents),
    totalAmount: Number(row.total_amount_cents),
    deliveryAddressId: row.delivery_address_id,
    billingAddressId: row.billing_address_id,
    orderNotes: row.order_notes,
    trackingNumber: row.tracking_number,
    carrierName: row.carrier_name,
    placedAt: new Date(row.placed_at),
    confirmedAt: toDateOrNull(row.confirmed_at),
    shippedAt: toDateOrNull(row.shipped_at),
    deliveredAt: toDateOrNull(row.delivered_at),
    cancelledAt: toDateOrNull(row.cancelled_at),
    cancelledBy: row.cancelled_by,
    cancellationReason: row.cancellation_reason,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Map database row to OrderItem entity
 */
function mapRowToOrderItem(row: OrderItemRow): OrderItem {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    quantity: row.quantity,
    unitPrice: Number(row.unit_price_cents),
    lineTotal: Number(row.line_total_cents),
    productName: row.product_name,
    productSku: row.product_sku,
    itemNotes: row.item_notes,
  };
}

/**
 * Order fields as place_order() expects them
 */
function mapNewOrderToRow(order: NewOrder): Record<string, unknown> {
  return {
    order_number: order.orderNumber,
    customer_id: order.customerId,
    vendor_id: order.vendorId,
    organization_id: order.organizationId,
    status: order.status,
    payment_status: order.paymentStatus,
    paid_amount_cents: order.paidAmount,
    subtotal_cents: order.subtotal,
    tax_amount_cents: order.taxAmount,
    discount_amount_cents: order.discountAmount,
    shipping_amount_cents: order.shippingAmount,
    total_amount_cents: order.totalAmount,
    delivery_address_id: order.deliveryAddressId,
    billing_address_id: order.billingAddressId,
    order_notes: order.orderNotes,
    placed_at: order.placedAt.toISOString(),
  };
}

function mapNewItemToRow(item: NewOrderItem): Record<string, unknown> {
  return {
    product_id: item.productId,
    quantity: item.quantity,
    unit_price_cents: item.unitPrice,
    line_total_cents: item.lineTotal,
    product_name: item.productName,
    product_sku: item.productSku,
    item_notes: item.itemNotes,
  };
}

/**
 * Only the keys present in the patch are written
 */
function mapPatchToRow(patch: OrderPatch): Record<string, unknown> {
  const row: Record<string, unknown> = {
    updated_at: patch.updatedAt.toISOString(),
  };
  if (patch.status !== undefined) {
    row.status = patch.status;
  }
  if (patch.paymentStatus !== undefined) {
    row.payment_status = patch.paymentStatus;
  }
  if (patch.paymentMethod !== undefined) {
    row.payment_method = patch.paymentMethod;
  }
  if (patch.paymentReference !== undefined) {
    row.payment_reference = patch.paymentReference;
  }
  if (patch.paidAmount !== undefined) {
    row.paid_amount_cents = patch.paidAmount;
  }
  if (patch.trackingNumber !== undefined) {
    row.tracking_number = patch.trackingNumber;
  }
  if (patch.carrierName !== undefined) {
    row.carrier_name = patch.carrierName;
  }
  if (patch.confirmedAt !== undefined) {
    row.confirmed_at = toIsoOrNull(patch.confirmedAt);
  }
  if (patch.shippedAt !== undefined) {
    row.shipped_at = toIsoOrNull(patch.shippedAt);
  }
  if (patch.deliveredAt !== undefined) {
    row.delivered_at = toIsoOrNull(patch.deliveredAt);
  }
  if (patch.cancelledAt !== undefined) {
    row.cancelled_at = toIsoOrNull(patch.cancelledAt);
  }
  if (patch.cancelledBy !== undefined) {
    row.cancelled_by = patch.cancelledBy;
  }
  if (patch.cancellationReason !== undefined) {
    row.cancellation_reason = patch.cancellationReason;
  }
  return row;
}

/**
 * Create OrderServiceDb implementation using Supabase
 */
export function createOrderServiceDb(supabase: SupabaseClient): OrderServiceDb {
  async function fetchOrder(orderId: string): Promise<Order | null> {
    const { data, error } = await supabase
      .from('orders')
      .select('*')
      .eq('id', orderId)
      .single();

    if (error !== null) {
      if (error.code === NOT_FOUND_CODE) {
        return null;
      }
      throw new Error(`Failed to get order: ${error.message}`);
    }

    return mapRowToOrder(data as OrderRow);
  }

  async function fetchItems(orderId: string): Promise<OrderItem[]> {
    const { data, error } = await supabase
      .from('order_items')
      .select('*')
      .eq('order_id', orderId)
      .order('position', { ascending: true });

    if (error !== null) {
      throw new Error(`Failed to get order items: ${error.message}`);
    }

    return ((data ?? []) as OrderItemRow[]).map(mapRowToOrderItem);
  }

  return {
    async getVendor(vendorId: string): Promise<Vendor | null> {
      const { data, error } = await supabase
        .from('vendors')
        .select('id, user_id, business_name, is_active')
        .eq('id', vendorId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get vendor: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      const row = data as VendorRow;
      return {
        id: row.id,
        userId: row.user_id,
        businessName: row.business_name,
        isActive: row.is_active,
      };
    },

    async getProductsByIds(productIds: string[]): Promise<Product[]> {
      if (productIds.length === 0) {
        return [];
      }

      const { data, error } = await supabase
        .from('products')
        .select('id, vendor_id, name, sku, price_cents, is_active')
        .in('id', productIds);

      if (error !== null) {
        throw new Error(`Failed to get products: ${error.message}`);
      }

      return ((data ?? []) as ProductRow[]).map((row) => ({
        id: row.id,
        vendorId: row.vendor_id,
        name: row.name,
        sku: row.sku,
        price: Number(row.price_cents),
        isActive: row.is_active,
      }));
    },

    async getAddress(addressId: string): Promise<Address | null> {
      const { data, error } = await supabase
        .from('addresses')
        .select('id, user_id')
        .eq('id', addressId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get address: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      const row = data as AddressRow;
      return { id: row.id, userId: row.user_id };
    },

    getOrder: fetchOrder,

    getOrderItems: fetchItems,

    /**
     * Insert order and lines atomically via place_order()
     */
    async createOrderWithItems(params: {
      order: NewOrder;
      items: NewOrderItem[];
    }): Promise<OrderWithItems> {
      const { data, error } = await supabase.rpc('place_order', {
        p_order: mapNewOrderToRow(params.order),
        p_items: params.items.map(mapNewItemToRow),
      });

      if (error !== null) {
        throw new Error(`Failed to place order: ${error.message}`);
      }

      if (typeof data !== 'string') {
        throw new Error('place_order returned no order id');
      }
      const orderId = data;
      const order = await fetchOrder(orderId);
      if (order === null) {
        throw new Error(`Order ${orderId} missing after insert`);
      }
      return { ...order, items: await fetchItems(orderId) };
    },

    /**
     * Compare-and-set on version
     */
    async updateOrder(
      orderId: string,
      expectedVersion: number,
      patch: OrderPatch
    ): Promise<Order | null> {
      const { data, error } = await supabase
        .from('orders')
        .update({ ...mapPatchToRow(patch), version: expectedVersion + 1 })
        .eq('id', orderId)
        .eq('version', expectedVersion)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to update order: ${error.message}`);
      }

      return data === null ? null : mapRowToOrder(data as OrderRow);
    },
  };
}
