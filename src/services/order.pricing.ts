/**
 * Order pricing
 * Line totals and the order total are always derived, never stored independently
 */

import { multiplyMoney, sumMoney } from '@/lib/money.js';
import type { Cents } from '@/types/index.js';

export interface OrderAdjustments {
  taxAmount: Cents;
  discountAmount: Cents;
  shippingAmount: Cents;
}

export interface OrderTotals extends OrderAdjustments {
  subtotal: Cents;
  totalAmount: Cents;
}

export function lineTotal(unitPrice: Cents, quantity: number): Cents {
  return multiplyMoney(unitPrice, quantity);
}

/**
 * total = subtotal + tax - discount + shipping
 */
export function computeOrderTotals(
  lines: ReadonlyArray<{ lineTotal: Cents }>,
  adjustments: OrderAdjustments
): OrderTotals {
  const subtotal = sumMoney(lines.map((line) => line.lineTotal));
  return {
    subtotal,
    ...adjustments,
    totalAmount:
      subtotal +
      adjustments.taxAmount -
      adjustments.discountAmount +
      adjustments.shippingAmount,
  };
}
