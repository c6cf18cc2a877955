/**
 * Wire formatting
 * Amounts leave the API as decimal strings, dates as ISO strings
 */

import { formatMoney } from '@/lib/money.js';
import type {
  FeatureUsage,
  Order,
  OrderItem,
  OrderWithItems,
  Payment,
  Plan,
  Subscription,
  SubscriptionOverview,
  UsageRecord,
  UsageSummary,
} from '@/types/index.js';

function isoOrNull(date: Date | null): string | null {
  return date === null ? null : date.toISOString();
}

export function formatOrderItem(item: OrderItem) {
  return {
    id: item.id,
    orderId: item.orderId,
    productId: item.productId,
    quantity: item.quantity,
    unitPrice: formatMoney(item.unitPrice),
    lineTotal: formatMoney(item.lineTotal),
    productName: item.productName,
    productSku: item.productSku,
    itemNotes: item.itemNotes,
  };
}

export function formatOrder(order: Order) {
  return {
    id: order.id,
    orderNumber: order.orderNumber,
    customerId: order.customerId,
    vendorId: order.vendorId,
    organizationId: order.organizationId,
    status: order.status,
    paymentStatus: order.paymentStatus,
    paymentMethod: order.paymentMethod,
    paymentReference: order.paymentReference,
    paidAmount: formatMoney(order.paidAmount),
    subtotal: formatMoney(order.subtotal),
    taxAmount: formatMoney(order.taxAmount),
    discountAmount: formatMoney(order.discountAmount),
    shippingAmount: formatMoney(order.shippingAmount),
    totalAmount: formatMoney(order.totalAmount),
    deliveryAddressId: order.deliveryAddressId,
    billingAddressId: order.billingAddressId,
    orderNotes: order.orderNotes,
    trackingNumber: order.trackingNumber,
    carrierName: order.carrierName,
    placedAt: order.placedAt.toISOString(),
    confirmedAt: isoOrNull(order.confirmedAt),
    shippedAt: isoOrNull(order.shippedAt),
    deliveredAt: isoOrNull(order.deliveredAt),
    cancelledAt: isoOrNull(order.cancelledAt),
    cancelledBy: order.cancelledBy,
    cancellationReason: order.cancellationReason,
    version: order.version,
    createdAt: order.createdAt.toISOString(),
    updatedAt: order.updatedAt.toISOString(),
  };
}

export function formatOrderWithItems(order: OrderWithItems) {
  return {
    ...formatOrder(order),
    items: order.items.map(formatOrderItem),
  };
}

export function formatPlan(plan: Plan) {
  return {
    id: plan.id,
    name: plan.name,
    description: plan.description,
    planType: plan.planType,
    basePrice: formatMoney(plan.basePrice),
    billingCycle: plan.billingCycle,
    setupFee: plan.setupFee === null ? null : formatMoney(plan.setupFee),
    features: plan.features,
    maxProducts: plan.maxProducts,
    maxOrdersPerMonth: plan.maxOrdersPerMonth,
    maxStorageMb: plan.maxStorageMb,
    isFeatured: plan.isFeatured,
    sortOrder: plan.sortOrder,
    trialDays: plan.trialDays,
  };
}

export function formatSubscription(subscription: Subscription) {
  const scheduled = subscription.scheduledPlanChange;
  return {
    id: subscription.id,
    vendorId: subscription.vendorId,
    planId: subscription.planId,
    billingCycle: subscription.billingCycle,
    status: subscription.status,
    startDate: subscription.startDate.toISOString(),
    endDate: isoOrNull(subscription.endDate),
    trialEndDate: isoOrNull(subscription.trialEndDate),
    currentPeriodStart: subscription.currentPeriodStart.toISOString(),
    currentPeriodEnd: subscription.currentPeriodEnd.toISOString(),
    nextBillingDate: isoOrNull(subscription.nextBillingDate),
    amount: formatMoney(subscription.amount),
    currency: subscription.currency,
    autoRenew: subscription.autoRenew,
    cancelledAt: isoOrNull(subscription.cancelledAt),
    cancellationReason: subscription.cancellationReason,
    scheduledPlanChange:
      scheduled === null
        ? null
        : {
            newPlanId: scheduled.newPlanId,
            previousPlanId: scheduled.previousPlanId,
            effectiveAt: scheduled.effectiveAt.toISOString(),
          },
    version: subscription.version,
  };
}

export function formatSubscriptionOverview(overview: SubscriptionOverview) {
  return {
    subscription: formatSubscription(overview.subscription),
    plan: formatPlan(overview.plan),
    isActive: overview.isActive,
    isTrial: overview.isTrial,
    daysRemaining: overview.daysRemaining,
  };
}

export function formatPayment(payment: Payment) {
  return {
    id: payment.id,
    subscriptionId: payment.subscriptionId,
    amount: formatMoney(payment.amount),
    currency: payment.currency,
    status: payment.status,
    paymentMethod: payment.paymentMethod,
    transactionId: payment.transactionId,
    paymentDate: isoOrNull(payment.paymentDate),
    dueDate: isoOrNull(payment.dueDate),
    billingPeriodStart: payment.billingPeriodStart.toISOString(),
    billingPeriodEnd: payment.billingPeriodEnd.toISOString(),
    failureReason: payment.failureReason,
    retryCount: payment.retryCount,
    createdAt: payment.createdAt.toISOString(),
  };
}

export function formatUsageRecord(record: UsageRecord) {
  return {
    id: record.id,
    subscriptionId: record.subscriptionId,
    featureName: record.featureName,
    usageCount: record.usageCount,
    usageLimit: record.usageLimit,
    periodStart: record.periodStart.toISOString(),
    periodEnd: record.periodEnd.toISOString(),
  };
}

export function formatUsageSummary(summary: UsageSummary) {
  return {
    subscriptionId: summary.subscriptionId,
    periodStart: summary.periodStart.toISOString(),
    periodEnd: summary.periodEnd.toISOString(),
    daysRemaining: summary.daysRemaining,
    features: summary.features.map((feature: FeatureUsage) => ({ ...feature })),
  };
}
