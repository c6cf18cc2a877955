/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { Account, ActorContext, Role, Capability } from './auth.js';
export { ROLES, SYSTEM_ACTOR } from './auth.js';
export type { AuditActorType, AuditEvent, AuditLog } from './audit.js';
export type { Cents, CurrencyCode } from './money.js';
export type {
  OrderStatus,
  OrderPaymentStatus,
  OrderPaymentMethod,
  OrderItem,
  Order,
  OrderWithItems,
  Product,
  Vendor,
  Address,
  PlaceOrderItemParams,
  PlaceOrderParams,
  TransitionStatusParams,
  UpdatePaymentStatusParams,
  CancelOrderParams,
} from './order.js';
export {
  ORDER_STATUSES,
  ORDER_PAYMENT_STATUSES,
  ORDER_PAYMENT_METHODS,
} from './order.js';
export type {
  SubscriptionStatus,
  BillingCycle,
  PlanType,
  PaymentStatus,
  PaymentMethod,
  PlanFeature,
  Plan,
  ScheduledPlanChange,
  Subscription,
  SubscriptionOverview,
  Payment,
  UsageRecord,
  FeatureUsage,
  UsageSummary,
  BillingOutcome,
  SubscribeParams,
  RecordPaymentParams,
  CancelSubscriptionParams,
  ReactivateSubscriptionParams,
  ChangePlanParams,
  UpdateSubscriptionStatusParams,
  TrackUsageParams,
} from './subscription.js';
export {
  SUBSCRIPTION_STATUSES,
  BILLING_CYCLES,
  PLAN_TYPES,
  PAYMENT_STATUSES,
  PAYMENT_METHODS,
} from './subscription.js';
