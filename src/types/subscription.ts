/**
 * Subscription Domain Types
 *
 * SCOPE: Vendor plans, subscriptions, billing payments, metered usage
 */

import type { Cents, CurrencyCode } from './money.js';

/**
 * Subscription status
 */
export const SUBSCRIPTION_STATUSES = [
  'trial',
  'active',
  'suspended',
  'cancelled',
  'expired',
] as const;

export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

/**
 * Recurring period length
 */
export const BILLING_CYCLES = [
  'monthly',
  'quarterly',
  'annually',
  'lifetime',
] as const;

export type BillingCycle = (typeof BILLING_CYCLES)[number];

/**
 * Plan tier
 */
export const PLAN_TYPES = ['basic', 'premium', 'enterprise', 'custom'] as const;

export type PlanType = (typeof PLAN_TYPES)[number];

/**
 * Payment status for subscription charges
 */
export const PAYMENT_STATUSES = [
  'pending',
  'completed',
  'failed',
  'refunded',
  'cancelled',
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/**
 * Payment method for subscription charges
 */
export const PAYMENT_METHODS = [
  'credit_card',
  'debit_card',
  'net_banking',
  'upi',
  'wallet',
  'bank_transfer',
] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/**
 * Plan feature - limit null means unlimited
 */
export interface PlanFeature {
  enabled: boolean;
  limit: number | null;
}

/**
 * Plan entity - defines price, cycle and metered features
 */
export interface Plan {
  id: string;
  name: string;
  description: string | null;
  planType: PlanType;
  basePrice: Cents;
  billingCycle: BillingCycle;
  setupFee: Cents | null;
  features: Record<string, PlanFeature>;
  maxProducts: number | null;
  maxOrdersPerMonth: number | null;
  maxStorageMb: number | null;
  isActive: boolean;
  isFeatured: boolean;
  sortOrder: number;
  trialDays: number | null;
}

/**
 * Plan change deferred to the end of the current period
 */
export interface ScheduledPlanChange {
  newPlanId: string;
  previousPlanId: string;
  effectiveAt: Date;
}

/**
 * Subscription entity - one vendor's billing relationship to a plan
 */
export interface Subscription {
  id: string;
  vendorId: string;
  planId: string;
  billingCycle: BillingCycle;
  status: SubscriptionStatus;
  startDate: Date;
  endDate: Date | null;
  trialEndDate: Date | null;
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
  nextBillingDate: Date | null;
  amount: Cents;
  currency: CurrencyCode;
  autoRenew: boolean;
  cancelledAt: Date | null;
  cancellationReason: string | null;
  scheduledPlanChange: ScheduledPlanChange | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Subscription with access flags computed against the clock
 */
export interface SubscriptionOverview {
  subscription: Subscription;
  plan: Plan;
  isActive: boolean;
  isTrial: boolean;
  daysRemaining: number | null;
}

/**
 * Payment entity - one charge for one billing period
 */
export interface Payment {
  id: string;
  subscriptionId: string;
  vendorId: string;
  amount: Cents;
  currency: CurrencyCode;
  status: PaymentStatus;
  paymentMethod: PaymentMethod;
  transactionId: string | null;
  paymentDate: Date | null;
  dueDate: Date | null;
  billingPeriodStart: Date;
  billingPeriodEnd: Date;
  failureReason: string | null;
  retryCount: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Usage record entity - per-period counter for one metered feature
 */
export interface UsageRecord {
  id: string;
  subscriptionId: string;
  vendorId: string;
  featureName: string;
  usageCount: number;
  usageLimit: number | null;
  periodStart: Date;
  periodEnd: Date;
  metadata: Record<string, unknown>;
}

/**
 * Usage summary line for a feature in the current period
 */
export interface FeatureUsage {
  featureName: string;
  currentUsage: number;
  usageLimit: number | null;
  usagePercentage: number | null;
  isLimitExceeded: boolean;
}

/**
 * Usage summary for the current period
 */
export interface UsageSummary {
  subscriptionId: string;
  periodStart: Date;
  periodEnd: Date;
  daysRemaining: number;
  features: FeatureUsage[];
}

/**
 * Outcome of a payment run: the payment and the subscription after it
 */
export interface BillingOutcome {
  payment: Payment;
  subscription: Subscription;
}

/**
 * Parameters for subscribing a vendor
 */
export interface SubscribeParams {
  vendorId: string;
  planId: string;
  billingCycle?: BillingCycle;
  startTrial: boolean;
}

/**
 * Parameters for charging the current period
 */
export interface RecordPaymentParams {
  subscriptionId: string;
  paymentMethod: PaymentMethod;
  expectedVersion?: number;
}

/**
 * Parameters for cancelling a subscription
 */
export interface CancelSubscriptionParams {
  subscriptionId: string;
  reason?: string;
  immediate: boolean;
  expectedVersion?: number;
}

/**
 * Parameters for reactivating a cancelled subscription
 */
export interface ReactivateSubscriptionParams {
  subscriptionId: string;
  expectedVersion?: number;
}

/**
 * Parameters for changing plan
 */
export interface ChangePlanParams {
  subscriptionId: string;
  newPlanId: string;
  immediate: boolean;
}

/**
 * Parameters for an administrative status change
 */
export interface UpdateSubscriptionStatusParams {
  subscriptionId: string;
  status: SubscriptionStatus;
  reason?: string;
}

/**
 * Parameters for metering a feature
 */
export interface TrackUsageParams {
  subscriptionId: string;
  featureName: string;
  increment: number;
  metadata?: Record<string, unknown>;
}
