/**
 * SubscriptionService Implementation
 *
 * SCOPE: Vendor plans, subscriptions, billing-period rollover, payments,
 * metered usage against plan limits
 *
 * GUARDRAILS:
 * - At most one active/trial subscription per vendor
 * - Periods roll forward from the previous period end, never from "now"
 * - Payment completion and rollover are persisted in one atomic call
 * - Usage increments are admitted by a single conditional update;
 *   a rejected increment never changes the count
 *
 * Dependencies: AuditService, PaymentGateway
 */

import { daysUntil, systemClock } from '@/lib/clock.js';
import type { Clock } from '@/lib/clock.js';
import { createLocalEntityLock } from '@/lib/entity-lock.js';
import type { EntityLock } from '@/lib/entity-lock.js';
import { logger as defaultLogger } from '@/lib/logger.js';
import type { Logger } from '@/lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  BillingOutcome,
  CancelSubscriptionParams,
  ChangePlanParams,
  Cents,
  CurrencyCode,
  Failure,
  FeatureUsage,
  Payment,
  PaymentMethod,
  Plan,
  ReactivateSubscriptionParams,
  RecordPaymentParams,
  Result,
  SubscribeParams,
  Subscription,
  SubscriptionOverview,
  SubscriptionStatus,
  TrackUsageParams,
  UpdateSubscriptionStatusParams,
  UsageRecord,
  UsageSummary,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

import {
  canTransitionSubscription,
  daysRemaining,
  isBillable,
  isInTrial,
  hasPeriodEnded,
  isLapsed,
  isLive,
  isOverdue,
  isSubscriptionActive,
  rollPeriod,
  startPeriod,
} from './subscription.cycle.js';

export const DEFAULT_CURRENCY: CurrencyCode = 'INR';
export const MAX_PAYMENT_RETRIES = 3;
const ADMIN_CANCELLATION_REASON = 'Admin action';

/**
 * Subscription fields fixed at creation
 */
export type NewSubscription = Omit<
  Subscription,
  'id' | 'version' | 'createdAt' | 'updatedAt'
>;

/**
 * Mutable subscription fields
 */
export type SubscriptionPatch = Partial<
  Pick<
    Subscription,
    | 'planId'
    | 'status'
    | 'endDate'
    | 'currentPeriodStart'
    | 'currentPeriodEnd'
    | 'nextBillingDate'
    | 'amount'
    | 'autoRenew'
    | 'cancelledAt'
    | 'cancellationReason'
    | 'scheduledPlanChange'
  >
> & { updatedAt: Date };

export type NewPayment = Omit<Payment, 'id' | 'createdAt' | 'updatedAt'>;

export type PaymentPatch = Partial<
  Pick<
    Payment,
    'status' | 'transactionId' | 'paymentDate' | 'failureReason' | 'retryCount'
  >
> & { updatedAt: Date };

export type NewUsageRecord = Omit<UsageRecord, 'id' | 'usageCount' | 'metadata'>;

/**
 * Database abstraction interface for SubscriptionService
 */
export interface SubscriptionServiceDb {
  vendorExists: (vendorId: string) => Promise<boolean>;
  listPlans: () => Promise<Plan[]>;
  getPlan: (planId: string) => Promise<Plan | null>;
  getSubscription: (subscriptionId: string) => Promise<Subscription | null>;
  /**
   * Newest first
   */
  findSubscriptionsByVendor: (vendorId: string) => Promise<Subscription[]>;
  findSubscriptionsByStatus: (
    statuses: SubscriptionStatus[]
  ) => Promise<Subscription[]>;
  createSubscription: (subscription: NewSubscription) => Promise<Subscription>;
  /**
   * Compare-and-set on version; null when the stored version moved on
   */
  updateSubscription: (
    subscriptionId: string,
    expectedVersion: number,
    patch: SubscriptionPatch
  ) => Promise<Subscription | null>;
  getPayment: (paymentId: string) => Promise<Payment | null>;
  /**
   * Newest first
   */
  listPaymentsByVendor: (vendorId: string) => Promise<Payment[]>;
  createPayment: (payment: NewPayment) => Promise<Payment>;
  updatePayment: (paymentId: string, patch: PaymentPatch) => Promise<Payment>;
  /**
   * Complete the payment and roll the subscription in one transaction.
   * Null (and nothing written) when the subscription version moved on.
   */
  completePaymentAndRollPeriod: (params: {
    paymentId: string;
    payment: PaymentPatch;
    subscriptionId: string;
    expectedVersion: number;
    subscription: SubscriptionPatch;
  }) => Promise<BillingOutcome | null>;
  /**
   * One record per (subscription, feature, periodStart)
   */
  getOrCreateUsageRecord: (record: NewUsageRecord) => Promise<UsageRecord>;
  /**
   * usageCount += increment only if the limit allows it.
   * Returns the record as stored after the attempt.
   */
  incrementUsageWithinLimit: (
    recordId: string,
    increment: number,
    metadata: Record<string, unknown> | null
  ) => Promise<{ applied: boolean; record: UsageRecord }>;
  listUsageRecords: (
    subscriptionId: string,
    periodStart: Date
  ) => Promise<UsageRecord[]>;
}

/**
 * Minimal AuditService interface
 */
export interface SubscriptionServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface ChargeRequest {
  paymentId: string;
  subscriptionId: string;
  vendorId: string;
  amount: Cents;
  currency: CurrencyCode;
  paymentMethod: PaymentMethod;
  /**
   * 0 for the first charge, then the retry number
   */
  attempt: number;
}

export type ChargeResult =
  | { ok: true; transactionId: string }
  | { ok: false; reason: string };

/**
 * Subscription ids moved by one sweep
 */
export interface LapseSweep {
  expired: string[];
  /**
   * Period or trial ended unpaid
   */
  suspended: string[];
}

/**
 * External payment processor
 */
export interface SubscriptionServiceGateway {
  charge(request: ChargeRequest): Promise<ChargeResult>;
}

/**
 * SubscriptionService interface
 */
export interface SubscriptionService {
  listPlans(actor: ActorContext): Promise<Result<Plan[]>>;
  getPlan(actor: ActorContext, planId: string): Promise<Result<Plan>>;
  subscribe(
    actor: ActorContext,
    params: SubscribeParams
  ): Promise<Result<Subscription>>;
  getVendorSubscription(
    actor: ActorContext,
    vendorId: string
  ): Promise<Result<SubscriptionOverview>>;
  recordPaymentAndRollPeriod(
    actor: ActorContext,
    params: RecordPaymentParams
  ): Promise<Result<BillingOutcome>>;
  retryPayment(
    actor: ActorContext,
    paymentId: string
  ): Promise<Result<BillingOutcome>>;
  refundPayment(
    actor: ActorContext,
    paymentId: string,
    reason?: string
  ): Promise<Result<Payment>>;
  listPayments(actor: ActorContext, vendorId: string): Promise<Result<Payment[]>>;
  cancel(
    actor: ActorContext,
    params: CancelSubscriptionParams
  ): Promise<Result<Subscription>>;
  reactivate(
    actor: ActorContext,
    params: ReactivateSubscriptionParams
  ): Promise<Result<Subscription>>;
  changePlan(
    actor: ActorContext,
    params: ChangePlanParams
  ): Promise<Result<Subscription>>;
  updateStatus(
    actor: ActorContext,
    params: UpdateSubscriptionStatusParams
  ): Promise<Result<Subscription>>;
  expireLapsedSubscriptions(
    actor: ActorContext
  ): Promise<Result<LapseSweep>>;
  trackUsage(
    actor: ActorContext,
    params: TrackUsageParams
  ): Promise<Result<UsageRecord>>;
  getUsageSummary(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<UsageSummary>>;
}

/**
 * Create SubscriptionService instance
 */
export function createSubscriptionService(deps: {
  db: SubscriptionServiceDb;
  auditService: SubscriptionServiceAudit;
  gateway: SubscriptionServiceGateway;
  clock?: Clock;
  lock?: EntityLock;
  logger?: Logger;
}): SubscriptionService {
  const { db, auditService, gateway } = deps;
  const clock = deps.clock ?? systemClock;
  const lock = deps.lock ?? createLocalEntityLock();
  const log = (deps.logger ?? defaultLogger).child({
    component: 'subscriptions',
  });

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  const subscriptionKey = (id: string): string => `subscription:${id}`;
  const vendorKey = (vendorId: string): string =>
    `vendor:${vendorId}:subscription`;

  function subscriptionNotFound(subscriptionId: string): Failure {
    return failure('NOT_FOUND', `Subscription not found: ${subscriptionId}`, {
      subscriptionId,
    });
  }

  function planNotFound(planId: string): Failure {
    return failure('NOT_FOUND', `Plan not found: ${planId}`, { planId });
  }

  function versionConflict(
    subscription: Subscription,
    expected: number
  ): Failure {
    return failure(
      'VERSION_CONFLICT',
      `Subscription ${subscription.id} was modified concurrently`,
      {
        subscriptionId: subscription.id,
        expectedVersion: expected,
        currentVersion: subscription.version,
      }
    );
  }

  function invalidState(
    subscription: Subscription,
    operation: string
  ): Failure {
    return failure(
      'INVALID_STATE',
      `Cannot ${operation} a subscription in status ${subscription.status}`,
      { subscriptionId: subscription.id, status: subscription.status }
    );
  }

  /**
   * Another live subscription for the same vendor, if any
   */
  async function findOtherLive(
    subscription: Subscription
  ): Promise<Subscription | null> {
    const all = await db.findSubscriptionsByVendor(subscription.vendorId);
    return (
      all.find((other) => other.id !== subscription.id && isLive(other.status)) ??
      null
    );
  }

  function liveConflict(vendorId: string, existing: Subscription): Failure {
    return failure(
      'CONFLICT',
      'Vendor already has an active subscription',
      { vendorId, subscriptionId: existing.id, status: existing.status }
    );
  }

  async function persist(
    subscription: Subscription,
    patch: Omit<SubscriptionPatch, 'updatedAt'>,
    now: Date
  ): Promise<Result<Subscription>> {
    const updated = await db.updateSubscription(
      subscription.id,
      subscription.version,
      { ...patch, updatedAt: now }
    );
    if (updated === null) {
      return versionConflict(subscription, subscription.version);
    }
    return success(updated);
  }

  /**
   * Load under the subscription lock and check the caller's version
   */
  async function withSubscription<T>(
    subscriptionId: string,
    expectedVersion: number | undefined,
    task: (subscription: Subscription) => Promise<Result<T>>
  ): Promise<Result<T>> {
    return lock.runExclusive(subscriptionKey(subscriptionId), async () => {
      const subscription = await db.getSubscription(subscriptionId);
      if (subscription === null) {
        return subscriptionNotFound(subscriptionId);
      }
      if (
        expectedVersion !== undefined &&
        expectedVersion !== subscription.version
      ) {
        return versionConflict(subscription, expectedVersion);
      }
      return task(subscription);
    });
  }

  /**
   * Vendor lock first, then subscription lock. Used where the
   * one-live-per-vendor rule is checked.
   */
  async function withVendorAndSubscription<T>(
    subscriptionId: string,
    expectedVersion: number | undefined,
    task: (subscription: Subscription) => Promise<Result<T>>
  ): Promise<Result<T>> {
    const initial = await db.getSubscription(subscriptionId);
    if (initial === null) {
      return subscriptionNotFound(subscriptionId);
    }
    return lock.runExclusive(vendorKey(initial.vendorId), () =>
      withSubscription(subscriptionId, expectedVersion, task)
    );
  }

  /**
   * A settled payment for the current period makes the subscription
   * active, which must not leave the vendor with two live subscriptions
   */
  async function checkSettlementKeepsOneLive(
    subscription: Subscription,
    billingPeriodStart: Date
  ): Promise<Failure | null> {
    if (
      isLive(subscription.status) ||
      billingPeriodStart.getTime() !== subscription.currentPeriodStart.getTime()
    ) {
      return null;
    }
    const other = await findOtherLive(subscription);
    return other === null ? null : liveConflict(subscription.vendorId, other);
  }

  /**
   * Rollover patch applied on successful payment, including any plan
   * change scheduled for this boundary
   */
  function rolloverPatch(
    subscription: Subscription,
    scheduledPlan: Plan | null
  ): Omit<SubscriptionPatch, 'updatedAt'> {
    const patch: Omit<SubscriptionPatch, 'updatedAt'> = {
      ...rollPeriod(subscription),
      status: 'active',
    };
    if (scheduledPlan !== null) {
      patch.planId = scheduledPlan.id;
      patch.amount = scheduledPlan.basePrice;
      patch.scheduledPlanChange = null;
    }
    return patch;
  }

  /**
   * Plan a scheduled change switches to at this rollover, if due
   */
  async function loadDuePlanChange(
    subscription: Subscription
  ): Promise<Result<Plan | null>> {
    const scheduled = subscription.scheduledPlanChange;
    if (
      scheduled === null ||
      scheduled.effectiveAt.getTime() > subscription.currentPeriodEnd.getTime()
    ) {
      return success(null);
    }
    const plan = await db.getPlan(scheduled.newPlanId);
    if (plan === null) {
      return planNotFound(scheduled.newPlanId);
    }
    return success(plan);
  }

  /**
   * Charge a pending payment and settle it.
   * Rolls the period only when the payment covers the current period.
   */
  async function settlePayment(
    actor: ActorContext,
    subscription: Subscription,
    payment: Payment,
    scheduledPlan: Plan | null
  ): Promise<Result<BillingOutcome>> {
    const charge = await gateway.charge({
      paymentId: payment.id,
      subscriptionId: subscription.id,
      vendorId: subscription.vendorId,
      amount: payment.amount,
      currency: payment.currency,
      paymentMethod: payment.paymentMethod,
      attempt: payment.retryCount,
    });
    const now = clock.now();

    if (!charge.ok) {
      const failed = await db.updatePayment(payment.id, {
        status: 'failed',
        failureReason: charge.reason,
        updatedAt: now,
      });
      await auditService.log(actor, {
        action: 'subscription.payment_failed',
        resourceType: 'payment',
        resourceId: payment.id,
        details: {
          subscriptionId: subscription.id,
          reason: charge.reason,
          retryCount: failed.retryCount,
        },
      });
      log.warn(
        { paymentId: payment.id, subscriptionId: subscription.id, reason: charge.reason },
        'Subscription payment failed'
      );
      return success({ payment: failed, subscription });
    }

    const paymentPatch: PaymentPatch = {
      status: 'completed',
      transactionId: charge.transactionId,
      paymentDate: now,
      failureReason: null,
      updatedAt: now,
    };

    const coversCurrentPeriod =
      payment.billingPeriodStart.getTime() ===
      subscription.currentPeriodStart.getTime();

    if (!coversCurrentPeriod) {
      const completed = await db.updatePayment(payment.id, paymentPatch);
      await auditService.log(actor, {
        action: 'subscription.payment_completed',
        resourceType: 'payment',
        resourceId: payment.id,
        details: {
          subscriptionId: subscription.id,
          transactionId: charge.transactionId,
          rolled: false,
        },
      });
      return success({ payment: completed, subscription });
    }

    const outcome = await db.completePaymentAndRollPeriod({
      paymentId: payment.id,
      payment: paymentPatch,
      subscriptionId: subscription.id,
      expectedVersion: subscription.version,
      subscription: {
        ...rolloverPatch(subscription, scheduledPlan),
        updatedAt: now,
      },
    });
    if (outcome === null) {
      log.error(
        { paymentId: payment.id, subscriptionId: subscription.id },
        'Payment charged but subscription changed before rollover'
      );
      return failure(
        'VERSION_CONFLICT',
        `Subscription ${subscription.id} was modified concurrently`,
        {
          subscriptionId: subscription.id,
          paymentId: payment.id,
          transactionId: charge.transactionId,
        }
      );
    }

    await auditService.log(actor, {
      action: 'subscription.payment_completed',
      resourceType: 'payment',
      resourceId: payment.id,
      details: {
        subscriptionId: subscription.id,
        transactionId: charge.transactionId,
        rolled: true,
        periodStart: outcome.subscription.currentPeriodStart.toISOString(),
        periodEnd: outcome.subscription.currentPeriodEnd.toISOString(),
        ...(scheduledPlan !== null ? { planChangedTo: scheduledPlan.id } : {}),
      },
    });
    log.info(
      {
        subscriptionId: subscription.id,
        paymentId: payment.id,
        currentPeriodEnd: outcome.subscription.currentPeriodEnd.toISOString(),
      },
      'Subscription period rolled'
    );
    return success(outcome);
  }

  type LapsedStatus = keyof LapseSweep;

  function lapseStatus(
    subscription: Subscription,
    now: Date
  ): LapsedStatus | null {
    if (isLapsed(subscription, now)) {
      return 'expired';
    }
    if (isOverdue(subscription, now)) {
      return 'suspended';
    }
    return null;
  }

  function featureUsage(
    featureName: string,
    currentUsage: number,
    usageLimit: number | null
  ): FeatureUsage {
    let usagePercentage: number | null = null;
    if (usageLimit !== null) {
      usagePercentage =
        usageLimit === 0
          ? 100
          : Math.round((currentUsage * 10000) / usageLimit) / 100;
    }
    return {
      featureName,
      currentUsage,
      usageLimit,
      usagePercentage,
      isLimitExceeded: usageLimit !== null && currentUsage >= usageLimit,
    };
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    async listPlans(_actor: ActorContext): Promise<Result<Plan[]>> {
      const plans = await db.listPlans();
      return success(plans);
    },

    async getPlan(_actor: ActorContext, planId: string): Promise<Result<Plan>> {
      const plan = await db.getPlan(planId);
      if (plan === null) {
        return planNotFound(planId);
      }
      return success(plan);
    },

    async subscribe(
      actor: ActorContext,
      params: SubscribeParams
    ): Promise<Result<Subscription>> {
      return lock.runExclusive(vendorKey(params.vendorId), async () => {
        if (!(await db.vendorExists(params.vendorId))) {
          return failure('NOT_FOUND', `Vendor not found: ${params.vendorId}`, {
            vendorId: params.vendorId,
          });
        }

        const plan = await db.getPlan(params.planId);
        if (plan === null || !plan.isActive) {
          return planNotFound(params.planId);
        }

        const existing = (
          await db.findSubscriptionsByVendor(params.vendorId)
        ).find((subscription) => isLive(subscription.status));
        if (existing !== undefined) {
          return liveConflict(params.vendorId, existing);
        }

        const billingCycle = params.billingCycle ?? plan.billingCycle;
        const now = clock.now();
        const period = startPeriod(plan, billingCycle, params.startTrial, now);

        const subscription = await db.createSubscription({
          vendorId: params.vendorId,
          planId: plan.id,
          billingCycle,
          ...period,
          endDate: null,
          amount: plan.basePrice,
          currency: DEFAULT_CURRENCY,
          autoRenew: true,
          cancelledAt: null,
          cancellationReason: null,
          scheduledPlanChange: null,
        });

        await auditService.log(actor, {
          action: 'subscription.created',
          resourceType: 'subscription',
          resourceId: subscription.id,
          details: {
            vendorId: params.vendorId,
            planId: plan.id,
            status: subscription.status,
            billingCycle,
          },
        });
        log.info(
          {
            subscriptionId: subscription.id,
            vendorId: params.vendorId,
            status: subscription.status,
          },
          'Subscription created'
        );

        return success(subscription);
      });
    },

    async getVendorSubscription(
      _actor: ActorContext,
      vendorId: string
    ): Promise<Result<SubscriptionOverview>> {
      const subscriptions = await db.findSubscriptionsByVendor(vendorId);
      const subscription =
        subscriptions.find((candidate) => isLive(candidate.status)) ??
        subscriptions[0];
      if (subscription === undefined) {
        return failure('NOT_FOUND', 'No subscription found for vendor', {
          vendorId,
        });
      }

      const plan = await db.getPlan(subscription.planId);
      if (plan === null) {
        return planNotFound(subscription.planId);
      }

      const now = clock.now();
      return success({
        subscription,
        plan,
        isActive: isSubscriptionActive(subscription, now),
        isTrial: isInTrial(subscription, now),
        daysRemaining: daysRemaining(subscription, now),
      });
    },

    async recordPaymentAndRollPeriod(
      actor: ActorContext,
      params: RecordPaymentParams
    ): Promise<Result<BillingOutcome>> {
      return withVendorAndSubscription(
        params.subscriptionId,
        params.expectedVersion,
        async (subscription) => {
          if (!isBillable(subscription.status)) {
            return invalidState(subscription, 'bill');
          }
          const conflict = await checkSettlementKeepsOneLive(
            subscription,
            subscription.currentPeriodStart
          );
          if (conflict !== null) {
            return conflict;
          }

          const scheduledPlan = await loadDuePlanChange(subscription);
          if (!scheduledPlan.success) {
            return scheduledPlan;
          }

          const payment = await db.createPayment({
            subscriptionId: subscription.id,
            vendorId: subscription.vendorId,
            amount: subscription.amount,
            currency: subscription.currency,
            status: 'pending',
            paymentMethod: params.paymentMethod,
            transactionId: null,
            paymentDate: null,
            dueDate: subscription.nextBillingDate,
            billingPeriodStart: subscription.currentPeriodStart,
            billingPeriodEnd: subscription.currentPeriodEnd,
            failureReason: null,
            retryCount: 0,
          });

          return settlePayment(actor, subscription, payment, scheduledPlan.data);
        }
      );
    },

    async retryPayment(
      actor: ActorContext,
      paymentId: string
    ): Promise<Result<BillingOutcome>> {
      const initial = await db.getPayment(paymentId);
      if (initial === null) {
        return failure('NOT_FOUND', `Payment not found: ${paymentId}`, {
          paymentId,
        });
      }

      return withVendorAndSubscription(
        initial.subscriptionId,
        undefined,
        async (subscription) => {
          const payment = await db.getPayment(paymentId);
          if (payment === null) {
            return failure('NOT_FOUND', `Payment not found: ${paymentId}`, {
              paymentId,
            });
          }
          if (payment.status !== 'failed') {
            return failure(
              'INVALID_STATE',
              `Only failed payments can be retried (status ${payment.status})`,
              { paymentId, status: payment.status }
            );
          }
          if (payment.retryCount >= MAX_PAYMENT_RETRIES) {
            return failure('LIMIT_EXCEEDED', 'Maximum retry attempts exceeded', {
              paymentId,
              retryCount: payment.retryCount,
              maxRetries: MAX_PAYMENT_RETRIES,
            });
          }
          if (!isBillable(subscription.status)) {
            return invalidState(subscription, 'bill');
          }
          const conflict = await checkSettlementKeepsOneLive(
            subscription,
            payment.billingPeriodStart
          );
          if (conflict !== null) {
            return conflict;
          }

          const scheduledPlan = await loadDuePlanChange(subscription);
          if (!scheduledPlan.success) {
            return scheduledPlan;
          }

          const pending = await db.updatePayment(paymentId, {
            status: 'pending',
            retryCount: payment.retryCount + 1,
            failureReason: null,
            updatedAt: clock.now(),
          });

          return settlePayment(actor, subscription, pending, scheduledPlan.data);
        }
      );
    },

    async refundPayment(
      actor: ActorContext,
      paymentId: string,
      reason?: string
    ): Promise<Result<Payment>> {
      const initial = await db.getPayment(paymentId);
      if (initial === null) {
        return failure('NOT_FOUND', `Payment not found: ${paymentId}`, {
          paymentId,
        });
      }

      return lock.runExclusive(subscriptionKey(initial.subscriptionId), async () => {
        const payment = await db.getPayment(paymentId);
        if (payment === null) {
          return failure('NOT_FOUND', `Payment not found: ${paymentId}`, {
            paymentId,
          });
        }
        if (payment.status !== 'completed') {
          return failure(
            'INVALID_STATE',
            `Only completed payments can be refunded (status ${payment.status})`,
            { paymentId, status: payment.status }
          );
        }

        const refunded = await db.updatePayment(paymentId, {
          status: 'refunded',
          updatedAt: clock.now(),
        });

        await auditService.log(actor, {
          action: 'subscription.payment_refunded',
          resourceType: 'payment',
          resourceId: paymentId,
          details: {
            subscriptionId: payment.subscriptionId,
            amount: payment.amount,
            reason: reason ?? null,
          },
        });
        log.info({ paymentId }, 'Subscription payment refunded');

        return success(refunded);
      });
    },

    async listPayments(
      _actor: ActorContext,
      vendorId: string
    ): Promise<Result<Payment[]>> {
      const payments = await db.listPaymentsByVendor(vendorId);
      return success(payments);
    },

    async cancel(
      actor: ActorContext,
      params: CancelSubscriptionParams
    ): Promise<Result<Subscription>> {
      return withSubscription(
        params.subscriptionId,
        params.expectedVersion,
        async (subscription) => {
          if (!isBillable(subscription.status)) {
            return invalidState(subscription, 'cancel');
          }

          const now = clock.now();
          const result = await persist(
            subscription,
            {
              status: 'cancelled',
              cancelledAt: now,
              cancellationReason: params.reason ?? null,
              autoRenew: false,
              endDate: params.immediate ? now : subscription.currentPeriodEnd,
              scheduledPlanChange: null,
            },
            now
          );
          if (!result.success) {
            return result;
          }

          await auditService.log(actor, {
            action: 'subscription.cancelled',
            resourceType: 'subscription',
            resourceId: subscription.id,
            details: {
              previousStatus: subscription.status,
              immediate: params.immediate,
              reason: params.reason ?? null,
              endDate: result.data.endDate?.toISOString() ?? null,
            },
          });
          log.info(
            { subscriptionId: subscription.id, immediate: params.immediate },
            'Subscription cancelled'
          );

          return result;
        }
      );
    },

    async reactivate(
      actor: ActorContext,
      params: ReactivateSubscriptionParams
    ): Promise<Result<Subscription>> {
      return withVendorAndSubscription(
        params.subscriptionId,
        params.expectedVersion,
        async (subscription) => {
          if (subscription.status !== 'cancelled') {
            return invalidState(subscription, 'reactivate');
          }

          const now = clock.now();
          if (
            subscription.endDate !== null &&
            subscription.endDate.getTime() < now.getTime()
          ) {
            return failure(
              'EXPIRED',
              'Subscription has expired and cannot be reactivated',
              {
                subscriptionId: subscription.id,
                endDate: subscription.endDate.toISOString(),
              }
            );
          }

          const other = await findOtherLive(subscription);
          if (other !== null) {
            return liveConflict(subscription.vendorId, other);
          }

          const result = await persist(
            subscription,
            {
              status: 'active',
              cancelledAt: null,
              cancellationReason: null,
              endDate: null,
              autoRenew: true,
            },
            now
          );
          if (!result.success) {
            return result;
          }

          await auditService.log(actor, {
            action: 'subscription.reactivated',
            resourceType: 'subscription',
            resourceId: subscription.id,
          });
          log.info({ subscriptionId: subscription.id }, 'Subscription reactivated');

          return result;
        }
      );
    },

    async changePlan(
      actor: ActorContext,
      params: ChangePlanParams
    ): Promise<Result<Subscription>> {
      return withSubscription(
        params.subscriptionId,
        undefined,
        async (subscription) => {
          if (!isLive(subscription.status)) {
            return invalidState(subscription, 'change the plan of');
          }

          const newPlan = await db.getPlan(params.newPlanId);
          if (newPlan === null || !newPlan.isActive) {
            return planNotFound(params.newPlanId);
          }
          if (newPlan.id === subscription.planId) {
            return failure(
              'VALIDATION_ERROR',
              'Subscription is already on this plan',
              { subscriptionId: subscription.id, planId: newPlan.id }
            );
          }

          const now = clock.now();
          const patch: Omit<SubscriptionPatch, 'updatedAt'> = params.immediate
            ? {
                planId: newPlan.id,
                amount: newPlan.basePrice,
                scheduledPlanChange: null,
              }
            : {
                scheduledPlanChange: {
                  newPlanId: newPlan.id,
                  previousPlanId: subscription.planId,
                  effectiveAt: subscription.currentPeriodEnd,
                },
              };

          const result = await persist(subscription, patch, now);
          if (!result.success) {
            return result;
          }

          await auditService.log(actor, {
            action: params.immediate
              ? 'subscription.plan_changed'
              : 'subscription.plan_change_scheduled',
            resourceType: 'subscription',
            resourceId: subscription.id,
            details: {
              previousPlanId: subscription.planId,
              newPlanId: newPlan.id,
              effectiveAt: params.immediate
                ? now.toISOString()
                : subscription.currentPeriodEnd.toISOString(),
            },
          });

          return result;
        }
      );
    },

    async updateStatus(
      actor: ActorContext,
      params: UpdateSubscriptionStatusParams
    ): Promise<Result<Subscription>> {
      return withVendorAndSubscription(
        params.subscriptionId,
        undefined,
        async (subscription) => {
          const from = subscription.status;
          const to = params.status;
          if (!canTransitionSubscription(from, to)) {
            return failure(
              'INVALID_TRANSITION',
              `Cannot transition subscription from ${from} to ${to}`,
              { subscriptionId: subscription.id, from, to }
            );
          }

          const now = clock.now();
          let patch: Omit<SubscriptionPatch, 'updatedAt'>;
          switch (to) {
            case 'cancelled':
              patch = {
                status: to,
                cancelledAt: now,
                cancellationReason: params.reason ?? ADMIN_CANCELLATION_REASON,
                autoRenew: false,
                scheduledPlanChange: null,
              };
              break;
            case 'suspended':
              patch = { status: to, autoRenew: false };
              break;
            case 'active': {
              if (
                from === 'cancelled' &&
                subscription.endDate !== null &&
                subscription.endDate.getTime() < now.getTime()
              ) {
                return failure(
                  'EXPIRED',
                  'Subscription has expired and cannot be reactivated',
                  {
                    subscriptionId: subscription.id,
                    endDate: subscription.endDate.toISOString(),
                  }
                );
              }
              const other = await findOtherLive(subscription);
              if (other !== null) {
                return liveConflict(subscription.vendorId, other);
              }
              patch = {
                status: to,
                cancelledAt: null,
                cancellationReason: null,
                autoRenew: true,
              };
              if (from === 'cancelled') {
                patch.endDate = null;
              }
              break;
            }
            default:
              patch = { status: to };
              break;
          }

          const result = await persist(subscription, patch, now);
          if (!result.success) {
            return result;
          }

          await auditService.log(actor, {
            action: 'subscription.status_updated',
            resourceType: 'subscription',
            resourceId: subscription.id,
            details: {
              previousStatus: from,
              newStatus: to,
              reason: params.reason ?? null,
            },
          });
          log.info(
            { subscriptionId: subscription.id, from, to },
            'Subscription status updated'
          );

          return result;
        }
      );
    },

    async expireLapsedSubscriptions(
      actor: ActorContext
    ): Promise<Result<LapseSweep>> {
      const candidates = await db.findSubscriptionsByStatus(['active', 'trial']);
      const sweep: LapseSweep = { expired: [], suspended: [] };

      for (const candidate of candidates) {
        if (lapseStatus(candidate, clock.now()) === null) {
          continue;
        }

        const result = await withSubscription<LapsedStatus | null>(
          candidate.id,
          undefined,
          async (subscription) => {
            const now = clock.now();
            const status = lapseStatus(subscription, now);
            if (status === null) {
              return success(null);
            }
            const updated = await persist(subscription, { status }, now);
            if (!updated.success) {
              return updated;
            }
            await auditService.log(actor, {
              action: `subscription.${status}`,
              resourceType: 'subscription',
              resourceId: subscription.id,
              details: {
                previousStatus: subscription.status,
                currentPeriodEnd: subscription.currentPeriodEnd.toISOString(),
              },
            });
            return success(status);
          }
        );

        if (!result.success) {
          log.warn(
            { subscriptionId: candidate.id, error: result.error },
            'Subscription not swept this run'
          );
          continue;
        }
        if (result.data !== null) {
          sweep[result.data].push(candidate.id);
        }
      }

      if (sweep.expired.length > 0 || sweep.suspended.length > 0) {
        log.info(
          { expired: sweep.expired.length, suspended: sweep.suspended.length },
          'Swept lapsed subscriptions'
        );
      }
      return success(sweep);
    },

    async trackUsage(
      _actor: ActorContext,
      params: TrackUsageParams
    ): Promise<Result<UsageRecord>> {
      const { featureName, increment } = params;
      if (featureName.trim() === '') {
        return failure('VALIDATION_ERROR', 'featureName is required');
      }
      if (!Number.isSafeInteger(increment) || increment <= 0) {
        return failure(
          'VALIDATION_ERROR',
          'Usage increment must be a positive integer',
          { featureName, increment }
        );
      }

      const subscription = await db.getSubscription(params.subscriptionId);
      if (subscription === null) {
        return subscriptionNotFound(params.subscriptionId);
      }
      if (!isLive(subscription.status)) {
        return invalidState(subscription, 'track usage for');
      }
      if (hasPeriodEnded(subscription, clock.now())) {
        return failure(
          'INVALID_STATE',
          'Billing period has ended; usage is not tracked until it renews',
          {
            subscriptionId: subscription.id,
            currentPeriodEnd: subscription.currentPeriodEnd.toISOString(),
          }
        );
      }

      const plan = await db.getPlan(subscription.planId);
      if (plan === null) {
        return planNotFound(subscription.planId);
      }

      const feature = plan.features[featureName];
      if (feature !== undefined && !feature.enabled) {
        return failure(
          'VALIDATION_ERROR',
          `Feature ${featureName} is not enabled on this plan`,
          { featureName, planId: plan.id }
        );
      }

      const record = await db.getOrCreateUsageRecord({
        subscriptionId: subscription.id,
        vendorId: subscription.vendorId,
        featureName,
        usageLimit: feature?.limit ?? null,
        periodStart: subscription.currentPeriodStart,
        periodEnd: subscription.currentPeriodEnd,
      });

      const attempt = await db.incrementUsageWithinLimit(
        record.id,
        increment,
        params.metadata ?? null
      );
      if (!attempt.applied) {
        const current = attempt.record;
        return failure(
          'LIMIT_EXCEEDED',
          `Usage limit exceeded for ${featureName}`,
          {
            featureName,
            currentUsage: current.usageCount,
            usageLimit: current.usageLimit,
            attemptedIncrement: increment,
            wouldResultIn: current.usageCount + increment,
          }
        );
      }

      log.debug(
        {
          subscriptionId: subscription.id,
          featureName,
          usageCount: attempt.record.usageCount,
        },
        'Usage tracked'
      );
      return success(attempt.record);
    },

    async getUsageSummary(
      _actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<UsageSummary>> {
      const subscription = await db.getSubscription(subscriptionId);
      if (subscription === null) {
        return subscriptionNotFound(subscriptionId);
      }

      const plan = await db.getPlan(subscription.planId);
      if (plan === null) {
        return planNotFound(subscription.planId);
      }

      const records = await db.listUsageRecords(
        subscription.id,
        subscription.currentPeriodStart
      );
      const byFeature = new Map(
        records.map((record) => [record.featureName, record])
      );

      const features: FeatureUsage[] = records.map((record) =>
        featureUsage(record.featureName, record.usageCount, record.usageLimit)
      );
      for (const [featureName, feature] of Object.entries(plan.features)) {
        if (feature.enabled && !byFeature.has(featureName)) {
          features.push(featureUsage(featureName, 0, feature.limit));
        }
      }
      features.sort((a, b) => a.featureName.localeCompare(b.featureName));

      return success({
        subscriptionId: subscription.id,
        periodStart: subscription.currentPeriodStart,
        periodEnd: subscription.currentPeriodEnd,
        daysRemaining: daysUntil(subscription.currentPeriodEnd, clock.now()),
        features,
      });
    },
  };
}
