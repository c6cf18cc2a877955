/**
 * Subscription lifecycle rules
 *
 * Period arithmetic, the status table and the access checks computed
 * against a clock. Pure functions, no persistence.
 */

import { addDays, daysUntil } from '@/lib/clock.js';
import type {
  BillingCycle,
  Plan,
  Subscription,
  SubscriptionStatus,
} from '@/types/index.js';

/**
 * Period length in days per billing cycle
 */
export const CYCLE_DAYS: Readonly<Record<BillingCycle, number>> = {
  monthly: 30,
  quarterly: 90,
  annually: 365,
  lifetime: 36500,
};

export const SUBSCRIPTION_STATUS_TRANSITIONS: Readonly<
  Record<SubscriptionStatus, readonly SubscriptionStatus[]>
> = {
  trial: ['active', 'suspended', 'cancelled', 'expired'],
  active: ['suspended', 'cancelled', 'expired'],
  suspended: ['active', 'cancelled'],
  // reactivation only; the window is checked by the caller
  cancelled: ['active'],
  expired: [],
};

/**
 * Statuses that can be charged or cancelled
 */
export const BILLABLE_STATUSES: readonly SubscriptionStatus[] = [
  'trial',
  'active',
  'suspended',
];

/**
 * Statuses that count towards the one-per-vendor rule
 */
export const LIVE_STATUSES: readonly SubscriptionStatus[] = ['active', 'trial'];

export function canTransitionSubscription(
  from: SubscriptionStatus,
  to: SubscriptionStatus
): boolean {
  return SUBSCRIPTION_STATUS_TRANSITIONS[from].includes(to);
}

export function isBillable(status: SubscriptionStatus): boolean {
  return BILLABLE_STATUSES.includes(status);
}

export function isLive(status: SubscriptionStatus): boolean {
  return LIVE_STATUSES.includes(status);
}

export interface InitialPeriod {
  status: Extract<SubscriptionStatus, 'trial' | 'active'>;
  startDate: Date;
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
  trialEndDate: Date | null;
  nextBillingDate: Date;
}

/**
 * First period of a new subscription. A trial is only granted when asked
 * for and the plan defines trial days.
 */
export function startPeriod(
  plan: Pick<Plan, 'trialDays'>,
  billingCycle: BillingCycle,
  startTrial: boolean,
  now: Date
): InitialPeriod {
  if (startTrial && plan.trialDays !== null && plan.trialDays > 0) {
    const trialEnd = addDays(now, plan.trialDays);
    return {
      status: 'trial',
      startDate: now,
      currentPeriodStart: now,
      currentPeriodEnd: trialEnd,
      trialEndDate: trialEnd,
      nextBillingDate: trialEnd,
    };
  }

  const periodEnd = addDays(now, CYCLE_DAYS[billingCycle]);
  return {
    status: 'active',
    startDate: now,
    currentPeriodStart: now,
    currentPeriodEnd: periodEnd,
    trialEndDate: null,
    nextBillingDate: periodEnd,
  };
}

export interface NextPeriod {
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
  nextBillingDate: Date;
}

/**
 * The period after the current one. Derived from the previous period end
 * only, so late or early payments never shift the schedule.
 */
export function rollPeriod(
  subscription: Pick<Subscription, 'currentPeriodEnd' | 'billingCycle'>
): NextPeriod {
  const start = subscription.currentPeriodEnd;
  const end = addDays(start, CYCLE_DAYS[subscription.billingCycle]);
  return {
    currentPeriodStart: start,
    currentPeriodEnd: end,
    nextBillingDate: end,
  };
}

export function hasPeriodEnded(
  subscription: Pick<Subscription, 'currentPeriodEnd'>,
  now: Date
): boolean {
  return subscription.currentPeriodEnd.getTime() < now.getTime();
}

/**
 * Access check. A subscription cancelled at period end keeps access
 * until its endDate. A live subscription whose period ended unpaid has
 * no access, even before the sweep suspends it.
 */
export function isSubscriptionActive(
  subscription: Pick<Subscription, 'status' | 'endDate' | 'currentPeriodEnd'>,
  now: Date
): boolean {
  const { status, endDate } = subscription;
  if (isLive(status)) {
    return (
      (endDate === null || endDate.getTime() >= now.getTime()) &&
      !hasPeriodEnded(subscription, now)
    );
  }
  if (status === 'cancelled') {
    return endDate !== null && endDate.getTime() >= now.getTime();
  }
  return false;
}

export function isInTrial(
  subscription: Pick<Subscription, 'status' | 'trialEndDate'>,
  now: Date
): boolean {
  return (
    subscription.status === 'trial' &&
    subscription.trialEndDate !== null &&
    subscription.trialEndDate.getTime() > now.getTime()
  );
}

/**
 * Whole days until endDate; null while no end is set
 */
export function daysRemaining(
  subscription: Pick<Subscription, 'endDate'>,
  now: Date
): number | null {
  if (subscription.endDate === null) {
    return null;
  }
  return daysUntil(subscription.endDate, now);
}

/**
 * Live subscription that should now be expired: its endDate passed, or
 * its period ran out with auto-renew off
 */
export function isLapsed(
  subscription: Pick<
    Subscription,
    'status' | 'endDate' | 'currentPeriodEnd' | 'autoRenew'
  >,
  now: Date
): boolean {
  if (!isLive(subscription.status)) {
    return false;
  }
  if (
    subscription.endDate !== null &&
    subscription.endDate.getTime() < now.getTime()
  ) {
    return true;
  }
  return !subscription.autoRenew && hasPeriodEnded(subscription, now);
}

/**
 * Live subscription set to renew whose period (or trial) ended without a
 * payment. It is held as suspended until a payment rolls it on.
 */
export function isOverdue(
  subscription: Pick<
    Subscription,
    'status' | 'endDate' | 'currentPeriodEnd' | 'autoRenew'
  >,
  now: Date
): boolean {
  return (
    isLive(subscription.status) &&
    !isLapsed(subscription, now) &&
    hasPeriodEnded(subscription, now)
  );
}
