/**
 * Subscription lifecycle rule tests
 */

import { describe, it, expect } from 'vitest';

import { addDays } from '@/lib/clock.js';
import {
  canTransitionSubscription,
  daysRemaining,
  isBillable,
  isInTrial,
  isLapsed,
  isOverdue,
  isSubscriptionActive,
  rollPeriod,
  startPeriod,
} from '@/services/subscription.cycle.js';

import { T0 } from '../../fixtures/index.js';

const day = (n: number): Date => addDays(T0, n);

describe('startPeriod', () => {
  it('should start a trial when asked for and offered', () => {
    expect(startPeriod({ trialDays: 14 }, 'monthly', true, T0)).toEqual({
      status: 'trial',
      startDate: T0,
      currentPeriodStart: T0,
      currentPeriodEnd: day(14),
      trialEndDate: day(14),
      nextBillingDate: day(14),
    });
  });

  it.each([null, 0])(
    'should start a paid period when the plan trial is %s',
    (trialDays) => {
      const period = startPeriod({ trialDays }, 'quarterly', true, T0);

      expect(period.status).toBe('active');
      expect(period.currentPeriodEnd).toEqual(day(90));
      expect(period.trialEndDate).toBeNull();
    }
  );

  it('should size the period by billing cycle', () => {
    expect(
      startPeriod({ trialDays: 14 }, 'annually', false, T0).currentPeriodEnd
    ).toEqual(day(365));
    expect(
      startPeriod({ trialDays: 14 }, 'lifetime', false, T0).currentPeriodEnd
    ).toEqual(day(36500));
  });
});

describe('rollPeriod', () => {
  it('should continue from the previous period end', () => {
    expect(
      rollPeriod({ currentPeriodEnd: day(30), billingCycle: 'monthly' })
    ).toEqual({
      currentPeriodStart: day(30),
      currentPeriodEnd: day(60),
      nextBillingDate: day(60),
    });
  });
});

describe('status table', () => {
  it('should allow reactivation from cancelled only back to active', () => {
    expect(canTransitionSubscription('cancelled', 'active')).toBe(true);
    expect(canTransitionSubscription('cancelled', 'trial')).toBe(false);
  });

  it('should keep expired terminal', () => {
    expect(canTransitionSubscription('expired', 'active')).toBe(false);
    expect(canTransitionSubscription('expired', 'cancelled')).toBe(false);
  });

  it('should bill trial, active and suspended subscriptions', () => {
    expect(isBillable('suspended')).toBe(true);
    expect(isBillable('cancelled')).toBe(false);
  });
});

describe('access checks', () => {
  it('should keep a cancelled subscription active until its end date', () => {
    const cancelled = {
      status: 'cancelled' as const,
      endDate: day(30),
      currentPeriodEnd: day(30),
    };

    expect(isSubscriptionActive(cancelled, day(30))).toBe(true);
    expect(isSubscriptionActive(cancelled, day(31))).toBe(false);
    expect(isSubscriptionActive({ ...cancelled, endDate: null }, T0)).toBe(false);
  });

  it('should treat suspended and expired as inactive', () => {
    const period = { endDate: null, currentPeriodEnd: day(30) };

    expect(isSubscriptionActive({ ...period, status: 'suspended' }, T0)).toBe(
      false
    );
    expect(isSubscriptionActive({ ...period, status: 'expired' }, T0)).toBe(
      false
    );
  });

  it('should deny access once a live period ended unpaid', () => {
    const active = {
      status: 'active' as const,
      endDate: null,
      currentPeriodEnd: day(30),
    };

    expect(isSubscriptionActive(active, day(30))).toBe(true);
    expect(isSubscriptionActive(active, day(31))).toBe(false);
    expect(
      isSubscriptionActive(
        { ...active, status: 'trial', currentPeriodEnd: day(14) },
        day(15)
      )
    ).toBe(false);
  });

  it('should report a trial until its end', () => {
    const trial = { status: 'trial' as const, trialEndDate: day(14) };

    expect(isInTrial(trial, day(13))).toBe(true);
    expect(isInTrial(trial, day(14))).toBe(false);
  });

  it('should count whole days remaining', () => {
    expect(daysRemaining({ endDate: day(30) }, addDays(T0, 14.5))).toBe(15);
    expect(daysRemaining({ endDate: day(30) }, day(40))).toBe(0);
    expect(daysRemaining({ endDate: null }, T0)).toBeNull();
  });
});

describe('isLapsed', () => {
  const live = {
    status: 'active' as const,
    endDate: null,
    currentPeriodEnd: day(30),
    autoRenew: true,
  };

  it('should not lapse an auto-renewing subscription past its period', () => {
    expect(isLapsed(live, day(45))).toBe(false);
  });

  it('should lapse once auto-renew is off and the period ran out', () => {
    expect(isLapsed({ ...live, autoRenew: false }, day(30))).toBe(false);
    expect(isLapsed({ ...live, autoRenew: false }, day(31))).toBe(true);
  });

  it('should lapse once the end date passed', () => {
    expect(isLapsed({ ...live, endDate: day(10) }, day(11))).toBe(true);
  });

  it('should ignore subscriptions that are not live', () => {
    expect(
      isLapsed({ ...live, status: 'cancelled', endDate: day(10) }, day(11))
    ).toBe(false);
  });
});

describe('isOverdue', () => {
  const live = {
    status: 'active' as const,
    endDate: null,
    currentPeriodEnd: day(30),
    autoRenew: true,
  };

  it('should flag an auto-renewing period that ended unpaid', () => {
    expect(isOverdue(live, day(30))).toBe(false);
    expect(isOverdue(live, day(31))).toBe(true);
  });

  it('should flag a trial past its end', () => {
    expect(
      isOverdue({ ...live, status: 'trial', currentPeriodEnd: day(14) }, day(15))
    ).toBe(true);
  });

  it('should leave lapsed and non-live subscriptions alone', () => {
    expect(isOverdue({ ...live, autoRenew: false }, day(31))).toBe(false);
    expect(isOverdue({ ...live, endDate: day(20) }, day(31))).toBe(false);
    expect(isOverdue({ ...live, status: 'suspended' }, day(31))).toBe(false);
  });
});
