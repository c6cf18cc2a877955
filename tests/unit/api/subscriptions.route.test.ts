/**
 * Subscription Routes Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { ActorContext } from '@/types/index.js';

import { customerActor, vendorActor } from '../../fixtures/index.js';
import type { TestApp } from '../../helpers/test-utils.js';
import { createTestApp, jsonRequest } from '../../helpers/test-utils.js';

describe('Subscription Routes', () => {
  let t: TestApp;

  async function subscribe(body: Record<string, unknown> = {}): Promise<Response> {
    return t.app.request(
      '/api/v1/subscriptions/subscribe/plan-basic',
      jsonRequest('POST', body)
    );
  }

  beforeEach(() => {
    t = createTestApp(vendorActor());
  });

  describe('GET /subscriptions/plans', () => {
    it('should list active plans without authentication', async () => {
      const res = await t.app.request('/api/v1/subscriptions/plans');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: [
          { id: 'plan-basic', basePrice: '999.00', setupFee: null, trialDays: 14 },
          { id: 'plan-premium', basePrice: '2499.00', setupFee: '500.00' },
        ],
      });
    });
  });

  describe('POST /subscriptions/subscribe/:planId', () => {
    it('should start a trial for the calling vendor', async () => {
      const res = await subscribe({ startTrial: true });

      expect(res.status).toBe(201);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: {
          id: 'sub-1',
          vendorId: 'vendor-1',
          status: 'trial',
          trialEndDate: '2025-01-15T00:00:00.000Z',
          currentPeriodEnd: '2025-01-15T00:00:00.000Z',
          amount: '999.00',
          currency: 'INR',
          scheduledPlanChange: null,
        },
      });
    });

    it('should default to no trial', async () => {
      const res = await subscribe();

      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: { status: 'active', currentPeriodEnd: '2025-01-31T00:00:00.000Z' },
      });
    });

    it('should answer 409 when the vendor already subscribed', async () => {
      await subscribe();

      const res = await subscribe();

      expect(res.status).toBe(409);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ error: { code: 'CONFLICT' } });
    });

    it('should answer 404 when the linked vendor does not exist', async () => {
      t.actAs(vendorActor({ vendorId: 'vendor-x' }));

      const res = await subscribe();

      expect(res.status).toBe(404);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'Vendor not found: vendor-x' },
      });
      expect(t.subscriptionDb.subscriptions.size).toBe(0);
    });

    it('should reject an unknown billing cycle', async () => {
      const res = await subscribe({ billingCycle: 'weekly' });

      expect(res.status).toBe(400);
    });

    it('should refuse customers', async () => {
      t.actAs(customerActor());

      const res = await subscribe();

      expect(res.status).toBe(403);
    });

    it('should refuse a vendor user without a vendor link', async () => {
      const { vendorId: _vendorId, ...unlinked } = vendorActor();
      const actor: ActorContext = unlinked;
      t.actAs(actor);

      const res = await subscribe();

      expect(res.status).toBe(403);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        error: { message: 'Caller is not linked to a vendor' },
      });
    });
  });

  describe('GET /subscriptions/me', () => {
    it('should return 404 before subscribing', async () => {
      const res = await t.app.request('/api/v1/subscriptions/me');

      expect(res.status).toBe(404);
    });

    it('should return the overview with access flags', async () => {
      await subscribe({ startTrial: true });

      const res = await t.app.request('/api/v1/subscriptions/me');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: {
          subscription: { id: 'sub-1', status: 'trial' },
          plan: { id: 'plan-basic' },
          isActive: true,
          isTrial: true,
          daysRemaining: null,
        },
      });
    });
  });

  describe('PUT /subscriptions/me/cancel and /reactivate', () => {
    it('should cancel at period end and reactivate before it', async () => {
      await subscribe();
      t.clock.advanceDays(15);

      const cancelled = await t.app.request(
        '/api/v1/subscriptions/me/cancel',
        jsonRequest('PUT', { reason: 'Pausing sales' }, { 'If-Match': '1' })
      );
      const reactivated = await t.app.request('/api/v1/subscriptions/me/reactivate', {
        method: 'PUT',
      });

      const cancelledBody: unknown = await cancelled.json();
      const reactivatedBody: unknown = await reactivated.json();
      expect(cancelledBody).toMatchObject({
        data: {
          status: 'cancelled',
          endDate: '2025-01-31T00:00:00.000Z',
          cancellationReason: 'Pausing sales',
          autoRenew: false,
          version: 2,
        },
      });
      expect(reactivatedBody).toMatchObject({
        data: { status: 'active', endDate: null, version: 3 },
      });
    });

    it('should answer 410 when reactivating after the end date', async () => {
      await subscribe();
      await t.app.request(
        '/api/v1/subscriptions/me/cancel',
        jsonRequest('PUT', { immediate: true })
      );
      t.clock.advanceDays(1);

      const res = await t.app.request('/api/v1/subscriptions/me/reactivate', {
        method: 'PUT',
      });

      expect(res.status).toBe(410);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ error: { code: 'EXPIRED' } });
    });
  });

  describe('PUT /subscriptions/me/change-plan/:planId', () => {
    it('should schedule the change by default', async () => {
      await subscribe();

      const res = await t.app.request(
        '/api/v1/subscriptions/me/change-plan/plan-premium',
        { method: 'PUT' }
      );

      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: {
          planId: 'plan-basic',
          scheduledPlanChange: {
            newPlanId: 'plan-premium',
            previousPlanId: 'plan-basic',
            effectiveAt: '2025-01-31T00:00:00.000Z',
          },
        },
      });
    });

    it('should switch now when asked to', async () => {
      await subscribe();

      const res = await t.app.request(
        '/api/v1/subscriptions/me/change-plan/plan-premium',
        jsonRequest('PUT', { immediate: true })
      );

      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: { planId: 'plan-premium', amount: '2499.00' },
      });
    });
  });

  describe('usage', () => {
    it('should track one unit by default', async () => {
      await subscribe();

      const res = await t.app.request(
        '/api/v1/subscriptions/me/usage',
        jsonRequest('POST', { featureName: 'products' })
      );

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        data: { featureName: 'products', usageCount: 1, usageLimit: 10 },
      });
    });

    it('should answer 402 past the plan limit', async () => {
      await subscribe();

      const res = await t.app.request(
        '/api/v1/subscriptions/me/usage',
        jsonRequest('POST', { featureName: 'products', increment: 11 })
      );

      expect(res.status).toBe(402);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        error: {
          code: 'LIMIT_EXCEEDED',
          details: { currentUsage: 0, usageLimit: 10, wouldResultIn: 11 },
        },
      });
    });

    it('should summarise usage for the current period', async () => {
      await subscribe();
      await t.app.request(
        '/api/v1/subscriptions/me/usage',
        jsonRequest('POST', { featureName: 'products', increment: 5 })
      );

      const res = await t.app.request('/api/v1/subscriptions/me/usage');

      const body: unknown = await res.json();
      expect(body).toEqual({
        data: {
          subscriptionId: 'sub-1',
          periodStart: '2025-01-01T00:00:00.000Z',
          periodEnd: '2025-01-31T00:00:00.000Z',
          daysRemaining: 30,
          features: [
            {
              featureName: 'orders',
              currentUsage: 0,
              usageLimit: null,
              usagePercentage: null,
              isLimitExceeded: false,
            },
            {
              featureName: 'products',
              currentUsage: 5,
              usageLimit: 10,
              usagePercentage: 50,
              isLimitExceeded: false,
            },
          ],
        },
        meta: { requestId: 'req-vendor' },
      });
    });
  });
});
